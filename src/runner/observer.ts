/**
 * Observer Mode Runner
 * Watch a single path tick by tick: stall layout, starting shoppers, then
 * what every shopper does each tick
 */

import { PathSimulation, findCompletionTick } from '../core/simulation.js';
import { derivePathSeed } from '../core/rng.js';
import { initializePath } from '../core/world.js';
import type { PathState, ShopperOutcome, TickMetrics, WorldConfig } from '../core/types.js';
import {
  loadDotEnv,
  parseCount,
  parseNumber,
  resolveWorldConfig,
  type ConfigOverrides,
} from '../config/loader.js';

// ============================================================================
// ANSI Color Codes
// ============================================================================

const ANSI = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
};

// ============================================================================
// Types
// ============================================================================

type VerbosityLevel = 'quiet' | 'normal' | 'verbose';

const VERBOSITY_LEVELS: readonly VerbosityLevel[] = ['quiet', 'normal', 'verbose'];

function isVerbosityLevel(value: string): value is VerbosityLevel {
  return VERBOSITY_LEVELS.some((level) => level === value);
}

interface ObserverOptions {
  overrides: ConfigOverrides;
  configFile: string | null;
  pathIndex: number;
  delay: number;
  verbosity: VerbosityLevel;
}

// ============================================================================
// Argument Parsing
// ============================================================================

function parseArgs(): ObserverOptions {
  const args = process.argv.slice(2);
  const options: ObserverOptions = {
    overrides: {},
    configFile: null,
    pathIndex: 0,
    delay: 0,
    verbosity: 'normal',
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1] ?? '';

    switch (arg) {
      case '--seed':
        options.overrides.seed = parseNumber('--seed', next);
        i++;
        break;
      case '--path':
        options.pathIndex = parseCount('--path', next, 0);
        i++;
        break;
      case '--ticks':
        options.overrides.maxTimeSteps = parseNumber('--ticks', next);
        i++;
        break;
      case '--shoppers':
        options.overrides.shopperCount = parseNumber('--shoppers', next);
        i++;
        break;
      case '--config':
        options.configFile = next;
        i++;
        break;
      case '--delay':
        options.delay = parseNumber('--delay', next);
        i++;
        break;
      case '--verbosity':
        if (isVerbosityLevel(next)) {
          options.verbosity = next;
        }
        i++;
        break;
      case '--help':
      case '-h':
        printHelp();
        process.exit(0);
    }
  }

  return options;
}

function printHelp(): void {
  console.log(`
${ANSI.bold}Market Walk - Observer Mode${ANSI.reset}

${ANSI.cyan}Usage:${ANSI.reset} npm run observe -- [options]

${ANSI.cyan}Options:${ANSI.reset}
  --seed <number>        Master seed
  --path <index>         Which path of the run to replay (default: 0)
  --ticks <number>       Number of ticks to run
  --shoppers <number>    Number of shoppers
  --config <file>        JSON file with config overrides
  --delay <ms>           Delay between ticks in milliseconds (default: 0)
  --verbosity <level>    Output verbosity: quiet|normal|verbose (default: normal)
  --help, -h             Show this help

${ANSI.cyan}Examples:${ANSI.reset}
  npm run observe -- --shoppers 3 --ticks 40 --verbosity verbose
  npm run observe -- --seed 42 --path 7 --delay 200
`);
}

// ============================================================================
// Output
// ============================================================================

function formatPoint(x: number, y: number): string {
  return `(${x.toFixed(2).padStart(6)}, ${y.toFixed(2).padStart(6)})`;
}

function formatRemaining(value: number, start: number): string {
  const str = value.toFixed(3).padStart(7);
  if (value === 0) return `${ANSI.green}${str}${ANSI.reset}`;
  if (value < start / 2) return `${ANSI.yellow}${str}${ANSI.reset}`;
  return str;
}

function printHeader(config: WorldConfig, options: ObserverOptions, seed: number): void {
  if (options.verbosity === 'quiet') return;

  console.log(`${ANSI.bold}${'='.repeat(70)}${ANSI.reset}`);
  console.log(`${ANSI.bold}${ANSI.cyan}Market Walk - Observer Mode${ANSI.reset}`);
  console.log(`${ANSI.bold}${'='.repeat(70)}${ANSI.reset}`);
  console.log(
    `${ANSI.dim}Seed: ${config.seed} | Path: ${options.pathIndex} (seed ${seed}) | Ticks: ${config.maxTimeSteps} | Shoppers: ${config.shopperCount}${ANSI.reset}`
  );
  console.log('');
}

function printLayout(state: PathState, verbosity: VerbosityLevel): void {
  if (verbosity === 'quiet') return;

  console.log(`${ANSI.bold}Stalls:${ANSI.reset}`);
  for (const stall of state.stalls) {
    console.log(
      `  #${stall.index} at ${formatPoint(stall.position.x, stall.position.y)}: ${stall.inventory.join(', ')}`
    );
  }

  console.log(`${ANSI.bold}Shoppers:${ANSI.reset}`);
  for (const shopper of state.shoppers) {
    console.log(
      `  ${shopper.id.toString().padStart(3)} at ${formatPoint(shopper.position.x, shopper.position.y)}: ${shopper.shoppingList.join(', ')}`
    );
  }
  console.log('');
}

function formatOutcome(outcome: ShopperOutcome): string | null {
  switch (outcome.kind) {
    case 'purchase': {
      const bought =
        outcome.purchased.length > 0
          ? `${ANSI.green}bought ${outcome.purchased.join(', ')}${ANSI.reset}`
          : `${ANSI.red}nothing needed${ANSI.reset}`;
      return `shopper ${outcome.shopperId} @ stall ${outcome.stallIndex}: ${bought}`;
    }
    case 'move':
      return `${ANSI.dim}shopper ${outcome.shopperId} -> stall ${outcome.stallIndex} ${formatPoint(outcome.to.x, outcome.to.y)}${ANSI.reset}`;
    case 'done':
      return null;
  }
}

function printTick(metrics: TickMetrics, start: number, verbosity: VerbosityLevel): void {
  if (verbosity === 'quiet') return;

  console.log(
    `${ANSI.magenta}--- Tick ${metrics.tick.toString().padStart(4)} ---${ANSI.reset} remaining ${formatRemaining(metrics.itemsRemaining, start)} | moves ${metrics.moves} | purchases ${metrics.purchases.length} | done ${metrics.doneShoppers}`
  );

  if (verbosity === 'verbose') {
    for (const outcome of metrics.outcomes) {
      const line = formatOutcome(outcome);
      if (line) console.log(`    ${line}`);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================================================
// Main Observer Loop
// ============================================================================

async function main(): Promise<void> {
  loadDotEnv();
  const options = parseArgs();
  const config = resolveWorldConfig({ configFile: options.configFile, cli: options.overrides });

  const seed = derivePathSeed(config.seed, options.pathIndex);
  const initialState = initializePath(config, seed);
  const sim = new PathSimulation(initialState, config);
  const start = initialState.itemsRemaining[0];

  printHeader(config, options, seed);
  printLayout(initialState, options.verbosity);

  const startTime = Date.now();

  for (let i = 0; i < config.maxTimeSteps; i++) {
    const metrics = sim.tick();
    printTick(metrics, start, options.verbosity);

    if (options.delay > 0 && i < config.maxTimeSteps - 1) {
      await sleep(options.delay);
    }
  }

  const elapsed = Date.now() - startTime;
  const series = sim.getItemsRemaining();
  const completedAt = findCompletionTick(series);

  console.log(`${ANSI.bold}${'='.repeat(70)}${ANSI.reset}`);
  console.log(`${ANSI.bold}${ANSI.cyan}Observer Complete${ANSI.reset}`);
  console.log(`${ANSI.bold}${'='.repeat(70)}${ANSI.reset}`);
  console.log(`Total ticks: ${sim.getTick()}`);
  console.log(`Elapsed time: ${(elapsed / 1000).toFixed(1)}s`);
  console.log(`Items remaining: ${start.toFixed(3)} -> ${series[series.length - 1].toFixed(3)}`);
  console.log(completedAt === null ? 'Some lists were never completed' : `All lists completed at tick ${completedAt}`);

  if (options.verbosity !== 'quiet') {
    console.log('');
    console.log(`${ANSI.bold}Unfinished shoppers:${ANSI.reset}`);
    for (const shopper of sim.getState().shoppers) {
      if (shopper.shoppingList.length === 0) continue;
      console.log(
        `  ${shopper.id.toString().padStart(3)}: still needs ${shopper.shoppingList.join(', ')} (visited ${shopper.visitedStalls.size}/${config.stallPositions.length} stalls)`
      );
    }
  }
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`${ANSI.red}Error: ${message}${ANSI.reset}`);
  process.exit(1);
});
