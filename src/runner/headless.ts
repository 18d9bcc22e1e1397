/**
 * Headless Runner
 * CLI for running many paths without UI
 */

import { runPaths } from '../core/aggregator.js';
import { hashState } from '../core/rng.js';
import { DEFAULT_WORLD_CONFIG } from '../core/world.js';
import type { PathResult, WorldConfig } from '../core/types.js';
import {
  loadDotEnv,
  parseCount,
  parseNumber,
  parseNumberList,
  resolveWorldConfig,
  type ConfigOverrides,
} from '../config/loader.js';

interface RunOptions {
  overrides: ConfigOverrides;
  configFile: string | null;
  verbose: boolean;
  logInterval: number;
  json: boolean;
}

function parseArgs(): RunOptions {
  const args = process.argv.slice(2);
  const options: RunOptions = {
    overrides: {},
    configFile: null,
    verbose: false,
    logInterval: 10,
    json: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1] ?? '';

    switch (arg) {
      case '--seed':
        options.overrides.seed = parseNumber('--seed', next);
        i++;
        break;
      case '--paths':
        options.overrides.pathCount = parseNumber('--paths', next);
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
      case '--speed':
        options.overrides.walkingSpeed = parseNumber('--speed', next);
        i++;
        break;
      case '--items-per-stall':
        options.overrides.itemsPerStall = parseNumber('--items-per-stall', next);
        i++;
        break;
      case '--stalls':
        options.overrides.stallPositions = parseNumberList('--stalls', next);
        i++;
        break;
      case '--config':
        options.configFile = next;
        i++;
        break;
      case '--log-interval':
        options.logInterval = parseCount('--log-interval', next, 1);
        i++;
        break;
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--json':
        options.json = true;
        break;
      case '--help':
      case '-h':
        console.log(`
Market Walk Simulation Runner

Usage: npm run simulate -- [options]

Options:
  --seed <number>          Master seed (default: ${DEFAULT_WORLD_CONFIG.seed})
  --paths <number>         Number of paths (default: ${DEFAULT_WORLD_CONFIG.pathCount})
  --ticks <number>         Ticks per path (default: ${DEFAULT_WORLD_CONFIG.maxTimeSteps})
  --shoppers <number>      Shoppers per path (default: ${DEFAULT_WORLD_CONFIG.shopperCount})
  --speed <number>         Walking speed (default: ${DEFAULT_WORLD_CONFIG.walkingSpeed})
  --items-per-stall <n>    Items each stall stocks (default: ${DEFAULT_WORLD_CONFIG.itemsPerStall})
  --stalls <x,x,...>       Stall x-positions (default: ${DEFAULT_WORLD_CONFIG.stallPositions.join(',')})
  --config <file>          JSON file with config overrides
  --log-interval <n>       With --verbose, print every n-th tick of each path (default: 10)
  --verbose, -v            Show per-tick output
  --json                   Print the [tick][path] matrix as JSON and nothing else
  --help, -h               Show this help

Environment (.env.local is loaded):
  MARKET_SEED, MARKET_PATHS, MARKET_TICKS, MARKET_SHOPPERS, MARKET_WALKING_SPEED,
  MARKET_ITEMS_PER_STALL, MARKET_STALL_POSITIONS, MARKET_CONFIG_FILE

Examples:
  npm run simulate -- --seed 42 --paths 500
  npm run simulate -- --paths 5 --ticks 60 --verbose
  npm run simulate -- --json > result.json
        `);
        process.exit(0);
    }
  }

  return options;
}

function formatMetric(value: number): string {
  return value.toFixed(3).padStart(7);
}

function printConfig(config: WorldConfig): void {
  console.log(`Seed: ${config.seed}`);
  console.log(`Paths: ${config.pathCount}`);
  console.log(`Ticks per path: ${config.maxTimeSteps}`);
  console.log(`Shoppers: ${config.shopperCount} (lists of ${config.minShoppingListSize}-${config.maxShoppingListSize} items)`);
  console.log(`Stalls: ${config.stallPositions.length} at x = ${config.stallPositions.join(', ')}`);
  console.log(`Items per stall: ${config.itemsPerStall} of ${config.itemCatalog.length}`);
  console.log(`Walking speed: ${config.walkingSpeed} | Arrival radius: ${config.arrivalRadius}`);
}

function logPath(result: PathResult, options: RunOptions): void {
  const series = result.itemsRemaining;
  const final = series[series.length - 1];
  const completed =
    result.completedAtTick === null ? 'not finished' : `finished at tick ${result.completedAtTick}`;

  console.log(
    `  Path ${result.pathIndex.toString().padStart(4)}: start ${formatMetric(series[0])} -> end ${formatMetric(final)} (${completed})`
  );

  if (options.verbose) {
    for (let t = options.logInterval; t < series.length; t += options.logInterval) {
      console.log(`    [Tick ${t}] items remaining ${formatMetric(series[t])}`);
    }
  }
}

async function main() {
  loadDotEnv();
  const options = parseArgs();
  const config = resolveWorldConfig({ configFile: options.configFile, cli: options.overrides });

  if (options.json) {
    const result = runPaths(config);
    process.stdout.write(JSON.stringify({ config, matrix: result.matrix }) + '\n');
    return;
  }

  console.log('='.repeat(60));
  console.log('Market Walk Simulation');
  console.log('='.repeat(60));
  printConfig(config);
  console.log('');

  const startTime = Date.now();
  const result = runPaths(config, {
    onPathComplete: (path) => logPath(path, options),
  });
  const elapsed = Date.now() - startTime;

  const finished = result.paths.filter((path) => path.completedAtTick !== null).length;

  console.log('');
  console.log('='.repeat(60));
  console.log('Simulation Complete');
  console.log('='.repeat(60));
  console.log(`Total paths: ${config.pathCount}`);
  console.log(`Paths where every list emptied: ${finished}`);
  console.log(`Elapsed time: ${elapsed}ms`);
  console.log(`Performance: ${((config.pathCount / Math.max(elapsed, 1)) * 1000).toFixed(1)} paths/sec`);

  console.log('');
  console.log('Determinism Check:');
  console.log(`  Matrix size: ${result.matrix.length} ticks x ${config.pathCount} paths`);
  console.log(`  Matrix hash: ${hashState(result.matrix)}`);
}

main().catch((error) => {
  console.error('Simulation failed:', error);
  process.exit(1);
});
