/**
 * Market Walk
 * Agent-based marketplace simulation: shoppers walk between stalls until
 * their lists are empty or every stall has been tried
 */

export type * from './core/types.js';

export { SeededRNG, derivePathSeed, hashState } from './core/rng.js';
export { ConfigError, type ConfigIssue } from './core/errors.js';
export { createWorldConfig, worldConfigSchema, partialWorldConfigSchema } from './core/config.js';
export {
  DEFAULT_ITEM_CATALOG,
  DEFAULT_WORLD_CONFIG,
  computeItemsRemaining,
  createPathState,
  initializePath,
  clonePathState,
} from './core/world.js';
export { generateStallStock, createStalls } from './systems/stock.js';
export { createShoppers } from './systems/shoppers.js';
export { distance, headingTowards, stepTowards } from './systems/movement.js';
export {
  applyShopperPolicy,
  selectTargetStall,
  purchaseAtStall,
  isShopperDone,
} from './systems/decision.js';
export {
  PathSimulation,
  simulatePath,
  findCompletionTick,
  type PathSimulationOptions,
} from './core/simulation.js';
export { runPaths, runPath, type RunPathsOptions } from './core/aggregator.js';
export {
  loadDotEnv,
  loadEnvOverrides,
  loadConfigFile,
  resolveWorldConfig,
  ENV_KEYS,
} from './config/loader.js';
