/**
 * Path Aggregator
 * Runs independent paths and collects their series into a [tick][path] matrix
 */

import type { PathResult, SimulationResult, WorldConfig } from './types.js';
import { derivePathSeed } from './rng.js';
import { simulatePath } from './simulation.js';

export interface RunPathsOptions {
  /** Called after each path finishes, in path order */
  onPathComplete?: (result: PathResult) => void;
}

/**
 * Run a single path of a multi-path run by index
 */
export function runPath(config: WorldConfig, pathIndex: number): PathResult {
  return simulatePath(config, derivePathSeed(config.seed, pathIndex), pathIndex);
}

/**
 * Run config.pathCount paths sequentially
 */
export function runPaths(config: WorldConfig, options: RunPathsOptions = {}): SimulationResult {
  const paths: PathResult[] = [];

  for (let p = 0; p < config.pathCount; p++) {
    const result = runPath(config, p);
    paths.push(result);
    options.onPathComplete?.(result);
  }

  const matrix: number[][] = [];
  for (let t = 0; t <= config.maxTimeSteps; t++) {
    matrix.push(paths.map((path) => path.itemsRemaining[t]));
  }

  return { config, matrix, paths };
}
