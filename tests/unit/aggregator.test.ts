/**
 * Path Aggregator Tests
 */

import { describe, it, expect } from 'vitest';
import { runPath, runPaths } from '../../src/core/aggregator.js';
import { createWorldConfig } from '../../src/core/config.js';
import { derivePathSeed } from '../../src/core/rng.js';
import type { PathResult } from '../../src/core/types.js';

describe('runPaths', () => {
  const config = createWorldConfig({ pathCount: 4, maxTimeSteps: 30, shopperCount: 5 });

  it('should build a [tick][path] matrix', () => {
    const result = runPaths(config);

    expect(result.matrix).toHaveLength(31);
    for (const row of result.matrix) {
      expect(row).toHaveLength(4);
    }
    for (let p = 0; p < 4; p++) {
      for (let t = 0; t <= 30; t++) {
        expect(result.matrix[t][p]).toBe(result.paths[p].itemsRemaining[t]);
      }
    }
  });

  it('should give each path its own seed', () => {
    const result = runPaths(config);

    expect(result.paths.map((p) => p.seed)).toEqual([0, 1, 2, 3].map((p) => derivePathSeed(config.seed, p)));
    expect(result.paths.map((p) => p.pathIndex)).toEqual([0, 1, 2, 3]);
  });

  it('should start different paths from different layouts', () => {
    const result = runPaths(config);
    const layouts = result.paths.map((p) => JSON.stringify(p.initialShoppers.map((s) => s.position)));

    expect(new Set(layouts).size).toBe(4);
  });

  it('should report each finished path in order', () => {
    const seen: PathResult[] = [];

    runPaths(config, { onPathComplete: (path) => seen.push(path) });

    expect(seen.map((p) => p.pathIndex)).toEqual([0, 1, 2, 3]);
  });

  it('should let a single path be replayed on its own', () => {
    const result = runPaths(config);
    const replay = runPath(config, 2);

    expect(replay.itemsRemaining).toEqual(result.paths[2].itemsRemaining);
    expect(replay.finalState).toEqual(result.paths[2].finalState);
  });

  it('should hand back the config it ran with', () => {
    expect(runPaths(config).config).toBe(config);
  });
});
