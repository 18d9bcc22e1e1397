/**
 * Trader Stock Generator
 * Each stall stocks a fixed-size random subset of the catalog
 */

import type { ItemId, Stall, WorldConfig } from '../core/types.js';
import type { SeededRNG } from '../core/rng.js';
import { ConfigError } from '../core/errors.js';

/**
 * Draw one stall's inventory without replacement
 */
export function generateStallStock(
  catalog: readonly ItemId[],
  itemsPerStall: number,
  rng: SeededRNG
): ItemId[] {
  if (itemsPerStall > catalog.length) {
    throw new ConfigError([
      {
        path: 'itemsPerStall',
        message: `${itemsPerStall} exceeds catalog size ${catalog.length}`,
      },
    ]);
  }

  return rng.sample(catalog, itemsPerStall);
}

/**
 * Create every stall in stallPositions order
 */
export function createStalls(config: WorldConfig, rng: SeededRNG): Stall[] {
  return config.stallPositions.map((x, index) => ({
    index,
    position: { x, y: 0 },
    inventory: generateStallStock(config.itemCatalog, config.itemsPerStall, rng),
  }));
}
