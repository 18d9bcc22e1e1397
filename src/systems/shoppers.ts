/**
 * Shopper Initializer
 * Random start positions and shopping lists
 */

import type { Shopper, WorldConfig } from '../core/types.js';
import type { SeededRNG } from '../core/rng.js';

/**
 * Create shoppers in id order.
 * Per shopper the draws are x, y, list length, then the items.
 */
export function createShoppers(config: WorldConfig, rng: SeededRNG): Shopper[] {
  const shoppers: Shopper[] = [];

  for (let id = 0; id < config.shopperCount; id++) {
    const x = rng.randomRange(-config.spaceHalfWidthX, config.spaceHalfWidthX);
    const y = rng.randomRange(-config.spaceHalfWidthY, config.spaceHalfWidthY);
    const listSize = rng.randomInt(config.minShoppingListSize, config.maxShoppingListSize);

    shoppers.push({
      id,
      position: { x, y },
      shoppingList: rng.sample(config.itemCatalog, listSize),
      targetStall: null,
      visitedStalls: new Set(),
    });
  }

  return shoppers;
}
