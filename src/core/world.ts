/**
 * World State Management
 * Defaults, path initialization and state helpers
 */

import type { WorldConfig, ItemId, PathState, Stall, Shopper } from './types.js';
import { SeededRNG } from './rng.js';
import { createStalls } from '../systems/stock.js';
import { createShoppers } from '../systems/shoppers.js';

/**
 * Goods sold in the market
 */
export const DEFAULT_ITEM_CATALOG: readonly ItemId[] = [
  'apples',
  'bananas',
  'bread',
  'cheese',
  'eggs',
  'fish',
  'honey',
  'milk',
  'onions',
  'potatoes',
  'rice',
  'tomatoes',
];

export const DEFAULT_WORLD_CONFIG: WorldConfig = {
  itemCatalog: DEFAULT_ITEM_CATALOG,
  stallPositions: [-8, -4, 0, 4, 8],
  itemsPerStall: 4,
  shopperCount: 20,
  minShoppingListSize: 1,
  maxShoppingListSize: 8,
  walkingSpeed: 0.5,
  spaceHalfWidthX: 10,
  spaceHalfWidthY: 10,
  arrivalRadius: 0.25,
  maxTimeSteps: 100,
  pathCount: 100,
  seed: 12345,
};

/**
 * Mean number of unpurchased items across shoppers
 */
export function computeItemsRemaining(shoppers: readonly Shopper[]): number {
  if (shoppers.length === 0) return 0;

  let total = 0;
  for (const shopper of shoppers) {
    total += shopper.shoppingList.length;
  }
  return total / shoppers.length;
}

/**
 * Build a tick-0 path state with its initial metric recorded
 */
export function createPathState(stalls: Stall[], shoppers: Shopper[]): PathState {
  return {
    tick: 0,
    stalls,
    shoppers,
    itemsRemaining: [computeItemsRemaining(shoppers)],
  };
}

/**
 * Initialize a path from its own random stream.
 * Stall stock is drawn before any shopper.
 */
export function initializePath(config: WorldConfig, seed: number): PathState {
  const rng = new SeededRNG(seed);
  const stalls = createStalls(config, rng);
  const shoppers = createShoppers(config, rng);

  return createPathState(stalls, shoppers);
}

export function cloneStall(stall: Stall): Stall {
  return {
    index: stall.index,
    position: { ...stall.position },
    inventory: [...stall.inventory],
  };
}

export function cloneShopper(shopper: Shopper): Shopper {
  return {
    id: shopper.id,
    position: { ...shopper.position },
    shoppingList: [...shopper.shoppingList],
    targetStall: shopper.targetStall,
    visitedStalls: new Set(shopper.visitedStalls),
  };
}

/**
 * Clone path state (deep copy)
 */
export function clonePathState(state: PathState): PathState {
  return {
    tick: state.tick,
    stalls: state.stalls.map(cloneStall),
    shoppers: state.shoppers.map(cloneShopper),
    itemsRemaining: [...state.itemsRemaining],
  };
}
