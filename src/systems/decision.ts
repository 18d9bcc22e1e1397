/**
 * Shopper Decision Policy
 * Applied once per active shopper per tick: pick a stall, then buy or walk
 *
 * A shopper knows where every stall is but not what it sells, so it walks to
 * the nearest stall it has not tried yet and buys whatever that stall has
 * from its list. Items no stall carries stay on the list forever.
 */

import type {
  ItemId,
  Shopper,
  Stall,
  StallIndex,
  ShopperOutcome,
  Vector2,
  WorldConfig,
} from '../core/types.js';
import { distance, stepTowards } from './movement.js';

type PolicyConfig = Pick<WorldConfig, 'walkingSpeed' | 'arrivalRadius'>;

/**
 * True when the shopper will never act again: nothing left to buy,
 * or every stall already tried
 */
export function isShopperDone(shopper: Shopper, stallCount: number): boolean {
  return shopper.shoppingList.length === 0 || shopper.visitedStalls.size >= stallCount;
}

/**
 * Nearest stall not yet visited, or null if none remain.
 * Equidistant stalls resolve to the lowest index.
 */
export function selectTargetStall(
  position: Vector2,
  stalls: readonly Stall[],
  visited: ReadonlySet<StallIndex>
): StallIndex | null {
  let best: StallIndex | null = null;
  let bestDistance = Infinity;

  for (const stall of stalls) {
    if (visited.has(stall.index)) continue;

    const d = distance(position, stall.position);
    if (d < bestDistance) {
      best = stall.index;
      bestDistance = d;
    }
  }

  return best;
}

/**
 * Remove every list item the stall stocks and mark the stall visited.
 * Returns the items bought, in list order.
 */
export function purchaseAtStall(shopper: Shopper, stall: Stall): ItemId[] {
  const stocked = new Set(stall.inventory);
  const purchased = shopper.shoppingList.filter((item) => stocked.has(item));

  shopper.shoppingList = shopper.shoppingList.filter((item) => !stocked.has(item));
  shopper.visitedStalls.add(stall.index);
  shopper.targetStall = null;

  return purchased;
}

/**
 * Apply one tick of the policy to a shopper (mutates the shopper).
 * Exactly one of done, purchase or move happens.
 */
export function applyShopperPolicy(
  shopper: Shopper,
  stalls: readonly Stall[],
  config: PolicyConfig
): ShopperOutcome {
  if (isShopperDone(shopper, stalls.length)) {
    return { kind: 'done', shopperId: shopper.id };
  }

  if (shopper.targetStall === null) {
    shopper.targetStall = selectTargetStall(shopper.position, stalls, shopper.visitedStalls);
  }

  const target = shopper.targetStall === null ? undefined : stalls[shopper.targetStall];
  if (!target) {
    // Only reachable when visitedStalls holds indices outside the stall list
    shopper.targetStall = null;
    return { kind: 'done', shopperId: shopper.id };
  }

  if (distance(shopper.position, target.position) <= config.arrivalRadius) {
    const purchased = purchaseAtStall(shopper, target);
    return {
      kind: 'purchase',
      shopperId: shopper.id,
      stallIndex: target.index,
      purchased,
    };
  }

  const from = shopper.position;
  shopper.position = stepTowards(from, target.position, config.walkingSpeed);

  return {
    kind: 'move',
    shopperId: shopper.id,
    stallIndex: target.index,
    from: { ...from },
    to: { ...shopper.position },
  };
}
