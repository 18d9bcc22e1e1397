/**
 * Core types for the Market Walk simulation
 */

// ============================================================================
// Primitive Types
// ============================================================================

export type ItemId = string;
export type StallIndex = number;
export type ShopperId = number;

export interface Vector2 {
  x: number;
  y: number;
}

// ============================================================================
// World Configuration
// ============================================================================

export interface WorldConfig {
  itemCatalog: readonly ItemId[];
  stallPositions: readonly number[]; // x-coordinates, stalls sit on y = 0
  itemsPerStall: number;
  shopperCount: number;
  minShoppingListSize: number;
  maxShoppingListSize: number;
  walkingSpeed: number; // distance per move tick
  spaceHalfWidthX: number;
  spaceHalfWidthY: number;
  arrivalRadius: number;
  maxTimeSteps: number;
  pathCount: number;
  seed: number;
}

// ============================================================================
// Agents
// ============================================================================

export interface Stall {
  index: StallIndex;
  position: Vector2;
  inventory: ItemId[];
}

export interface Shopper {
  id: ShopperId;
  position: Vector2;
  shoppingList: ItemId[];
  targetStall: StallIndex | null; // null = undecided
  visitedStalls: Set<StallIndex>;
}

// ============================================================================
// Decision Outcomes
// ============================================================================

export type ShopperOutcome =
  | { kind: 'done'; shopperId: ShopperId }
  | {
      kind: 'purchase';
      shopperId: ShopperId;
      stallIndex: StallIndex;
      purchased: ItemId[];
    }
  | {
      kind: 'move';
      shopperId: ShopperId;
      stallIndex: StallIndex;
      from: Vector2;
      to: Vector2;
    };

// ============================================================================
// Path State
// ============================================================================

export interface PathState {
  tick: number;
  stalls: Stall[];
  shoppers: Shopper[];
  itemsRemaining: number[]; // one entry per recorded tick, starting at tick 0
}

export interface TickMetrics {
  tick: number;
  itemsRemaining: number;
  purchases: Array<{ shopperId: ShopperId; stallIndex: StallIndex; items: ItemId[] }>;
  moves: number;
  doneShoppers: number;
  outcomes: ShopperOutcome[];
  stateHash: string | null; // set only when the simulation records hashes
}

export interface PathResult {
  pathIndex: number;
  seed: number;
  initialStalls: Stall[];
  initialShoppers: Shopper[];
  finalState: PathState;
  itemsRemaining: number[];
  completedAtTick: number | null; // first tick with nothing left to buy
}

export interface SimulationResult {
  config: WorldConfig;
  matrix: number[][]; // [tick][path]
  paths: PathResult[];
}
