/**
 * Path Simulation Loop
 * Advances every shopper one step per tick for a fixed number of ticks
 */

import type {
  PathState,
  PathResult,
  TickMetrics,
  WorldConfig,
} from './types.js';
import { hashState } from './rng.js';
import { clonePathState, cloneShopper, cloneStall, computeItemsRemaining, initializePath } from './world.js';
import { applyShopperPolicy } from '../systems/decision.js';

type LoopConfig = Pick<WorldConfig, 'walkingSpeed' | 'arrivalRadius'>;

export interface PathSimulationOptions {
  /** Hash stalls and shoppers after every tick (off by default) */
  recordHashes?: boolean;
}

/**
 * PathSimulation owns one path's state and executes its ticks
 */
export class PathSimulation {
  private state: PathState;
  private config: LoopConfig;
  private recordHashes: boolean;
  private tickHistory: string[] = []; // State hashes for determinism verification

  constructor(initialState: PathState, config: LoopConfig, options: PathSimulationOptions = {}) {
    this.state = clonePathState(initialState);
    this.config = { walkingSpeed: config.walkingSpeed, arrivalRadius: config.arrivalRadius };
    this.recordHashes = options.recordHashes ?? false;

    if (this.state.itemsRemaining.length === 0) {
      this.state.itemsRemaining.push(computeItemsRemaining(this.state.shoppers));
    }
  }

  /**
   * Get current path state (read-only)
   */
  getState(): PathState {
    return this.state;
  }

  getTick(): number {
    return this.state.tick;
  }

  /**
   * Metric series recorded so far, tick 0 first
   */
  getItemsRemaining(): number[] {
    return [...this.state.itemsRemaining];
  }

  /**
   * Get tick history hashes for determinism verification
   * (empty unless recordHashes was set)
   */
  getTickHistory(): string[] {
    return [...this.tickHistory];
  }

  /**
   * Execute one tick: every shopper in id order, then record the metric
   */
  tick(): TickMetrics {
    const { stalls, shoppers } = this.state;
    const metrics: TickMetrics = {
      tick: this.state.tick + 1,
      itemsRemaining: 0,
      purchases: [],
      moves: 0,
      doneShoppers: 0,
      outcomes: [],
      stateHash: null,
    };

    for (const shopper of shoppers) {
      const outcome = applyShopperPolicy(shopper, stalls, this.config);
      metrics.outcomes.push(outcome);

      switch (outcome.kind) {
        case 'done':
          metrics.doneShoppers++;
          break;
        case 'purchase':
          metrics.purchases.push({
            shopperId: outcome.shopperId,
            stallIndex: outcome.stallIndex,
            items: outcome.purchased,
          });
          break;
        case 'move':
          metrics.moves++;
          break;
      }
    }

    this.state.tick += 1;
    metrics.itemsRemaining = computeItemsRemaining(shoppers);
    this.state.itemsRemaining.push(metrics.itemsRemaining);

    if (this.recordHashes) {
      // Stalls and shoppers only; the metric series is not hashed
      metrics.stateHash = hashState({ tick: this.state.tick, stalls, shoppers });
      this.tickHistory.push(metrics.stateHash);
    }

    return metrics;
  }

  /**
   * Run simulation for N ticks
   */
  run(ticks: number): TickMetrics[] {
    const allMetrics: TickMetrics[] = [];

    for (let i = 0; i < ticks; i++) {
      allMetrics.push(this.tick());
    }

    return allMetrics;
  }
}

/**
 * First tick at which nobody has anything left to buy
 */
export function findCompletionTick(itemsRemaining: readonly number[]): number | null {
  const index = itemsRemaining.findIndex((value) => value === 0);
  return index === -1 ? null : index;
}

/**
 * Run one full path from its seed.
 * Always runs maxTimeSteps ticks, even after every list is empty.
 */
export function simulatePath(config: WorldConfig, seed: number, pathIndex: number = 0): PathResult {
  const initialState = initializePath(config, seed);
  const sim = new PathSimulation(initialState, config);
  sim.run(config.maxTimeSteps);

  const itemsRemaining = sim.getItemsRemaining();

  return {
    pathIndex,
    seed,
    initialStalls: initialState.stalls.map(cloneStall),
    initialShoppers: initialState.shoppers.map(cloneShopper),
    finalState: sim.getState(),
    itemsRemaining,
    completedAtTick: findCompletionTick(itemsRemaining),
  };
}
