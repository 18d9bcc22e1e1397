/**
 * World configuration validation
 * Every precondition is checked here, once, before any path runs
 */

import { z } from 'zod';
import type { WorldConfig } from './types.js';
import { ConfigError } from './errors.js';
import { DEFAULT_WORLD_CONFIG } from './world.js';

const finite = z.number().finite();
const count = z.number().int();

// Seeds feed 32-bit integer hashing, so wider values would alias
const MAX_SEED = 0xffffffff;

const worldConfigShape = z.object({
  itemCatalog: z.array(z.string().min(1)).min(1, 'catalog must not be empty'),
  stallPositions: z.array(finite).min(1, 'at least one stall position is required'),
  itemsPerStall: count.min(1),
  shopperCount: count.min(1),
  minShoppingListSize: count.min(1),
  maxShoppingListSize: count.min(1),
  walkingSpeed: finite.positive(),
  spaceHalfWidthX: finite.nonnegative(),
  spaceHalfWidthY: finite.nonnegative(),
  arrivalRadius: finite.nonnegative(),
  maxTimeSteps: count.positive(),
  pathCount: count.positive(),
  seed: count.min(0).max(MAX_SEED),
});

/**
 * Any subset of fields, as found in a config file; unknown keys are rejected
 */
export const partialWorldConfigSchema = worldConfigShape.partial().strict();

export const worldConfigSchema = worldConfigShape.superRefine((config, ctx) => {
  const catalogSize = config.itemCatalog.length;

  if (new Set(config.itemCatalog).size !== catalogSize) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['itemCatalog'],
      message: 'items must be distinct',
    });
  }
  if (new Set(config.stallPositions).size !== config.stallPositions.length) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['stallPositions'],
      message: 'positions must be distinct',
    });
  }
  if (config.itemsPerStall > catalogSize) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['itemsPerStall'],
      message: `${config.itemsPerStall} exceeds catalog size ${catalogSize}`,
    });
  }
  if (config.maxShoppingListSize > catalogSize) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['maxShoppingListSize'],
      message: `${config.maxShoppingListSize} exceeds catalog size ${catalogSize}`,
    });
  }
  if (config.minShoppingListSize > config.maxShoppingListSize) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['minShoppingListSize'],
      message: 'must not exceed maxShoppingListSize',
    });
  }
});

/**
 * Merge overrides onto the defaults and validate.
 * Throws ConfigError listing every problem found.
 */
export function createWorldConfig(overrides: Partial<WorldConfig> = {}): Readonly<WorldConfig> {
  // An explicit undefined leaves the default in place
  const candidate: Record<string, unknown> = { ...DEFAULT_WORLD_CONFIG };
  const entries: Array<[string, unknown]> = Object.entries(overrides);
  for (const [key, value] of entries) {
    if (value !== undefined) candidate[key] = value;
  }
  const result = worldConfigSchema.safeParse(candidate);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }

  const config: WorldConfig = {
    ...result.data,
    itemCatalog: Object.freeze([...result.data.itemCatalog]),
    stallPositions: Object.freeze([...result.data.stallPositions]),
  };
  return Object.freeze(config);
}
