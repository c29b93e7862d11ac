/**
 * Clamp definitions and the capability surface they expose.
 *
 * A definition fixes everything a clamp type is parameterised by: the integer
 * kind, the limits, the behavior and the default value. Code generators and
 * builders target the three capability interfaces below.
 *
 * @module
 */

import { z } from 'zod';
import { behaviorFor } from '../bounds/behavior.js';
import type { Behavior, BehaviorKind } from '../bounds/behavior.js';
import { Limits } from '../bounds/limits.js';
import { INTEGER_KIND_NAMES, INTEGER_KINDS } from '../numeric/kinds.js';
import type { IntegerKind, IntegerKindName, IntegerLike } from '../numeric/kinds.js';
import { ConfigurationInvalidError } from '../types/errors.js';

// ============================================================================
// Capabilities
// ============================================================================

/** Exposes the inclusive bounds of a clamp type. */
export interface BoundsCapability {
  readonly lower: bigint;
  readonly upper: bigint;
}

/** Exposes the static behavior of a clamp type. */
export interface BehaviorCapability<K extends BehaviorKind = BehaviorKind> {
  readonly behavior: Behavior<K>;
}

/** Bidirectional mapping between a wrapper and its raw integer. */
export interface ConversionCapability<W> {
  fromRaw(raw: IntegerLike): W;
  toRaw(wrapper: W): bigint;
}

// ============================================================================
// Definition
// ============================================================================

export interface ClampDefinition<K extends BehaviorKind = BehaviorKind>
  extends BoundsCapability,
    BehaviorCapability<K> {
  readonly name: string;
  readonly kind: IntegerKind;
  readonly limits: Limits;
  readonly defaultValue: bigint;
}

export interface ClampOptions<K extends BehaviorKind = 'panicking'> {
  /** Label used in errors and log lines. Defaults to `Clamp<kind>`. */
  name?: string;
  kind: IntegerKindName;
  lower?: IntegerLike;
  upper?: IntegerLike;
  /** Defaults to `'panicking'`. */
  behavior?: K;
  /** Defaults to zero when in range, otherwise `lower`. */
  default?: IntegerLike;
}

const integerLikeSchema = z.union([z.bigint(), z.number().int()]);

const clampOptionsSchema = z
  .object({
    name: z.string().min(1).optional(),
    kind: z.enum(INTEGER_KIND_NAMES),
    lower: integerLikeSchema.optional(),
    upper: integerLikeSchema.optional(),
    behavior: z.enum(['panicking', 'saturating']).optional(),
    default: integerLikeSchema.optional(),
  })
  .strict();

/**
 * Fix a clamp configuration. Invalid options, bounds outside the kind,
 * `lower > upper` or a default outside the limits are rejected here.
 *
 * @example
 * ```typescript
 * const Percent = defineClamp({ kind: 'u8', upper: 100, behavior: 'saturating' });
 * const p = HardClamp.create(Percent, 40);
 * ```
 */
export function defineClamp<K extends BehaviorKind = 'panicking'>(
  options: ClampOptions<K>,
): ClampDefinition<K>;
export function defineClamp(options: ClampOptions<BehaviorKind>): ClampDefinition {
  const parsed = clampOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationInvalidError(details);
  }

  const { name, kind: kindName, lower, upper, behavior = 'panicking', default: fallback } = parsed.data;
  const kind = INTEGER_KINDS[kindName];
  const limits = Limits.of(kind, { lower, upper });

  let defaultValue = limits.defaultValue;
  if (fallback !== undefined) {
    defaultValue = BigInt(fallback);
    if (!limits.contains(defaultValue)) {
      throw new ConfigurationInvalidError(
        `default ${defaultValue} is outside ${limits.toString()}`,
        limits.lower,
        limits.upper,
      );
    }
  }

  return Object.freeze({
    name: name ?? `Clamp<${kind.name}>`,
    kind,
    limits,
    lower: limits.lower,
    upper: limits.upper,
    behavior: behaviorFor(behavior),
    defaultValue,
  });
}

/** Two definitions describe the same configuration. */
export function sameDefinition(a: ClampDefinition, b: ClampDefinition): boolean {
  return a === b || (a.limits.equals(b.limits) && a.behavior.kind === b.behavior.kind);
}
