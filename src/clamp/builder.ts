/**
 * ClampBuilder - Fluent API for declaring clamp types.
 *
 * The builder produces a {@link ClampDefinition} or a factory bound to one.
 * Factories implement the bounds, behavior and conversion capabilities, so a
 * code generator can emit wrappers against them directly.
 *
 * @module
 */

import type { BehaviorKind } from '../bounds/behavior.js';
import type { RandomSource } from '../config.js';
import type { IntegerKindName, IntegerLike } from '../numeric/kinds.js';
import type { OutOfBoundsError } from '../types/errors.js';
import type { Result } from '../types/result.js';
import { defineClamp } from './definition.js';
import type {
  BehaviorCapability,
  BoundsCapability,
  ClampDefinition,
  ClampOptions,
  ConversionCapability,
} from './definition.js';
import { HardClamp } from './hard.js';
import { SoftClamp } from './soft.js';

// ============================================================================
// Factories
// ============================================================================

/** A clamp type: its definition plus constructors for its values. */
export interface ClampFactory<K extends BehaviorKind, C>
  extends BoundsCapability,
    BehaviorCapability<K>,
    ConversionCapability<C> {
  readonly definition: ClampDefinition<K>;
  create(value: IntegerLike): C;
  parse(text: string): C;
  random(source?: RandomSource): C;
  defaultValue(): C;
  fromJSON(raw: unknown): C;
}

export interface HardClampFactory<K extends BehaviorKind> extends ClampFactory<K, HardClamp<K>> {
  tryCreate(value: IntegerLike): Result<HardClamp<K>, OutOfBoundsError>;
}

export type SoftClampFactory<K extends BehaviorKind> = ClampFactory<K, SoftClamp<K>>;

export function hardClampFactory<K extends BehaviorKind>(definition: ClampDefinition<K>): HardClampFactory<K> {
  return Object.freeze({
    definition,
    lower: definition.lower,
    upper: definition.upper,
    behavior: definition.behavior,
    create: (value: IntegerLike) => HardClamp.create(definition, value),
    tryCreate: (value: IntegerLike) => HardClamp.tryCreate(definition, value),
    parse: (text: string) => HardClamp.parse(definition, text),
    random: (source?: RandomSource) => HardClamp.random(definition, source),
    defaultValue: () => HardClamp.defaultFor(definition),
    fromJSON: (raw: unknown) => HardClamp.fromJSON(definition, raw),
    fromRaw: (raw: IntegerLike) => HardClamp.create(definition, raw),
    toRaw: (wrapper: HardClamp<K>) => wrapper.get(),
  });
}

export function softClampFactory<K extends BehaviorKind>(definition: ClampDefinition<K>): SoftClampFactory<K> {
  return Object.freeze({
    definition,
    lower: definition.lower,
    upper: definition.upper,
    behavior: definition.behavior,
    create: (value: IntegerLike) => SoftClamp.create(definition, value),
    parse: (text: string) => SoftClamp.parse(definition, text),
    random: (source?: RandomSource) => SoftClamp.random(definition, source),
    defaultValue: () => SoftClamp.defaultFor(definition),
    fromJSON: (raw: unknown) => SoftClamp.fromJSON(definition, raw),
    fromRaw: (raw: IntegerLike) => SoftClamp.create(definition, raw),
    toRaw: (wrapper: SoftClamp<K>) => wrapper.get(),
  });
}

// ============================================================================
// ClampBuilder
// ============================================================================

/**
 * Fluent builder for clamp definitions. Each call returns a new builder, so a
 * partially configured builder can be shared.
 *
 * @example
 * ```typescript
 * const Volume = clampOf('u8')
 *   .upper(10)
 *   .saturating()
 *   .named('Volume')
 *   .hard();
 *
 * const volume = Volume.create(5);
 * volume.addAssign(20); // 10
 * ```
 */
export class ClampBuilder<K extends BehaviorKind = 'panicking'> {
  private readonly options: ClampOptions<K>;

  constructor(options: ClampOptions<K>) {
    this.options = options;
  }

  lower(value: IntegerLike): ClampBuilder<K> {
    return new ClampBuilder<K>({ ...this.options, lower: value });
  }

  upper(value: IntegerLike): ClampBuilder<K> {
    return new ClampBuilder<K>({ ...this.options, upper: value });
  }

  named(name: string): ClampBuilder<K> {
    return new ClampBuilder<K>({ ...this.options, name });
  }

  default(value: IntegerLike): ClampBuilder<K> {
    return new ClampBuilder<K>({ ...this.options, default: value });
  }

  saturating(): ClampBuilder<'saturating'> {
    return new ClampBuilder<'saturating'>({ ...this.options, behavior: 'saturating' });
  }

  panicking(): ClampBuilder<'panicking'> {
    return new ClampBuilder<'panicking'>({ ...this.options, behavior: 'panicking' });
  }

  /** Validate the options and fix the definition. */
  build(): ClampDefinition<K> {
    return defineClamp(this.options);
  }

  hard(): HardClampFactory<K> {
    return hardClampFactory(this.build());
  }

  soft(): SoftClampFactory<K> {
    return softClampFactory(this.build());
  }
}

/** Start a builder over an integer kind. Behavior defaults to panicking. */
export function clampOf(kind: IntegerKindName): ClampBuilder<'panicking'> {
  return new ClampBuilder<'panicking'>({ kind });
}
