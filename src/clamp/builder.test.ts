import { describe, it, expect } from 'vitest';
import { clampOf } from './builder.js';
import { HardClamp } from './hard.js';
import { SoftClamp } from './soft.js';
import { Saturating } from '../bounds/behavior.js';
import { OutOfBoundsError } from '../types/errors.js';

describe('ClampBuilder', () => {
  it('builds a definition from fluent calls', () => {
    const def = clampOf('i8').lower(-4).upper(4).saturating().named('Trim').default(1).build();
    expect(def.name).toBe('Trim');
    expect(def.lower).toBe(-4n);
    expect(def.upper).toBe(4n);
    expect(def.behavior).toBe(Saturating);
    expect(def.defaultValue).toBe(1n);
  });

  it('does not mutate the builder it was called on', () => {
    const base = clampOf('u8').upper(10);
    const wide = base.upper(20).build();
    expect(base.build().upper).toBe(10n);
    expect(wide.upper).toBe(20n);
  });

  it('switches behavior back to panicking', () => {
    const def = clampOf('u8').saturating().panicking().build();
    expect(def.behavior.kind).toBe('panicking');
  });

  describe('hard factory', () => {
    const Volume = clampOf('u8').upper(10).saturating().named('Volume').hard();

    it('implements the capability surface', () => {
      expect(Volume.lower).toBe(0n);
      expect(Volume.upper).toBe(10n);
      expect(Volume.behavior).toBe(Saturating);

      const clamp = Volume.fromRaw(6);
      expect(clamp).toBeInstanceOf(HardClamp);
      expect(Volume.toRaw(clamp)).toBe(6n);
      expect(() => Volume.fromRaw(11)).toThrow(OutOfBoundsError);
    });

    it('constructs values of the type', () => {
      const volume = Volume.create(5);
      volume.addAssign(20);
      expect(volume.get()).toBe(10n);
      expect(Volume.tryCreate(12).ok).toBe(false);
      expect(Volume.parse('3').get()).toBe(3n);
      expect(Volume.defaultValue().get()).toBe(0n);
      expect(Volume.random(() => Uint8Array.of(0x02)).get()).toBe(2n);
      expect(Volume.fromJSON(4).get()).toBe(4n);
    });
  });

  describe('soft factory', () => {
    const Gain = clampOf('u8').upper(10).soft();

    it('accepts out-of-range raw values', () => {
      const gain = Gain.fromRaw(30);
      expect(gain).toBeInstanceOf(SoftClamp);
      expect(gain.isValid()).toBe(false);
      expect(Gain.toRaw(gain)).toBe(30n);
      expect(Gain.definition.name).toBe('Clamp<u8>');
    });

    it('panics on out-of-range set by default', () => {
      const gain = Gain.create(3);
      expect(() => gain.set(11)).toThrow(OutOfBoundsError);
    });
  });
});
