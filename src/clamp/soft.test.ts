import { describe, it, expect } from 'vitest';
import { SoftClamp } from './soft.js';
import { defineClamp } from './definition.js';
import { GuardActiveError, MachineOverflowError, OutOfBoundsError, ParseFailedError } from '../types/errors.js';

const Gain = defineClamp({ name: 'Gain', kind: 'u8', upper: 10, behavior: 'saturating' });
const StrictGain = defineClamp({ name: 'StrictGain', kind: 'u8', upper: 10 });

describe('SoftClamp', () => {
  describe('documented scenario', () => {
    it('resolves operators and stores unchecked assignments verbatim', () => {
      const gain = SoftClamp.create(Gain, 5);

      gain.addAssign(5);
      expect(gain.get()).toBe(10n);
      expect(gain.isValid()).toBe(true);

      gain.subAssign(15);
      expect(gain.get()).toBe(0n);
      expect(gain.isValid()).toBe(true);

      gain.setUnchecked(30);
      expect(gain.get()).toBe(30n);
      expect(gain.isValid()).toBe(false);
    });
  });

  describe('construction', () => {
    it('accepts any value of the kind', () => {
      const gain = SoftClamp.create(Gain, 200);
      expect(gain.get()).toBe(200n);
      expect(gain.isValid()).toBe(false);
    });

    it('rejects values that do not fit the kind', () => {
      expect(() => SoftClamp.create(Gain, 256)).toThrow(
        'Machine overflow in construction (u8): 256 does not fit in u8',
      );
    });

    it('validates against the limits', () => {
      expect(SoftClamp.validate(Gain, 4)).toEqual({ ok: true, value: 4n });
      expect(SoftClamp.validate(Gain, 40).ok).toBe(false);
    });

    it('reports values outside the kind as out of bounds without throwing', () => {
      const result = SoftClamp.validate(Gain, 300);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(OutOfBoundsError);
        expect(result.error.value).toBe(300n);
        expect(result.error.direction).toBe('above');
      }
      expect(SoftClamp.validate(Gain, -1).ok).toBe(false);
    });

    it('uses the default value and random source', () => {
      expect(SoftClamp.defaultFor(Gain).get()).toBe(0n);
      expect(SoftClamp.random(Gain, () => Uint8Array.of(0x09)).get()).toBe(9n);
    });
  });

  describe('tryGet', () => {
    it('reports out-of-range values', () => {
      const gain = SoftClamp.create(Gain, 12);
      const result = gain.tryGet();
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(OutOfBoundsError);
        expect(result.error.direction).toBe('above');
      }
      gain.setUnchecked(3);
      expect(gain.tryGet()).toEqual({ ok: true, value: 3n });
    });
  });

  describe('set', () => {
    it('saturates under saturating behavior', () => {
      const gain = SoftClamp.create(Gain, 5);
      gain.set(40);
      expect(gain.get()).toBe(10n);
    });

    it('fails under panicking behavior and keeps the value', () => {
      const gain = SoftClamp.create(StrictGain, 5);
      expect(() => gain.set(40)).toThrow(OutOfBoundsError);
      expect(gain.get()).toBe(5n);
      gain.set(9);
      expect(gain.get()).toBe(9n);
    });

    it('still requires the kind for unchecked writes', () => {
      const gain = SoftClamp.create(Gain, 5);
      expect(() => gain.setUnchecked(-1)).toThrow(MachineOverflowError);
      expect(gain.get()).toBe(5n);
    });

    it('updates verbatim', () => {
      const gain = SoftClamp.create(Gain, 5);
      gain.update((value) => value * 3n);
      expect(gain.get()).toBe(15n);
    });
  });

  describe('applyUnchecked', () => {
    it('stores out-of-range results', () => {
      const gain = SoftClamp.create(Gain, 8);
      gain.applyUnchecked('add', 7);
      expect(gain.get()).toBe(15n);
      expect(gain.isValid()).toBe(false);

      gain.applyUnchecked('not');
      expect(gain.get()).toBe(240n);
    });

    it('accepts clamps of the same configuration', () => {
      const gain = SoftClamp.create(Gain, 8);
      gain.applyUnchecked('mul', SoftClamp.create(Gain, 3));
      expect(gain.get()).toBe(24n);
    });

    it('fails when the result does not fit the kind', () => {
      const gain = SoftClamp.create(Gain, 200);
      expect(() => gain.applyUnchecked('add', 100)).toThrow(MachineOverflowError);
      expect(() => gain.applyUnchecked('sub', 201)).toThrow(MachineOverflowError);
      expect(gain.get()).toBe(200n);
    });
  });

  describe('guard', () => {
    it('commits any staged value of the kind', () => {
      const gain = SoftClamp.create(Gain, 5);
      const guard = gain.modify();
      guard.set(99);
      expect(guard.check()).toBe('changed');
      expect(() => gain.setUnchecked(1)).toThrow(GuardActiveError);
      expect(guard.commit()).toEqual({ ok: true, value: 99n });
      expect(gain.get()).toBe(99n);
      expect(gain.isValid()).toBe(false);
    });

    it('rejects staged writes outside the kind', () => {
      const gain = SoftClamp.create(Gain, 5);
      gain.edit((guard) => {
        expect(() => guard.set(300)).toThrow(MachineOverflowError);
        expect(guard.check()).toBe('unchanged');
        guard.cancel();
      });
      expect(gain.get()).toBe(5n);
    });
  });

  describe('text and JSON', () => {
    it('parses any in-kind value', () => {
      expect(SoftClamp.parse(Gain, '77').get()).toBe(77n);
      expect(() => SoftClamp.parse(Gain, '300')).toThrow(ParseFailedError);
    });

    it('decodes out-of-range values as-is', () => {
      const gain = SoftClamp.fromJSON(Gain, 42);
      expect(gain.get()).toBe(42n);
      expect(gain.isValid()).toBe(false);
      expect(gain.toJSON()).toBe(42);
    });
  });
});
