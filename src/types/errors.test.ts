import { describe, it, expect } from 'vitest';
import {
  BoundedErrorCodes,
  BoundedError,
  OutOfBoundsError,
  ValidationFailedError,
  ConfigurationInvalidError,
  DivideByZeroError,
  MachineOverflowError,
  ParseFailedError,
  GuardActiveError,
  ConsumedError,
  DefinitionMismatchError,
  isBoundedError,
} from './errors.js';

describe('BoundedErrorCodes', () => {
  it('maps every code to its own name', () => {
    for (const [key, value] of Object.entries(BoundedErrorCodes)) {
      expect(value).toBe(key);
    }
  });
});

describe('BoundedError', () => {
  it('carries message, code and name', () => {
    const error = new BoundedError('boom', BoundedErrorCodes.PARSE_FAILED);
    expect(error.message).toBe('boom');
    expect(error.code).toBe('PARSE_FAILED');
    expect(error.name).toBe('BoundedError');
    expect(error).toBeInstanceOf(Error);
  });
});

describe('OutOfBoundsError', () => {
  it('records the value, the bounds and the violated side', () => {
    const above = new OutOfBoundsError(15n, 0n, 10n);
    expect(above.message).toBe('Value 15 is out of bounds [0, 10]');
    expect(above.code).toBe(BoundedErrorCodes.OUT_OF_BOUNDS);
    expect(above.value).toBe(15n);
    expect(above.lower).toBe(0n);
    expect(above.upper).toBe(10n);
    expect(above.direction).toBe('above');

    const below = new OutOfBoundsError(-3n, 0n, 10n);
    expect(below.direction).toBe('below');
  });
});

describe('specific errors', () => {
  it('formats ValidationFailedError', () => {
    const error = new ValidationFailedError('must not be 7');
    expect(error.message).toBe('Validation failed: must not be 7');
    expect(error.reason).toBe('must not be 7');
    expect(error.name).toBe('ValidationFailedError');
  });

  it('formats ConfigurationInvalidError with optional bounds', () => {
    const error = new ConfigurationInvalidError('lower bound 10 is greater than upper bound 5', 10n, 5n);
    expect(error.message).toBe('Invalid configuration: lower bound 10 is greater than upper bound 5');
    expect(error.lower).toBe(10n);
    expect(error.upper).toBe(5n);
    expect(new ConfigurationInvalidError('x').lower).toBeUndefined();
  });

  it('formats DivideByZeroError', () => {
    expect(new DivideByZeroError('division').message).toBe('Attempted division by zero');
  });

  it('formats MachineOverflowError', () => {
    const error = new MachineOverflowError('addition', 'u8', 'operand 300 does not fit in u8');
    expect(error.message).toBe('Machine overflow in addition (u8): operand 300 does not fit in u8');
    expect(error.kind).toBe('u8');
  });

  it('formats ParseFailedError', () => {
    const error = new ParseFailedError('abc', 'u8', 'invalid digit found in string');
    expect(error.message).toBe('Cannot parse "abc" as u8: invalid digit found in string');
    expect(error.input).toBe('abc');
  });

  it('formats GuardActiveError, ConsumedError and DefinitionMismatchError', () => {
    expect(new GuardActiveError('Volume').message).toBe('Volume is leased to an open guard');
    expect(new ConsumedError('guard', 'committed').message).toBe('The guard was already committed');
    expect(new DefinitionMismatchError('Volume', 'Level').message).toBe(
      'Cannot combine clamp "Level" with clamp "Volume"',
    );
  });
});

describe('isBoundedError', () => {
  it('narrows library errors only', () => {
    expect(isBoundedError(new DivideByZeroError('remainder'))).toBe(true);
    expect(isBoundedError(new Error('plain'))).toBe(false);
    expect(isBoundedError('OUT_OF_BOUNDS')).toBe(false);
  });
});
