/**
 * Checked arithmetic shared by HardClamp and SoftClamp.
 *
 * Results are computed exactly, then checked against the 129-bit working
 * register that covers every integer kind. Leaving the register is a
 * {@link MachineOverflowError} whatever the behavior; a result inside the
 * register but outside the limits is handed to the behavior.
 *
 * @module
 */

import { resolveWithin } from '../bounds/behavior.js';
import type { Behavior } from '../bounds/behavior.js';
import type { Limits } from '../bounds/limits.js';
import { fitsKind } from '../numeric/kinds.js';
import type { IntegerKind } from '../numeric/kinds.js';
import { DivideByZeroError, MachineOverflowError } from '../types/errors.js';

export type BinaryOperation =
  | 'add'
  | 'sub'
  | 'mul'
  | 'div'
  | 'rem'
  | 'bitand'
  | 'bitor'
  | 'bitxor'
  | 'shl'
  | 'shr';

export type UnaryOperation = 'neg' | 'not';

export const REGISTER_MIN = -(1n << 127n);
export const REGISTER_MAX = (1n << 128n) - 1n;

const OPERATION_LABELS: Record<BinaryOperation | UnaryOperation, string> = {
  add: 'addition',
  sub: 'subtraction',
  mul: 'multiplication',
  div: 'division',
  rem: 'remainder',
  bitand: 'bitwise AND',
  bitor: 'bitwise OR',
  bitxor: 'bitwise XOR',
  shl: 'shift left',
  shr: 'shift right',
  neg: 'negation',
  not: 'bitwise NOT',
};

/** What the engine needs to know about a clamp configuration. */
export interface ArithmeticContext {
  readonly kind: IntegerKind;
  readonly limits: Limits;
  readonly behavior: Behavior;
}

function requireOperand(value: bigint, kind: IntegerKind, op: BinaryOperation | UnaryOperation): void {
  if (!fitsKind(value, kind)) {
    throw new MachineOverflowError(
      OPERATION_LABELS[op],
      kind.name,
      `operand ${value} does not fit in ${kind.name}`,
    );
  }
}

function requireRegister(raw: bigint, kind: IntegerKind, op: BinaryOperation | UnaryOperation): bigint {
  if (raw < REGISTER_MIN || raw > REGISTER_MAX) {
    throw new MachineOverflowError(OPERATION_LABELS[op], kind.name, `result exceeds the working register`);
  }
  return raw;
}

function requireShift(amount: bigint, kind: IntegerKind, op: BinaryOperation): void {
  if (amount < 0n || amount >= BigInt(kind.bits)) {
    throw new MachineOverflowError(
      OPERATION_LABELS[op],
      kind.name,
      `shift amount ${amount} is outside [0, ${kind.bits - 1}]`,
    );
  }
}

function rawBinary(op: BinaryOperation, lhs: bigint, rhs: bigint, kind: IntegerKind): bigint {
  switch (op) {
    case 'add':
      return lhs + rhs;
    case 'sub':
      return lhs - rhs;
    case 'mul':
      return lhs * rhs;
    case 'div':
      if (rhs === 0n) throw new DivideByZeroError(OPERATION_LABELS[op]);
      return lhs / rhs;
    case 'rem':
      if (rhs === 0n) throw new DivideByZeroError(OPERATION_LABELS[op]);
      return lhs % rhs;
    case 'bitand':
      return lhs & rhs;
    case 'bitor':
      return lhs | rhs;
    case 'bitxor':
      return lhs ^ rhs;
    case 'shl':
      requireShift(rhs, kind, op);
      return lhs << rhs;
    case 'shr':
      requireShift(rhs, kind, op);
      return lhs >> rhs;
  }
}

function rawUnary(op: UnaryOperation, value: bigint, kind: IntegerKind): bigint {
  switch (op) {
    case 'neg':
      return -value;
    case 'not':
      // Unsigned kinds flip only the kind's bits.
      return kind.signed ? ~value : kind.max ^ value;
  }
}

/**
 * Compute `lhs op rhs` without applying limits. Both operands must fit `kind`.
 */
export function computeBinary(op: BinaryOperation, lhs: bigint, rhs: bigint, kind: IntegerKind): bigint {
  requireOperand(lhs, kind, op);
  requireOperand(rhs, kind, op);
  return requireRegister(rawBinary(op, lhs, rhs, kind), kind, op);
}

/** Compute `op value` without applying limits. */
export function computeUnary(op: UnaryOperation, value: bigint, kind: IntegerKind): bigint {
  requireOperand(value, kind, op);
  return requireRegister(rawUnary(op, value, kind), kind, op);
}

/** Compute `lhs op rhs` and resolve the result against the context's limits. */
export function applyBinary(op: BinaryOperation, lhs: bigint, rhs: bigint, context: ArithmeticContext): bigint {
  return resolveWithin(computeBinary(op, lhs, rhs, context.kind), context.limits, context.behavior);
}

/** Compute `op value` and resolve the result against the context's limits. */
export function applyUnary(op: UnaryOperation, value: bigint, context: ArithmeticContext): bigint {
  return resolveWithin(computeUnary(op, value, context.kind), context.limits, context.behavior);
}
