/**
 * Default guard snapshots for view items.
 *
 * `structuredClone` keeps plain data but drops prototypes, so the default copy
 * only takes items built from primitives, arrays, plain objects, `Date`,
 * `Map` and `Set`. Anything else needs an explicit `clone` option.
 *
 * @module
 */

import { ConfigurationInvalidError } from '../types/errors.js';

const PLAIN_PROTOTYPES: ReadonlySet<unknown> = new Set([
  Object.prototype,
  Array.prototype,
  Date.prototype,
  Map.prototype,
  Set.prototype,
]);

function typeName(value: object): string {
  const name: unknown = value.constructor?.name;
  return typeof name === 'string' && name.length > 0 ? name : 'Object';
}

/**
 * Locate the first part of `value` the default copy cannot reproduce, as a
 * `path: reason` string, or `null` when the whole item is plain data.
 */
export function findUncopyable(value: unknown, path = 'item', seen: Set<object> = new Set()): string | null {
  if (typeof value === 'function') {
    return `${path}: functions cannot be copied`;
  }
  if (typeof value === 'symbol') {
    return `${path}: symbols cannot be copied`;
  }
  if (typeof value !== 'object' || value === null || seen.has(value)) {
    return null;
  }
  seen.add(value);
  if (!PLAIN_PROTOTYPES.has(Object.getPrototypeOf(value))) {
    return `${path}: ${typeName(value)} instances lose their prototype when copied`;
  }
  if (value instanceof Map) {
    for (const [key, entry] of value) {
      const found =
        findUncopyable(key, `${path}.<key>`, seen) ?? findUncopyable(entry, `${path}.get(${String(key)})`, seen);
      if (found !== null) return found;
    }
    return null;
  }
  if (value instanceof Set) {
    for (const entry of value) {
      const found = findUncopyable(entry, `${path}.<entry>`, seen);
      if (found !== null) return found;
    }
    return null;
  }
  for (const [key, entry] of Object.entries(value)) {
    const found = findUncopyable(entry, `${path}.${key}`, seen);
    if (found !== null) return found;
  }
  return null;
}

/** Throw {@link ConfigurationInvalidError} unless {@link copyItem} can copy `value`. */
export function assertCopyable(value: unknown, owner: string): void {
  const found = findUncopyable(value);
  if (found !== null) {
    throw new ConfigurationInvalidError(`${owner} needs a clone option: ${found}`);
  }
}

/** Deep copy of plain data. */
export function copyItem<T>(value: T, owner: string): T {
  assertCopyable(value, owner);
  return structuredClone(value);
}
