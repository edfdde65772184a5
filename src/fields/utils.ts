import type { AttributeSource, FieldInput } from './types.js';
import type { Field } from './raw.js';

export function isNil(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Whether `source` carries `member`, own or inherited (getters included).
 */
export function hasMember(source: unknown, member: string): boolean {
  if (source instanceof Map) {
    return source.has(member);
  }
  if ((typeof source === 'object' && source !== null) || typeof source === 'function') {
    return member in source;
  }
  return false;
}

/** Read a single member; dots are not interpreted. */
export function readMember(source: unknown, key: string): unknown {
  if (source instanceof Map) {
    return source.get(key);
  }
  if ((typeof source === 'object' && source !== null) || typeof source === 'function') {
    return Reflect.get(source, key);
  }
  return undefined;
}

/**
 * Read a value from a source object. Missing members resolve to undefined.
 *
 * @example
 * ```ts
 * getValue('owner.email', { owner: { email: 'a@b.c' } }); // 'a@b.c'
 * getValue((post) => post.meta, post);
 * ```
 */
export function getValue(key: AttributeSource, source: unknown): unknown {
  if (typeof key === 'function') {
    return key(source);
  }
  if (!key.includes('.')) {
    return readMember(source, key);
  }
  return key.split('.').reduce<unknown>((current, part) => readMember(current, part), source);
}

export function resolveField(input: FieldInput): Field {
  return typeof input === 'function' ? new input() : input;
}
