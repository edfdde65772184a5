import { InvalidSelectionException, SelectionTypeException } from '../core/exceptions.js';
import type { SelectionParser } from './types.js';

/**
 * Parse a comma-separated selection against the paths it may name.
 *
 * @param value - Raw selection, e.g. `"id,owner.email"`
 * @param validPaths - Vocabulary, usually `allFieldPaths` or `nestedFieldPaths`
 * @param param - Query parameter name, reported in errors
 * @returns The selected paths; empty for an empty string
 * @throws SelectionTypeException when `value` is not a string
 * @throws InvalidSelectionException listing the unknown paths, sorted
 */
export function parseSelection(
  value: unknown,
  validPaths: ReadonlySet<string>,
  param?: string
): Set<string> {
  if (typeof value !== 'string') {
    throw new SelectionTypeException(param);
  }
  if (value.length === 0) {
    return new Set();
  }

  const selected = new Set(value.split(','));
  const unknown = [...selected].filter((path) => !validPaths.has(path));
  if (unknown.length > 0) {
    throw new InvalidSelectionException(unknown, param);
  }
  return selected;
}

/**
 * Bind a vocabulary (and parameter name) into a reusable parser.
 *
 * @example
 * ```ts
 * const parseFields = createSelectionParser(UserFieldset.allFieldPaths, 'fields');
 * parseFields('id,email'); // Set { 'id', 'email' }
 * ```
 */
export function createSelectionParser(validPaths: Iterable<string>, param?: string): SelectionParser {
  const vocabulary = new Set(validPaths);
  return (value) => parseSelection(value, vocabulary, param);
}
