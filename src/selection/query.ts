import type { Context, Env } from 'hono';
import type { FieldsetSchema } from '../fieldset/schema.js';
import { createSelectionParser } from './parser.js';
import type { FieldSelection, SelectionParser } from './types.js';

/**
 * Read a single query argument and coerce it.
 * Returns null when the argument is absent; a repeated argument uses its
 * first value.
 */
export function parseQueryArg<T, E extends Env = Env>(
  ctx: Context<E>,
  name: string,
  coerce: (value: unknown) => T
): T | null {
  const value = ctx.req.query(name);
  if (value === undefined) {
    return null;
  }
  return coerce(value);
}

/**
 * Parsers for a fieldset's two selection parameters.
 */
export interface SelectionParsers {
  fields: SelectionParser;
  embed: SelectionParser;
}

export function createSelectionParsers(schema: FieldsetSchema): SelectionParsers {
  return {
    fields: createSelectionParser(schema.allFieldPaths, schema.meta.fieldsParam),
    embed: createSelectionParser(schema.nestedFieldPaths, schema.meta.embedParam),
  };
}

/**
 * Parse both selection parameters of the current request.
 *
 * @example
 * ```ts
 * // GET /users/1?fields=id,team.name&embedd=team
 * readFieldSelection(c, UserFieldset);
 * // { fields: Set { 'id', 'team.name' }, embed: Set { 'team' } }
 * ```
 */
export function readFieldSelection<E extends Env = Env>(
  ctx: Context<E>,
  schema: FieldsetSchema,
  parsers: SelectionParsers = createSelectionParsers(schema)
): FieldSelection {
  const fields = parseQueryArg(ctx, schema.meta.fieldsParam, parsers.fields);
  const embed = parseQueryArg(ctx, schema.meta.embedParam, parsers.embed);
  return {
    fields: fields ?? new Set(),
    embed: embed ?? new Set(),
  };
}
