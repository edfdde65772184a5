import type { Field } from './raw.js';
import type { FieldsetSchema } from '../fieldset/schema.js';
import type { FieldsetBuilder } from '../fieldset/builder.js';

/**
 * Where a field reads its value from.
 * A string is a member name (dots walk nested objects); a function receives
 * the whole source object.
 */
export type AttributeSource = string | ((source: unknown) => unknown);

/**
 * Options shared by every field.
 */
export interface FieldOptions {
  /** Read the value from this member instead of the output name */
  attribute?: AttributeSource;
  /** Rendered (formatted) when the source value is null or missing */
  default?: unknown;
}

/** A field class with a no-argument constructor, e.g. `StringField`. */
export type FieldClass = new () => Field;

/** A field instance or a field class to instantiate. */
export type FieldInput = Field | FieldClass;

/**
 * Anything that yields a fieldset schema: a built schema, a builder, or a
 * thunk returning either (for fieldsets declared further down a module).
 */
export type FieldsetSource =
  | FieldsetSchema
  | FieldsetBuilder
  | (() => FieldsetSchema | FieldsetBuilder);
