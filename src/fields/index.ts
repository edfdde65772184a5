import {
  BooleanField,
  DateTimeField,
  Field,
  FloatField,
  IntegerField,
  ListField,
  NestedField,
  StringField,
  type DateTimeFieldOptions,
  type NestedFieldOptions,
} from './raw.js';
import { ObjectMemberField, type ObjectMemberFieldOptions } from './object-member.js';
import { OptionalNestedField, type OptionalNestedFieldOptions } from './optional-nested.js';
import type { FieldInput, FieldOptions, FieldsetSource } from './types.js';

export {
  Field,
  StringField,
  IntegerField,
  FloatField,
  BooleanField,
  DateTimeField,
  NestedField,
  ListField,
} from './raw.js';
export type { DateTimeFormat, DateTimeFieldOptions, NestedFieldOptions } from './raw.js';
export { ObjectMemberField } from './object-member.js';
export type { ObjectMemberFieldOptions } from './object-member.js';
export { OptionalNestedField } from './optional-nested.js';
export type { OptionalNestedFieldOptions, NestedRenderOptions } from './optional-nested.js';
export { getValue } from './utils.js';
export type {
  AttributeSource,
  FieldOptions,
  FieldClass,
  FieldInput,
  FieldsetSource,
} from './types.js';

/**
 * Field factories.
 *
 * @example
 * ```ts
 * fieldset('Post')
 *   .field('title', fields.string())
 *   .field('publishedAt', fields.dateTime({ format: 'rfc822' }))
 *   .field('tags', fields.list(fields.string()))
 *   .field('author', fields.optionalNested(UserFieldset, 'id'));
 * ```
 */
export const fields = {
  raw: (options?: FieldOptions) => new Field(options),
  string: (options?: FieldOptions) => new StringField(options),
  integer: (options?: FieldOptions) => new IntegerField(options),
  float: (options?: FieldOptions) => new FloatField(options),
  boolean: (options?: FieldOptions) => new BooleanField(options),
  dateTime: (options?: DateTimeFieldOptions) => new DateTimeField(options),
  nested: (structure: Record<string, FieldInput>, options?: NestedFieldOptions) =>
    new NestedField(structure, options),
  list: (container: FieldInput, options?: FieldOptions) => new ListField(container, options),
  member: (member: string, options?: ObjectMemberFieldOptions) =>
    new ObjectMemberField(member, options),
  optionalNested: (
    nested: FieldsetSource,
    plainKey: string | null,
    options?: OptionalNestedFieldOptions
  ) => new OptionalNestedField(nested, plainKey, options),
};
