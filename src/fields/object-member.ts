import { Field } from './raw.js';
import type { FieldInput, FieldOptions } from './types.js';
import { hasMember, isNil, readMember, resolveField } from './utils.js';

export interface ObjectMemberFieldOptions extends FieldOptions {
  /** Formats the extracted member; a class is instantiated on each use */
  memberField?: FieldInput;
}

/**
 * Renders one member of an object-valued attribute.
 *
 * Use this when the attribute holds an object but the output needs a single
 * member of it, e.g. the id of a related record. An absent or null member
 * renders the field's `default`.
 *
 * @example
 * ```ts
 * // { owner: { id: 9, email: '...' } } -> { owner: '9' }
 * const owner = new ObjectMemberField('id', { memberField: StringField });
 * ```
 */
export class ObjectMemberField extends Field {
  readonly member: string;
  readonly memberField?: FieldInput;

  constructor(member: string, options: ObjectMemberFieldOptions = {}) {
    const { memberField, ...rest } = options;
    super(rest);
    this.member = member;
    this.memberField = memberField;
  }

  format(value: unknown): unknown {
    if (!hasMember(value, this.member)) {
      return this.default ?? null;
    }
    const member = readMember(value, this.member);
    if (isNil(member)) {
      return this.default ?? null;
    }
    if (this.memberField === undefined) {
      return member;
    }
    return resolveField(this.memberField).format(member);
  }
}
