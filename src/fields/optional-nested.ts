import { Field } from './raw.js';
import { ObjectMemberField } from './object-member.js';
import type { FieldsetSchema } from '../fieldset/schema.js';
import type { AttributeSource, FieldInput, FieldOptions, FieldsetSource } from './types.js';

export interface OptionalNestedFieldOptions extends FieldOptions {
  /** Formats the plain key when the field is not embedded */
  plainField?: FieldInput;
  /** Render `null` for a missing nested object instead of its defaults */
  allowNull?: boolean;
}

/**
 * Options forwarded to the nested rendering of an embedded field.
 */
export interface NestedRenderOptions {
  attribute?: AttributeSource;
  default?: unknown;
  allowNull: boolean;
}

/**
 * Nests one fieldset inside another.
 *
 * Callers choose per request whether the nested object is embedded (rendered
 * with its own fieldset) or reduced to its plain key, and select nested
 * fields with dotted paths such as `owner.email`.
 *
 * @example
 * ```ts
 * const PostFieldset = fieldset('Post')
 *   .field('title', StringField)
 *   .field('author', new OptionalNestedField(UserFieldset, 'id'))
 *   .build();
 *
 * // GET /posts/1?fields=title,author          -> { title, author: 9 }
 * // GET /posts/1?fields=title,author.email&embedd=author
 * //                                           -> { title, author: { email } }
 * ```
 *
 * Wrap it in a `ListField` to nest a list of fieldsets.
 */
export class OptionalNestedField extends Field {
  readonly plainKey: string | null;
  readonly plainField?: FieldInput;
  readonly allowNull: boolean;
  private readonly source: FieldsetSource;

  constructor(
    nested: FieldsetSource,
    plainKey: string | null,
    options: OptionalNestedFieldOptions = {}
  ) {
    const { plainField, allowNull = false, ...rest } = options;
    super(rest);
    this.source = nested;
    this.plainKey = plainKey;
    this.plainField = plainField;
    this.allowNull = allowNull;
  }

  /**
   * Field rendering the unembedded form, or null when no plain key is set.
   */
  keyField(): ObjectMemberField | null {
    if (this.plainKey === null) {
      return null;
    }
    return new ObjectMemberField(this.plainKey, {
      default: this.default,
      attribute: this.attribute,
      memberField: this.plainField,
    });
  }

  nestedFieldset(): FieldsetSchema {
    const resolved = typeof this.source === 'function' ? this.source() : this.source;
    return 'build' in resolved ? resolved.build() : resolved;
  }

  nestedOptions(): NestedRenderOptions {
    return {
      attribute: this.attribute,
      default: this.default,
      allowNull: this.allowNull,
    };
  }
}
