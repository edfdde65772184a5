import { MarshallingException } from '../core/exceptions.js';
import type { AttributeSource, FieldInput, FieldOptions } from './types.js';
import { getValue, isNil, resolveField } from './utils.js';

/**
 * Base field: copies the source value as-is.
 *
 * Subclasses override `format()` to convert the raw value into its output
 * form. `output()` handles the lookup and the missing-value default.
 */
export class Field {
  readonly attribute?: AttributeSource;
  readonly default: unknown;

  constructor(options: FieldOptions = {}) {
    this.attribute = options.attribute;
    this.default = options.default;
  }

  format(value: unknown): unknown {
    return value;
  }

  /** Value rendered when the source value is null or missing. */
  formatMissing(): unknown {
    return isNil(this.default) ? null : this.format(this.default);
  }

  /**
   * Render this field for `key` of `source`.
   */
  output(key: string, source: unknown): unknown {
    const value = getValue(this.attribute ?? key, source);
    if (isNil(value)) {
      return this.formatMissing();
    }
    return this.format(value);
  }
}

export class StringField extends Field {
  format(value: unknown): string {
    return String(value);
  }
}

function toNumber(value: unknown, kind: string): number {
  const parsed =
    typeof value === 'number'
      ? value
      : typeof value === 'string' && value.trim() !== ''
        ? Number(value)
        : typeof value === 'boolean' || typeof value === 'bigint'
          ? Number(value)
          : Number.NaN;

  if (!Number.isFinite(parsed)) {
    throw new MarshallingException(`Cannot format ${JSON.stringify(String(value))} as ${kind}`);
  }
  return parsed;
}

/**
 * Integer output; truncates fractions. Missing values render `0` unless a
 * different default is given.
 */
export class IntegerField extends Field {
  constructor(options: FieldOptions = {}) {
    super({ default: 0, ...options });
  }

  format(value: unknown): number {
    return Math.trunc(toNumber(value, 'integer'));
  }
}

export class FloatField extends Field {
  format(value: unknown): number {
    return toNumber(value, 'float');
  }
}

export class BooleanField extends Field {
  format(value: unknown): boolean {
    return Boolean(value);
  }
}

export type DateTimeFormat = 'iso8601' | 'rfc822';

export interface DateTimeFieldOptions extends FieldOptions {
  /** @default 'iso8601' */
  format?: DateTimeFormat;
}

/**
 * Date output from a Date, an epoch-milliseconds number or a parseable string.
 */
export class DateTimeField extends Field {
  readonly dateFormat: DateTimeFormat;

  constructor(options: DateTimeFieldOptions = {}) {
    const { format = 'iso8601', ...rest } = options;
    super(rest);
    this.dateFormat = format;
  }

  format(value: unknown): string {
    const date =
      value instanceof Date
        ? value
        : typeof value === 'string' || typeof value === 'number'
          ? new Date(value)
          : undefined;

    if (!date || Number.isNaN(date.getTime())) {
      throw new MarshallingException(`Cannot format ${JSON.stringify(String(value))} as a date`);
    }
    return this.dateFormat === 'rfc822' ? date.toUTCString() : date.toISOString();
  }
}

export interface NestedFieldOptions extends FieldOptions {
  /** Render `null` instead of the structure's defaults for a missing value */
  allowNull?: boolean;
}

/**
 * A fixed sub-mapping built from a record of fields.
 *
 * @example
 * ```ts
 * const address = new NestedField({
 *   street: new StringField(),
 *   city: new StringField(),
 * }, { allowNull: true });
 * ```
 */
export class NestedField extends Field {
  readonly structure: Readonly<Record<string, Field>>;
  readonly allowNull: boolean;

  constructor(structure: Record<string, FieldInput>, options: NestedFieldOptions = {}) {
    const { allowNull = false, ...rest } = options;
    super(rest);
    this.allowNull = allowNull;
    this.structure = Object.fromEntries(
      Object.entries(structure).map(([name, input]) => [name, resolveField(input)])
    );
  }

  format(value: unknown): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [name, field] of Object.entries(this.structure)) {
      result[name] = field.output(name, value);
    }
    return result;
  }

  formatMissing(): unknown {
    if (this.allowNull) {
      return null;
    }
    if (!isNil(this.default)) {
      return this.default;
    }
    // Every member at its own default
    return this.format(null);
  }
}

/**
 * A list of values, each rendered by the container field. A single
 * non-list value renders as a one-element list.
 */
export class ListField extends Field {
  readonly container: Field;

  constructor(container: FieldInput, options: FieldOptions = {}) {
    super(options);
    this.container = resolveField(container);
  }

  format(value: unknown): unknown[] {
    const items = Array.isArray(value)
      ? value
      : value instanceof Set
        ? [...value]
        : [value];

    return items.map((item: unknown) =>
      isNil(item) ? this.container.formatMissing() : this.container.format(item)
    );
  }

  formatMissing(): unknown {
    return isNil(this.default) ? null : this.default;
  }
}
