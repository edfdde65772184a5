/**
 * Builder API for declaring fieldsets.
 *
 * @example
 * ```ts
 * import { fieldset, fields } from 'hono-fieldsets';
 *
 * const UserFieldset = fieldset('User')
 *   .field('id', fields.integer())
 *   .field('email', fields.string())
 *   .build();
 *
 * const PostFieldset = fieldset('Post')
 *   .field('id', fields.integer())
 *   .field('title', fields.string())
 *   .nested('author', UserFieldset, 'id')
 *   .nestedList('comments', () => CommentFieldset, 'id')
 *   .meta({ defaultEmbed: [] })
 *   .build();
 * ```
 */

import { SchemaDeclarationException } from '../core/exceptions.js';
import { getLogger } from '../core/logger.js';
import { ListField, type Field } from '../fields/raw.js';
import {
  OptionalNestedField,
  type OptionalNestedFieldOptions,
} from '../fields/optional-nested.js';
import type { FieldInput, FieldOptions, FieldsetSource } from '../fields/types.js';
import { resolveField } from '../fields/utils.js';
import { validateMeta } from './meta.js';
import { FieldsetSchema } from './schema.js';
import type { FieldDeclaration, FieldsetLayer, FieldsetMetaInput } from './types.js';

/** Anything a fieldset can extend. */
export type FieldsetParent = FieldsetSchema | FieldsetBuilder;

// Names that would corrupt a plain-object render plan
const RESERVED_NAMES = new Set(['__proto__']);

function classify(field: Field): FieldDeclaration {
  if (field instanceof OptionalNestedField) {
    return { kind: 'nested', field };
  }
  if (field instanceof ListField && field.container instanceof OptionalNestedField) {
    return { kind: 'nested-list', field, container: field.container };
  }
  return { kind: 'scalar', field };
}

function assertFieldName(fieldset: string, name: string): void {
  if (name === '' || name.includes('.') || name.includes(',') || RESERVED_NAMES.has(name)) {
    throw new SchemaDeclarationException(
      `Invalid field name "${name}" in fieldset "${fieldset}"`,
      { fieldset, field: name }
    );
  }
}

/**
 * Layers of `parents` in merge order. Parents listed first take precedence,
 * and a layer shared by several parents is applied once, at its first
 * position, so a parent always overrides the layers it extends.
 */
function inheritedLayers(parents: readonly FieldsetParent[]): FieldsetLayer[] {
  const layers: FieldsetLayer[] = [];
  const seen = new Set<FieldsetLayer>();
  for (const parent of [...parents].reverse()) {
    const schema = parent instanceof FieldsetBuilder ? parent.build() : parent;
    for (const layer of schema.layers) {
      if (!seen.has(layer)) {
        seen.add(layer);
        layers.push(layer);
      }
    }
  }
  return layers;
}

/**
 * Chainable fieldset declaration. `build()` returns a cached schema until
 * the declaration changes.
 */
export class FieldsetBuilder {
  private _fields = new Map<string, Field>();
  private _meta: FieldsetMetaInput = {};
  private _parents: FieldsetParent[] = [];
  private _schema?: FieldsetSchema;

  constructor(readonly name: string) {}

  /** Declare (or redeclare) a field */
  field(name: string, field: FieldInput): this {
    this._fields.set(name, resolveField(field));
    return this.invalidate();
  }

  /** Declare several fields, in object order */
  fields(fields: Record<string, FieldInput>): this {
    for (const [name, field] of Object.entries(fields)) {
      this._fields.set(name, resolveField(field));
    }
    return this.invalidate();
  }

  /** Declare a nested fieldset, rendered as `plainKey` unless embedded */
  nested(
    name: string,
    nested: FieldsetSource,
    plainKey: string | null,
    options?: OptionalNestedFieldOptions
  ): this {
    return this.field(name, new OptionalNestedField(nested, plainKey, options));
  }

  /** Declare a list of nested fieldsets */
  nestedList(
    name: string,
    nested: FieldsetSource,
    plainKey: string | null,
    options: OptionalNestedFieldOptions & { list?: FieldOptions } = {}
  ): this {
    const { list, ...nestedOptions } = options;
    return this.field(
      name,
      new ListField(new OptionalNestedField(nested, plainKey, nestedOptions), list)
    );
  }

  removeField(name: string): this {
    this._fields.delete(name);
    return this.invalidate();
  }

  /** Merge options into this fieldset's own meta layer */
  meta(meta: FieldsetMetaInput): this {
    this._meta = { ...this._meta, ...meta };
    return this.invalidate();
  }

  /**
   * Inherit fields and meta. With several parents the first listed wins.
   */
  extends(...parents: FieldsetParent[]): this {
    this._parents = parents;
    return this.invalidate();
  }

  /** Drop the cached schema; the next `build()` recomputes it */
  invalidate(): this {
    this._schema = undefined;
    return this;
  }

  build(): FieldsetSchema {
    if (!this._schema) {
      this._schema = new FieldsetSchema(this.name, [
        ...inheritedLayers(this._parents),
        this.ownLayer(),
      ]);
    }
    return this._schema;
  }

  private ownLayer(): FieldsetLayer {
    const declarations = new Map<string, FieldDeclaration>();
    for (const [name, field] of this._fields) {
      assertFieldName(this.name, name);
      if (name.startsWith('_')) {
        getLogger().warn('Skipping private field name', { fieldset: this.name, field: name });
        continue;
      }
      const declaration = classify(field);
      if (declaration.kind !== 'scalar') {
        const nestable = declaration.kind === 'nested' ? declaration.field : declaration.container;
        if (nestable.plainKey === null) {
          getLogger().warn('Nested field has no plain key and renders null unless embedded', {
            fieldset: this.name,
            field: name,
          });
        }
      }
      declarations.set(name, declaration);
    }

    return Object.freeze({
      name: this.name,
      fields: declarations,
      meta: Object.freeze(validateMeta(this.name, this._meta)),
    });
  }
}

/**
 * Start a fieldset declaration.
 */
export function fieldset(name: string): FieldsetBuilder {
  return new FieldsetBuilder(name);
}

/**
 * Declarative fieldset definition.
 */
export interface FieldsetConfig {
  name: string;
  fields: Record<string, FieldInput>;
  meta?: FieldsetMetaInput;
  extends?: FieldsetParent | FieldsetParent[];
}

/**
 * Define a fieldset from a single config object.
 *
 * @example
 * ```ts
 * const UserFieldset = defineFieldset({
 *   name: 'User',
 *   fields: {
 *     id: fields.integer(),
 *     email: fields.string(),
 *     team: fields.optionalNested(() => TeamFieldset, 'id'),
 *   },
 *   meta: { defaultFields: ['id', 'email'] },
 * });
 * ```
 */
export function defineFieldset(config: FieldsetConfig): FieldsetSchema {
  const builder = new FieldsetBuilder(config.name).fields(config.fields);
  if (config.meta) {
    builder.meta(config.meta);
  }
  if (config.extends) {
    builder.extends(...(Array.isArray(config.extends) ? config.extends : [config.extends]));
  }
  return builder.build();
}
