import { SchemaDeclarationException } from '../core/exceptions.js';
import type { OptionalNestedField } from '../fields/optional-nested.js';
import { resolveMeta } from './meta.js';
import { buildRenderPlan } from './plan.js';
import type {
  FieldDeclaration,
  FieldsetLayer,
  FieldsetMeta,
  RenderPlan,
} from './types.js';

type PathKind = 'all' | 'nested';

function nestableOf(declaration: FieldDeclaration): OptionalNestedField | undefined {
  switch (declaration.kind) {
    case 'nested':
      return declaration.field;
    case 'nested-list':
      return declaration.container;
    default:
      return undefined;
  }
}

/**
 * The resolved, immutable form of a fieldset.
 *
 * Built by `FieldsetBuilder.build()` from its inheritance layers. Path
 * vocabularies are computed on first access and memoized; to change a
 * fieldset, change its builder and build again.
 */
export class FieldsetSchema {
  readonly name: string;
  readonly layers: readonly FieldsetLayer[];
  readonly meta: Readonly<FieldsetMeta>;
  /** Output name to declaration, in declaration order */
  readonly fields: ReadonlyMap<string, FieldDeclaration>;
  /** Names of nested (embeddable) fields */
  readonly nestedNames: readonly string[];

  private readonly defaultFields: ReadonlySet<string>;
  private readonly defaultEmbed: ReadonlySet<string>;
  private readonly paths = new Map<PathKind, ReadonlySet<string>>();
  private readonly computing = new Set<PathKind>();
  private readonly resolved = new Map<string, FieldsetSchema>();

  constructor(name: string, layers: readonly FieldsetLayer[]) {
    this.name = name;
    this.layers = layers;
    this.meta = Object.freeze(resolveMeta(name, layers.map((layer) => layer.meta)));

    const fields = new Map<string, FieldDeclaration>();
    for (const layer of layers) {
      for (const [fieldName, declaration] of layer.fields) {
        fields.set(fieldName, declaration);
      }
    }
    this.fields = fields;
    this.nestedNames = [...fields]
      .filter(([, declaration]) => declaration.kind !== 'scalar')
      .map(([fieldName]) => fieldName);

    this.defaultFields = new Set(this.meta.defaultFields ?? fields.keys());
    this.defaultEmbed = new Set(this.meta.defaultEmbed ?? this.nestedNames);
  }

  get fieldNames(): string[] {
    return [...this.fields.keys()];
  }

  /**
   * Every selectable path: field names plus `name.child` for each path of
   * each nested fieldset.
   */
  get allFieldPaths(): ReadonlySet<string> {
    return this.getPaths('all');
  }

  /**
   * Every embeddable path, built the same way from nested names only.
   */
  get nestedFieldPaths(): ReadonlySet<string> {
    return this.getPaths('nested');
  }

  defaultFieldSet(): ReadonlySet<string> {
    return this.defaultFields;
  }

  defaultEmbedSet(): ReadonlySet<string> {
    return this.defaultEmbed;
  }

  getField(name: string): FieldDeclaration | undefined {
    return this.fields.get(name);
  }

  isNested(name: string): boolean {
    const declaration = this.fields.get(name);
    return declaration !== undefined && declaration.kind !== 'scalar';
  }

  /**
   * Schema rendering the nested field `name`, or undefined for scalars.
   *
   * A builder or thunk source is resolved on first use and pinned to this
   * schema, so paths and render plans always see the same nested fieldset.
   * Invalidate and rebuild the parent to pick up later changes to the nested
   * builder.
   */
  nestedFieldset(name: string): FieldsetSchema | undefined {
    const cached = this.resolved.get(name);
    if (cached) {
      return cached;
    }
    const declaration = this.fields.get(name);
    const nested = declaration ? nestableOf(declaration)?.nestedFieldset() : undefined;
    if (nested) {
      this.resolved.set(name, nested);
    }
    return nested;
  }

  /**
   * Throws when this fieldset nests itself, directly or through other
   * fieldsets. Such a fieldset has no finite path vocabulary.
   */
  assertAcyclic(): void {
    this.getPaths('nested');
  }

  /**
   * Render plan for the given selection; empty selections use the defaults.
   */
  plan(selectedFields?: Iterable<string> | null, selectedEmbed?: Iterable<string> | null): RenderPlan {
    return buildRenderPlan(this, selectedFields, selectedEmbed);
  }

  private getPaths(kind: PathKind): ReadonlySet<string> {
    const cached = this.paths.get(kind);
    if (cached) {
      return cached;
    }
    if (this.computing.has(kind)) {
      throw new SchemaDeclarationException(
        `Fieldset "${this.name}" nests itself; its field paths are unbounded`,
        { fieldset: this.name }
      );
    }

    this.computing.add(kind);
    try {
      const paths = new Set<string>(kind === 'all' ? this.fields.keys() : this.nestedNames);
      for (const name of this.nestedNames) {
        const nested = this.nestedFieldset(name);
        if (!nested) continue;
        const childPaths = kind === 'all' ? nested.allFieldPaths : nested.nestedFieldPaths;
        for (const child of childPaths) {
          paths.add(`${name}.${child}`);
        }
      }
      this.paths.set(kind, paths);
      return paths;
    } finally {
      this.computing.delete(kind);
    }
  }
}
