import type { Field, ListField } from '../fields/raw.js';
import type { ObjectMemberField } from '../fields/object-member.js';
import type { NestedRenderOptions, OptionalNestedField } from '../fields/optional-nested.js';
import type { AttributeSource } from '../fields/types.js';

// ============================================================================
// Meta
// ============================================================================

/**
 * Per-fieldset options. Layers merge key by key; the most derived wins.
 */
export interface FieldsetMeta {
  /** Query parameter selecting fields. @default 'fields' */
  fieldsParam: string;
  /** Query parameter selecting embedded fieldsets. @default 'embedd' */
  embedParam: string;
  /**
   * Fields rendered when the caller selects none.
   * `null` means every declared field; `[]` means none.
   */
  defaultFields: string[] | null;
  /**
   * Nested fields embedded when the caller selects none.
   * `null` means every nested field; `[]` means none.
   */
  defaultEmbed: string[] | null;
}

export type FieldsetMetaInput = Partial<FieldsetMeta>;

// ============================================================================
// Declarations
// ============================================================================

/**
 * A declared field, classified once when the fieldset is built.
 */
export type FieldDeclaration =
  | { kind: 'scalar'; field: Field }
  | { kind: 'nested'; field: OptionalNestedField }
  | { kind: 'nested-list'; field: ListField; container: OptionalNestedField };

/**
 * One level of a fieldset's inheritance chain.
 */
export interface FieldsetLayer {
  readonly name: string;
  readonly fields: ReadonlyMap<string, FieldDeclaration>;
  readonly meta: Readonly<FieldsetMetaInput>;
}

// ============================================================================
// Render Plan
// ============================================================================

export type RenderPlanEntry =
  /** Scalar field rendered as declared */
  | { kind: 'field'; field: Field }
  /** Unembedded nested field; null when it has no plain key */
  | { kind: 'reference'; field: ObjectMemberField | null }
  /** Unembedded list of nested fields: the plain key of each element */
  | { kind: 'reference-list'; field: ListField | null }
  | { kind: 'nested'; plan: RenderPlan; options: NestedRenderOptions }
  | {
      kind: 'nested-list';
      plan: RenderPlan;
      options: NestedRenderOptions;
      attribute?: AttributeSource;
      default?: unknown;
    };

/**
 * Output name to rendering instruction, built per request.
 */
export type RenderPlan = Record<string, RenderPlanEntry>;
