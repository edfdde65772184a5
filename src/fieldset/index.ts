export { FieldsetSchema } from './schema.js';
export { FieldsetBuilder, fieldset, defineFieldset } from './builder.js';
export type { FieldsetParent, FieldsetConfig } from './builder.js';
export { buildRenderPlan } from './plan.js';
export { DEFAULT_META, FieldsetMetaSchema, resolveMeta, validateMeta } from './meta.js';
export type {
  FieldsetMeta,
  FieldsetMetaInput,
  FieldDeclaration,
  FieldsetLayer,
  RenderPlan,
  RenderPlanEntry,
} from './types.js';
