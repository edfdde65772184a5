import { z } from 'zod';
import { SchemaDeclarationException } from '../core/exceptions.js';
import type { FieldsetMeta, FieldsetMetaInput } from './types.js';

export const DEFAULT_META: Readonly<FieldsetMeta> = Object.freeze({
  fieldsParam: 'fields',
  embedParam: 'embedd',
  defaultFields: null,
  defaultEmbed: null,
});

const paramName = z.string().min(1).regex(/^[^,.]+$/, 'must not contain "," or "."');

export const FieldsetMetaSchema = z.strictObject({
  fieldsParam: paramName.optional(),
  embedParam: paramName.optional(),
  defaultFields: z.array(z.string().min(1)).nullable().optional(),
  defaultEmbed: z.array(z.string().min(1)).nullable().optional(),
});

/**
 * Validates one meta layer.
 */
export function validateMeta(fieldset: string, meta: unknown): FieldsetMetaInput {
  const result = FieldsetMetaSchema.safeParse(meta);
  if (!result.success) {
    throw new SchemaDeclarationException(`Invalid meta for fieldset "${fieldset}"`, {
      fieldset,
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  return result.data;
}

/**
 * Merges meta layers, least derived first, over the defaults.
 * `undefined` leaves a key untouched; `null` resets it to "everything".
 *
 * @example
 * ```ts
 * resolveMeta('Admin', [{ fieldsParam: 'only' }, { defaultEmbed: [] }]);
 * // { fieldsParam: 'only', embedParam: 'embedd', defaultFields: null, defaultEmbed: [] }
 * ```
 */
export function resolveMeta(
  fieldset: string,
  layers: readonly FieldsetMetaInput[]
): FieldsetMeta {
  const merged = layers.reduce<FieldsetMeta>(
    (acc, layer) => ({
      fieldsParam: layer.fieldsParam ?? acc.fieldsParam,
      embedParam: layer.embedParam ?? acc.embedParam,
      defaultFields: layer.defaultFields !== undefined ? layer.defaultFields : acc.defaultFields,
      defaultEmbed: layer.defaultEmbed !== undefined ? layer.defaultEmbed : acc.defaultEmbed,
    }),
    { ...DEFAULT_META }
  );

  if (merged.fieldsParam === merged.embedParam) {
    throw new SchemaDeclarationException(
      `Fieldset "${fieldset}" uses "${merged.fieldsParam}" for both fields and embeds`,
      { fieldset, param: merged.fieldsParam }
    );
  }
  return merged;
}
