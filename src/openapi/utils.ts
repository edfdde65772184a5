import { z } from 'zod';
import type { Hook } from '@hono/zod-openapi';
import type { Env } from 'hono';
import { InputValidationException } from '../core/exceptions.js';
import type { FieldsetSchema } from '../fieldset/schema.js';

/**
 * Creates a JSON content type definition for OpenAPI responses.
 *
 * @example
 * ```ts
 * responses: {
 *   400: jsonContent(SelectionErrorSchema, 'Unknown field path'),
 * }
 * ```
 */
export function jsonContent<T extends z.ZodType>(
  schema: T,
  description: string
): {
  content: { 'application/json': { schema: T } };
  description: string;
} {
  return {
    content: {
      'application/json': { schema },
    },
    description,
  };
}

function describePaths(paths: ReadonlySet<string>): string {
  return [...paths].sort().join(', ');
}

/**
 * Query schema documenting a fieldset's selection parameters, for
 * `@hono/zod-openapi` route definitions. Values stay plain strings;
 * `marshalWithFieldset()` validates them.
 *
 * @example
 * ```ts
 * const route = createRoute({
 *   method: 'get',
 *   path: '/users/{id}',
 *   request: { query: fieldsetQuerySchema(UserFieldset) },
 *   responses: { 200: { description: 'User' }, 400: selectionErrorResponse() },
 * });
 * ```
 */
export function fieldsetQuerySchema(schema: FieldsetSchema) {
  const shape: Record<string, z.ZodOptional<z.ZodString>> = {
    [schema.meta.fieldsParam]: z
      .string()
      .optional()
      .describe(`Comma-separated fields to return. One of: ${describePaths(schema.allFieldPaths)}`),
    [schema.meta.embedParam]: z
      .string()
      .optional()
      .describe(`Comma-separated nested fields to embed. One of: ${describePaths(schema.nestedFieldPaths)}`),
  };
  return z.object(shape);
}

/**
 * Body of a rejected selection.
 */
export const SelectionErrorSchema = z.object({
  success: z.literal(false),
  error: z.object({
    code: z.enum(['INVALID_SELECTION', 'TYPE_MISMATCH']),
    message: z.string(),
    details: z
      .object({
        param: z.string().optional(),
        unknown: z.array(z.string()).optional(),
      })
      .optional(),
  }),
});

export function selectionErrorResponse(description: string = 'Unknown field path in selection') {
  return jsonContent(SelectionErrorSchema, description);
}

/**
 * Default hook for `OpenAPIHono` that raises request validation failures as
 * `InputValidationException`, so `createErrorHandler()` renders them like
 * every other API error.
 *
 * @example
 * ```ts
 * const app = new OpenAPIHono({ defaultHook: openApiValidationHook });
 * app.onError(createErrorHandler());
 * ```
 */
export const openApiValidationHook: Hook<unknown, Env, '', unknown> = (result) => {
  if (!result.success) {
    throw InputValidationException.fromZodError(result.error);
  }
};
