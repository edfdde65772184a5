import type { Context, Env } from 'hono';
import type { FieldSelection } from '../selection/types.js';

/**
 * Type-safe context variable accessors.
 */

/**
 * Safely retrieves a variable from the Hono context.
 * Returns undefined if the variable doesn't exist or context is invalid.
 *
 * @example
 * ```ts
 * const requestId = getContextVar<string>(ctx, 'requestId');
 * ```
 */
export function getContextVar<T>(ctx: unknown, key: string): T | undefined {
  const ctxObj = ctx as { var?: Record<string, unknown> };
  return ctxObj?.var?.[key] as T | undefined;
}

/**
 * Type-safe setter for context variables in middleware.
 * Used internally to set variables when the generic Env type
 * may not include the specific variable keys.
 */
export function setContextVar<E extends Env>(ctx: Context<E>, key: string, value: unknown): void {
  (ctx as unknown as { set: (key: string, value: unknown) => void }).set(key, value);
}

/**
 * Retrieves the request ID from context.
 * Set by Hono's `requestId()` middleware.
 */
export function getRequestId<E extends Env>(ctx: Context<E>): string | undefined {
  return getContextVar<string>(ctx, 'requestId');
}

const FIELD_SELECTION_KEY = 'fieldSelection';

/**
 * Retrieves the parsed field selection of the current request.
 * Set by `marshalWithFieldset()` before the handler runs, so handlers can
 * narrow their queries to what the caller asked for.
 *
 * @example
 * ```ts
 * const getUser = marshalWithFieldset(UserFieldset)((c) => {
 *   const selection = getFieldSelection(c);
 *   const withPosts = selection?.embed.has('posts') ?? false;
 *   return loadUser(c.req.param('id'), { withPosts });
 * });
 * ```
 */
export function getFieldSelection<E extends Env>(ctx: Context<E>): FieldSelection | undefined {
  return getContextVar<FieldSelection>(ctx, FIELD_SELECTION_KEY);
}

export function setFieldSelection<E extends Env>(ctx: Context<E>, selection: FieldSelection): void {
  setContextVar(ctx, FIELD_SELECTION_KEY, selection);
}
