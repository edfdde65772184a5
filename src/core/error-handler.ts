import type { Context, Env, ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { ApiException, InputValidationException } from './exceptions.js';
import { getRequestId } from './context-helpers.js';
import { getLogger } from './logger.js';

/**
 * Error mapper: transforms unknown errors to ApiException.
 * Return undefined to skip this mapper and try the next one.
 */
export type ErrorMapper<E extends Env = Env> = (
  error: Error,
  ctx: Context<E>
) => ApiException | undefined | Promise<ApiException | undefined>;

/**
 * Hook: called after mapping, before response (for logging/Sentry).
 * Hooks are fire-and-forget - errors are caught and optionally reported.
 */
export type ErrorHook<E extends Env = Env> = (
  error: Error,
  ctx: Context<E>,
  apiException: ApiException
) => void | Promise<void>;

/**
 * Configuration options for the error handler factory.
 */
export interface ErrorHandlerConfig<E extends Env = Env> {
  /** Custom error mappers - tried in order, first non-undefined wins */
  mappers?: ErrorMapper<E>[];
  /** Error reporting hooks (logging, Sentry, etc.) */
  hooks?: ErrorHook<E>[];
  /** Include requestId in error response if available (default: true) */
  includeRequestId?: boolean;
  /** Include stack trace in error response (default: false, never enable in production!) */
  includeStackTrace?: boolean;
  /** Default error code for unmapped errors (default: 'INTERNAL_ERROR') */
  defaultErrorCode?: string;
  /** Default error message for unmapped errors (default: 'An internal error occurred') */
  defaultErrorMessage?: string;
  /** Log unmapped errors through the configured logger (default: true) */
  logUnmappedErrors?: boolean;
  /** Called when a hook throws an error */
  onHookError?: (hookError: Error, originalError: Error, ctx: Context<E>) => void;
}

/**
 * Built-in mapper for ZodError to InputValidationException.
 */
export const zodErrorMapper = (error: Error): ApiException | undefined => {
  if (error instanceof ZodError) {
    return InputValidationException.fromZodError(error);
  }
  return undefined;
};

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Creates a standardized global error handler for Hono apps.
 *
 * Selection errors raised by `marshalWithFieldset()` are `ApiException`s and
 * pass straight through; anything else goes through the mappers and falls
 * back to a generic 500.
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.onError(createErrorHandler({
 *   hooks: [
 *     (error, ctx, apiException) => {
 *       if (apiException.status >= 500) {
 *         Sentry.captureException(error);
 *       }
 *     },
 *   ],
 * }));
 * ```
 */
export function createErrorHandler<E extends Env = Env>(
  config: ErrorHandlerConfig<E> = {}
): ErrorHandler<E> {
  const {
    mappers = [],
    hooks = [],
    includeRequestId = true,
    includeStackTrace = false,
    defaultErrorCode = 'INTERNAL_ERROR',
    defaultErrorMessage = 'An internal error occurred',
    logUnmappedErrors = true,
    onHookError,
  } = config;

  const allMappers: ErrorMapper<E>[] = [...mappers, zodErrorMapper];

  const mapError = async (err: Error, ctx: Context<E>): Promise<ApiException> => {
    if (err instanceof ApiException) {
      return err;
    }
    // Plain HTTPException from Hono's built-in middleware
    if (err instanceof HTTPException) {
      return new ApiException(err.message, err.status, 'HTTP_ERROR');
    }

    for (const mapper of allMappers) {
      try {
        const mapped = await mapper(err, ctx);
        if (mapped) {
          return mapped;
        }
      } catch (mapperErr) {
        getLogger().warn('Error mapper failed', { error: toError(mapperErr).message });
      }
    }

    if (logUnmappedErrors) {
      getLogger().error('Unmapped error', { error: err.message, name: err.name });
    }
    return new ApiException(defaultErrorMessage, 500, defaultErrorCode);
  };

  return async (err: Error, ctx: Context<E>): Promise<Response> => {
    const apiException = await mapError(err, ctx);

    // Hooks are fire-and-forget
    for (const hook of hooks) {
      try {
        const result = hook(err, ctx, apiException);
        if (result instanceof Promise) {
          result.catch((hookErr: unknown) => {
            onHookError?.(toError(hookErr), err, ctx);
          });
        }
      } catch (hookErr) {
        onHookError?.(toError(hookErr), err, ctx);
      }
    }

    const body = apiException.toJSON();
    const error: Record<string, unknown> = { ...body.error };

    if (includeRequestId) {
      const requestId = getRequestId(ctx);
      if (requestId) {
        error.requestId = requestId;
      }
    }

    if (includeStackTrace && err.stack) {
      error.stack = err.stack;
    }

    return ctx.json({ success: false as const, error }, apiException.status);
  };
}
