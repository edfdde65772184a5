import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { requestId } from 'hono/request-id';
import { z, ZodError } from 'zod';
import {
  createErrorHandler,
  zodErrorMapper,
  setLogger,
  resetLogger,
  ApiException,
  InputValidationException,
  InvalidSelectionException,
  SchemaDeclarationException,
  type ErrorMapper,
  type ErrorHook,
} from '../src/index.js';

const ErrorBodySchema = z.object({
  success: z.literal(false),
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.unknown().optional(),
    requestId: z.string().optional(),
    stack: z.string().optional(),
  }),
});

async function readError(res: Response) {
  return ErrorBodySchema.parse(await res.json());
}

const logger = { warn: vi.fn(), error: vi.fn() };

beforeEach(() => {
  logger.warn.mockReset();
  logger.error.mockReset();
  setLogger(logger);
});

afterEach(() => {
  resetLogger();
});

// ============================================================================
// Built-in Mapper Tests
// ============================================================================

describe('zodErrorMapper', () => {
  it('should map ZodError to InputValidationException', () => {
    const result = z.object({ name: z.string() }).safeParse({ name: 123 });
    expect(result.success).toBe(false);

    const mapped = result.error ? zodErrorMapper(result.error) : undefined;

    expect(mapped).toBeInstanceOf(InputValidationException);
    expect(mapped?.status).toBe(400);
    expect(mapped?.code).toBe('VALIDATION_ERROR');
    expect(mapped?.details).toEqual([
      { path: 'name', message: expect.any(String), code: 'invalid_type' },
    ]);
  });

  it('should return undefined for non-ZodError', () => {
    expect(zodErrorMapper(new Error('Regular error'))).toBeUndefined();
  });

  it('should map a ZodError built by hand', () => {
    const error = new ZodError([]);
    expect(zodErrorMapper(error)).toBeInstanceOf(InputValidationException);
  });
});

// ============================================================================
// Error Handler Factory Tests
// ============================================================================

describe('createErrorHandler', () => {
  describe('basic error handling', () => {
    it('should pass through ApiException directly', async () => {
      const app = new Hono();
      app.onError(createErrorHandler());
      app.get('/test', () => {
        throw new InvalidSelectionException(['secret'], 'fields');
      });

      const res = await app.request('/test');

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        success: false,
        error: {
          code: 'INVALID_SELECTION',
          message: 'Unknown fields: secret',
          details: { param: 'fields', unknown: ['secret'] },
        },
      });
    });

    it('should report declaration errors as 500', async () => {
      const app = new Hono();
      app.onError(createErrorHandler());
      app.get('/test', () => {
        throw new SchemaDeclarationException('Invalid field name "a.b" in fieldset "Bad"');
      });

      const res = await app.request('/test');
      const body = await readError(res);

      expect(res.status).toBe(500);
      expect(body.error.code).toBe('SCHEMA_DECLARATION_ERROR');
      expect(logger.error).not.toHaveBeenCalled();
    });

    it('should convert plain HTTPExceptions', async () => {
      const app = new Hono();
      app.onError(createErrorHandler());
      app.get('/test', () => {
        throw new HTTPException(401, { message: 'Unauthorized' });
      });

      const res = await app.request('/test');

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({
        success: false,
        error: { code: 'HTTP_ERROR', message: 'Unauthorized' },
      });
    });

    it('should convert unknown errors to 500 and log them', async () => {
      const app = new Hono();
      app.onError(createErrorHandler());
      app.get('/test', () => {
        throw new TypeError('Something went wrong');
      });

      const res = await app.request('/test');

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        success: false,
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An internal error occurred',
        },
      });
      expect(logger.error).toHaveBeenCalledWith('Unmapped error', {
        error: 'Something went wrong',
        name: 'TypeError',
      });
    });

    it('should not log unmapped errors when disabled', async () => {
      const app = new Hono();
      app.onError(createErrorHandler({ logUnmappedErrors: false }));
      app.get('/test', () => {
        throw new Error('Quiet');
      });

      await app.request('/test');
      expect(logger.error).not.toHaveBeenCalled();
    });

    it('should use custom default error code and message', async () => {
      const app = new Hono();
      app.onError(createErrorHandler({
        defaultErrorCode: 'SERVER_ERROR',
        defaultErrorMessage: 'Something unexpected happened',
      }));
      app.get('/test', () => {
        throw new Error('Internal failure');
      });

      const res = await app.request('/test');
      const body = await readError(res);

      expect(res.status).toBe(500);
      expect(body.error.code).toBe('SERVER_ERROR');
      expect(body.error.message).toBe('Something unexpected happened');
    });
  });

  describe('error mappers', () => {
    it('should use custom mapper to convert errors', async () => {
      class LookupError extends Error {
        constructor(readonly key: string) {
          super(`No record for ${key}`);
        }
      }

      const lookupMapper: ErrorMapper = (error) => {
        if (error instanceof LookupError) {
          return new ApiException(error.message, 404, 'NOT_FOUND', { key: error.key });
        }
        return undefined;
      };

      const app = new Hono();
      app.onError(createErrorHandler({ mappers: [lookupMapper] }));
      app.get('/test', () => {
        throw new LookupError('user:1');
      });

      const res = await app.request('/test');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: 'No record for user:1', details: { key: 'user:1' } },
      });
    });

    it('should try mappers in order and use first match', async () => {
      const mapper1 = vi.fn<ErrorMapper>().mockReturnValue(undefined);
      const mapper2 = vi.fn<ErrorMapper>().mockReturnValue(new ApiException('Gone', 410, 'GONE'));
      const mapper3 = vi.fn<ErrorMapper>().mockReturnValue(new ApiException('Conflict', 409, 'CONFLICT'));

      const app = new Hono();
      app.onError(createErrorHandler({ mappers: [mapper1, mapper2, mapper3] }));
      app.get('/test', () => {
        throw new Error('Test error');
      });

      const res = await app.request('/test');
      const body = await readError(res);

      expect(mapper1).toHaveBeenCalled();
      expect(mapper2).toHaveBeenCalled();
      expect(mapper3).not.toHaveBeenCalled();
      expect(res.status).toBe(410);
      expect(body.error.code).toBe('GONE');
    });

    it('should handle async mappers', async () => {
      const asyncMapper: ErrorMapper = async (error) => {
        await new Promise((r) => setTimeout(r, 10));
        if (error.message === 'async test') {
          return new ApiException('Async mapped', 422, 'ASYNC_ERROR');
        }
        return undefined;
      };

      const app = new Hono();
      app.onError(createErrorHandler({ mappers: [asyncMapper] }));
      app.get('/test', () => {
        throw new Error('async test');
      });

      const res = await app.request('/test');
      const body = await readError(res);

      expect(res.status).toBe(422);
      expect(body.error.code).toBe('ASYNC_ERROR');
    });

    it('should continue to next mapper if current throws', async () => {
      const throwingMapper: ErrorMapper = () => {
        throw new Error('Mapper failed');
      };
      const workingMapper: ErrorMapper = () => new ApiException('Working', 400, 'WORKING');

      const app = new Hono();
      app.onError(createErrorHandler({ mappers: [throwingMapper, workingMapper] }));
      app.get('/test', () => {
        throw new Error('Test');
      });

      const res = await app.request('/test');
      const body = await readError(res);

      expect(res.status).toBe(400);
      expect(body.error.code).toBe('WORKING');
      expect(logger.warn).toHaveBeenCalledWith('Error mapper failed', { error: 'Mapper failed' });
    });

    it('should use built-in zodErrorMapper', async () => {
      const schema = z.object({ name: z.string() });

      const app = new Hono();
      app.onError(createErrorHandler());
      app.post('/test', async (c) => {
        schema.parse(await c.req.json());
        return c.json({ ok: true });
      });

      const res = await app.request('/test', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ name: 123 }),
      });
      const body = await readError(res);

      expect(res.status).toBe(400);
      expect(body.error.code).toBe('VALIDATION_ERROR');
      expect(body.error.message).toBe('Validation failed');
      expect(body.error.details).toBeDefined();
    });
  });

  describe('error hooks', () => {
    it('should call hooks with error and apiException', async () => {
      const hook = vi.fn<ErrorHook>();
      const thrown = new InvalidSelectionException(['x']);

      const app = new Hono();
      app.onError(createErrorHandler({ hooks: [hook] }));
      app.get('/test', () => {
        throw thrown;
      });

      await app.request('/test');

      expect(hook).toHaveBeenCalledTimes(1);
      expect(hook).toHaveBeenCalledWith(thrown, expect.anything(), thrown);
    });

    it('should call multiple hooks', async () => {
      const hook1 = vi.fn<ErrorHook>();
      const hook2 = vi.fn<ErrorHook>();

      const app = new Hono();
      app.onError(createErrorHandler({ hooks: [hook1, hook2] }));
      app.get('/test', () => {
        throw new Error('Test');
      });

      await app.request('/test');

      expect(hook1).toHaveBeenCalled();
      expect(hook2).toHaveBeenCalled();
    });

    it('should handle async hooks', async () => {
      const results: string[] = [];
      const asyncHook: ErrorHook = async () => {
        await new Promise((r) => setTimeout(r, 10));
        results.push('async done');
      };

      const app = new Hono();
      app.onError(createErrorHandler({ hooks: [asyncHook] }));
      app.get('/test', () => {
        throw new Error('Test');
      });

      await app.request('/test');
      await new Promise((r) => setTimeout(r, 50));

      expect(results).toEqual(['async done']);
    });

    it('should catch and report hook errors', async () => {
      const hookError = new Error('Hook exploded');
      const original = new Error('Original error');
      const onHookError = vi.fn();
      const throwingHook: ErrorHook = () => {
        throw hookError;
      };

      const app = new Hono();
      app.onError(createErrorHandler({ hooks: [throwingHook], onHookError }));
      app.get('/test', () => {
        throw original;
      });

      const res = await app.request('/test');

      expect(res.status).toBe(500);
      expect(onHookError).toHaveBeenCalledWith(hookError, original, expect.anything());
    });

    it('should catch and report async hook errors', async () => {
      const onHookError = vi.fn();
      const asyncThrowingHook: ErrorHook = async () => {
        await new Promise((r) => setTimeout(r, 10));
        throw new Error('Async hook failed');
      };

      const app = new Hono();
      app.onError(createErrorHandler({ hooks: [asyncThrowingHook], onHookError }));
      app.get('/test', () => {
        throw new Error('Test');
      });

      await app.request('/test');
      await new Promise((r) => setTimeout(r, 50));

      expect(onHookError).toHaveBeenCalledTimes(1);
    });
  });

  describe('request ID inclusion', () => {
    it('should include requestId when the middleware is active', async () => {
      const app = new Hono();
      app.use('*', requestId());
      app.onError(createErrorHandler());
      app.get('/test', () => {
        throw new InvalidSelectionException(['x']);
      });

      const res = await app.request('/test', { headers: { 'X-Request-Id': 'req-123' } });
      const body = await readError(res);

      expect(body.error.requestId).toBe('req-123');
    });

    it('should not include requestId when disabled', async () => {
      const app = new Hono();
      app.use('*', requestId());
      app.onError(createErrorHandler({ includeRequestId: false }));
      app.get('/test', () => {
        throw new InvalidSelectionException(['x']);
      });

      const res = await app.request('/test', { headers: { 'X-Request-Id': 'req-123' } });
      const body = await readError(res);

      expect(body.error.requestId).toBeUndefined();
    });

    it('should not include requestId without the middleware', async () => {
      const app = new Hono();
      app.onError(createErrorHandler());
      app.get('/test', () => {
        throw new InvalidSelectionException(['x']);
      });

      const res = await app.request('/test');
      const body = await readError(res);

      expect(body.error.requestId).toBeUndefined();
    });
  });

  describe('stack traces', () => {
    it('should include the stack when enabled', async () => {
      const app = new Hono();
      app.onError(createErrorHandler({ includeStackTrace: true }));
      app.get('/test', () => {
        throw new InvalidSelectionException(['x']);
      });

      const body = await readError(await app.request('/test'));
      expect(body.error.stack).toContain('Unknown fields: x');
    });

    it('should omit the stack by default', async () => {
      const app = new Hono();
      app.onError(createErrorHandler());
      app.get('/test', () => {
        throw new InvalidSelectionException(['x']);
      });

      const body = await readError(await app.request('/test'));
      expect(body.error.stack).toBeUndefined();
    });
  });
});
