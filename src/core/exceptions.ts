import { HTTPException } from 'hono/http-exception';
import type { ZodError } from 'zod';
import type { ContentfulStatusCode } from 'hono/utils/http-status';

/**
 * Valid HTTP status codes for API exceptions.
 * Uses Hono's ContentfulStatusCode which excludes informational codes (1xx).
 */
export type ApiStatusCode = ContentfulStatusCode;

/**
 * Base API exception that extends Hono's HTTPException.
 * Provides structured error responses with code, message, and optional details.
 *
 * @example
 * ```ts
 * throw new ApiException('Something went wrong', 500, 'INTERNAL_ERROR');
 * throw new ApiException('Invalid input', 400, 'VALIDATION_ERROR', { field: 'email' });
 * ```
 */
export class ApiException extends HTTPException {
  public readonly code: string;
  public readonly details?: unknown;

  constructor(
    message: string,
    status: ApiStatusCode = 500,
    code: string = 'INTERNAL_ERROR',
    details?: unknown
  ) {
    super(status, { message });
    this.name = 'ApiException';
    this.code = code;
    this.details = details;
  }

  /**
   * Converts the exception to a JSON response object.
   */
  toJSON() {
    const errorObj: { code: string; message: string; details?: unknown } = {
      code: this.code,
      message: this.message,
    };
    if (this.details) {
      errorObj.details = this.details;
    }
    return {
      success: false as const,
      error: errorObj,
    };
  }

  get statusCode(): ApiStatusCode {
    return this.status;
  }
}

export class InputValidationException extends ApiException {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'InputValidationException';
  }

  static fromZodError(error: ZodError): InputValidationException {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
      code: issue.code,
    }));

    return new InputValidationException('Validation failed', issues);
  }
}

/**
 * A selection value that is not a string.
 * Query decoders always hand over strings, so this signals a caller bug.
 */
export class SelectionTypeException extends ApiException {
  constructor(param?: string) {
    super(
      param ? `Selection "${param}" must be a string` : 'Selection must be a string',
      400,
      'TYPE_MISMATCH',
      param ? { param } : undefined
    );
    this.name = 'SelectionTypeException';
  }
}

/**
 * One or more requested field paths are not part of the fieldset.
 *
 * @example
 * ```ts
 * // GET /users?fields=id,secret
 * // 400 { success: false, error: { code: 'INVALID_SELECTION', message: 'Unknown fields: secret', ... } }
 * ```
 */
export class InvalidSelectionException extends ApiException {
  /** Offending tokens, sorted */
  public readonly unknown: string[];
  public readonly param?: string;

  constructor(unknown: string[], param?: string) {
    const sorted = [...unknown].sort();
    super(`Unknown fields: ${sorted.join(', ')}`, 400, 'INVALID_SELECTION', {
      ...(param ? { param } : {}),
      unknown: sorted,
    });
    this.name = 'InvalidSelectionException';
    this.unknown = sorted;
    this.param = param;
  }
}

/**
 * Programmer error in a fieldset declaration. Raised while building a
 * fieldset, never while handling a request.
 */
export class SchemaDeclarationException extends ApiException {
  constructor(message: string, details?: unknown) {
    super(message, 500, 'SCHEMA_DECLARATION_ERROR', details);
    this.name = 'SchemaDeclarationException';
  }
}

export class MarshallingException extends ApiException {
  constructor(message: string, details?: unknown) {
    super(message, 500, 'MARSHALLING_ERROR', details);
    this.name = 'MarshallingException';
  }
}
