import type { Context, Env, Handler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { setFieldSelection } from '../core/context-helpers.js';
import { FieldsetBuilder } from '../fieldset/builder.js';
import type { FieldsetSchema } from '../fieldset/schema.js';
import { buildRenderPlan } from '../fieldset/plan.js';
import { createSelectionParsers, readFieldSelection } from '../selection/query.js';
import type { FieldSelection } from '../selection/types.js';
import { marshal, type MarshalOutput } from '../serialization/marshal.js';

/**
 * A handler payload with an explicit status and headers.
 * Both pass through marshalling untouched.
 */
export class MarshalResponse<T = unknown> {
  constructor(
    readonly data: T,
    readonly status: ContentfulStatusCode = 200,
    readonly headers: Record<string, string> = {}
  ) {}
}

/**
 * Return a payload with a status code and headers from a fieldset handler.
 *
 * @example
 * ```ts
 * marshalWithFieldset(UserFieldset)(async (c) => {
 *   const user = await createUser(await c.req.json());
 *   return withStatus(user, 201, { Location: `/users/${user.id}` });
 * });
 * ```
 */
export function withStatus<T>(
  data: T,
  status: ContentfulStatusCode = 200,
  headers: Record<string, string> = {}
): MarshalResponse<T> {
  return new MarshalResponse(data, status, headers);
}

/**
 * Business handler whose result gets marshalled.
 * Returns the payload (an object or a list), or a `MarshalResponse`.
 */
export type FieldsetHandler<E extends Env = Env> = (ctx: Context<E>) => unknown;

export interface MarshalOptions<E extends Env = Env> {
  /**
   * Shapes the response body around the marshalled output.
   * @default identity
   */
  envelope?: (output: MarshalOutput, ctx: Context<E>) => object;
  /** Called with the parsed selection, before the handler runs */
  onSelection?: (selection: FieldSelection, ctx: Context<E>) => void;
}

/**
 * Decorator wrapping a handler so its result renders through a fieldset.
 */
export type FieldsetMarshaller<E extends Env = Env> = (handler: FieldsetHandler<E>) => Handler<E>;

/**
 * Build the request decorator for a fieldset.
 *
 * The selection parameters are parsed and validated before the handler
 * runs, so a bad selection never triggers the handler's side effects.
 *
 * @example
 * ```ts
 * const app = new Hono();
 * app.onError(createErrorHandler());
 *
 * app.get('/users/:id', marshalWithFieldset(UserFieldset)((c) => findUser(c.req.param('id'))));
 *
 * // GET /users/1?fields=id,team.name&embedd=team
 * // { "id": 1, "team": { "name": "Core" } }
 * ```
 */
export function marshalWithFieldset<E extends Env = Env>(
  fieldset: FieldsetSchema | FieldsetBuilder,
  options: MarshalOptions<E> = {}
): FieldsetMarshaller<E> {
  const schema = fieldset instanceof FieldsetBuilder ? fieldset.build() : fieldset;
  const parsers = createSelectionParsers(schema);
  const { envelope, onSelection } = options;

  return (handler) =>
    async (ctx: Context<E>): Promise<Response> => {
      const selection = readFieldSelection(ctx, schema, parsers);
      setFieldSelection(ctx, selection);
      onSelection?.(selection, ctx);

      const plan = buildRenderPlan(schema, selection.fields, selection.embed);
      const result = await handler(ctx);

      const response = result instanceof MarshalResponse ? result : undefined;
      const data: unknown = response ? response.data : result;
      const output = marshal(data, plan);
      const body = envelope ? envelope(output, ctx) : output;

      if (response) {
        return ctx.json(body, response.status, response.headers);
      }
      return ctx.json(body);
    };
}
