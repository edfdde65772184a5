import type { NestedRenderOptions } from '../fields/optional-nested.js';
import { getValue, isNil } from '../fields/utils.js';
import type { RenderPlan, RenderPlanEntry } from '../fieldset/types.js';

/** A marshalled object. */
export type MarshalledRecord = Record<string, unknown>;

/** Result of marshalling a single payload or a list of payloads. */
export type MarshalOutput = MarshalledRecord | MarshalledRecord[];

function toItems(value: unknown): unknown[] {
  if (Array.isArray(value)) {
    return value;
  }
  if (value instanceof Set) {
    return [...value];
  }
  return [value];
}

function renderNested(value: unknown, plan: RenderPlan, options: NestedRenderOptions): unknown {
  if (isNil(value)) {
    if (options.allowNull) {
      return null;
    }
    if (!isNil(options.default)) {
      return options.default;
    }
  }
  return marshalOne(value, plan);
}

function renderEntry(name: string, entry: RenderPlanEntry, source: unknown): unknown {
  switch (entry.kind) {
    case 'field':
      return entry.field.output(name, source);

    case 'reference':
    case 'reference-list':
      return entry.field ? entry.field.output(name, source) : null;

    case 'nested':
      return renderNested(getValue(entry.options.attribute ?? name, source), entry.plan, entry.options);

    case 'nested-list': {
      const value = getValue(entry.attribute ?? name, source);
      if (isNil(value)) {
        return isNil(entry.default) ? null : entry.default;
      }
      // Elements render directly; the element attribute applies to single nesting only
      return toItems(value).map((item) => renderNested(item, entry.plan, entry.options));
    }
  }
}

/**
 * Apply a render plan to one source object.
 */
export function marshalOne(source: unknown, plan: RenderPlan): MarshalledRecord {
  const result: MarshalledRecord = {};
  for (const [name, entry] of Object.entries(plan)) {
    result[name] = renderEntry(name, entry, source);
  }
  return result;
}

/**
 * Apply a render plan to a payload. Lists marshal element by element.
 *
 * @example
 * ```ts
 * // UserFieldset declares `defaultEmbed: []`, so `team` renders its plain key
 * const plan = buildRenderPlan(UserFieldset, ['id', 'team']);
 * marshal([{ id: 1, team: { id: 7, name: 'Core' } }], plan);
 * // [{ id: 1, team: 7 }]
 * ```
 */
export function marshal(data: readonly unknown[], plan: RenderPlan): MarshalledRecord[];
export function marshal(data: unknown, plan: RenderPlan): MarshalOutput;
export function marshal(data: unknown, plan: RenderPlan): MarshalOutput {
  if (Array.isArray(data)) {
    return data.map((item: unknown) => marshalOne(item, plan));
  }
  return marshalOne(data, plan);
}
