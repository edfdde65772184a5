import { ListField } from '../fields/raw.js';
import type { FieldsetSchema } from './schema.js';
import type { RenderPlan } from './types.js';

function toSet(selection: Iterable<string> | null | undefined): ReadonlySet<string> {
  if (!selection) {
    return new Set();
  }
  return selection instanceof Set ? selection : new Set(selection);
}

function headOf(path: string): string | undefined {
  const dot = path.indexOf('.');
  return dot > 0 ? path.slice(0, dot) : undefined;
}

/**
 * Selected names of `schema`: plain names it declares, plus the head of
 * every dotted path into one of its nested fields.
 */
function directNames(schema: FieldsetSchema, selection: ReadonlySet<string>): Set<string> {
  const direct = new Set<string>();
  for (const path of selection) {
    if (schema.fields.has(path)) {
      direct.add(path);
      continue;
    }
    const head = headOf(path);
    if (head !== undefined && schema.isNested(head)) {
      direct.add(head);
    }
  }
  return direct;
}

/**
 * Groups dotted paths by their first segment: `owner.email` -> owner: {email}.
 */
function childSelections(selection: ReadonlySet<string>): Map<string, Set<string>> {
  const grouped = new Map<string, Set<string>>();
  for (const path of selection) {
    const head = headOf(path);
    if (head === undefined) continue;
    const children = grouped.get(head) ?? new Set<string>();
    children.add(path.slice(head.length + 1));
    grouped.set(head, children);
  }
  return grouped;
}

function compile(
  schema: FieldsetSchema,
  selectedFields: ReadonlySet<string>,
  selectedEmbed: ReadonlySet<string>
): RenderPlan {
  const fieldSelection = selectedFields.size > 0 ? selectedFields : schema.defaultFieldSet();
  const embedSelection = selectedEmbed.size > 0 ? selectedEmbed : schema.defaultEmbedSet();

  const directFields = directNames(schema, fieldSelection);
  const embedded = new Set([...embedSelection].filter((path) => schema.isNested(path)));
  const nestedFields = childSelections(fieldSelection);
  const nestedEmbeds = childSelections(embedSelection);

  const plan: RenderPlan = {};
  // Declaration order keeps the output stable
  for (const [name, declaration] of schema.fields) {
    if (!directFields.has(name)) continue;

    switch (declaration.kind) {
      case 'scalar':
        plan[name] = { kind: 'field', field: declaration.field };
        break;

      case 'nested': {
        const nested = declaration.field;
        const child = schema.nestedFieldset(name);
        plan[name] = embedded.has(name) && child
          ? {
              kind: 'nested',
              plan: compile(
                child,
                nestedFields.get(name) ?? new Set(),
                nestedEmbeds.get(name) ?? new Set()
              ),
              options: nested.nestedOptions(),
            }
          : { kind: 'reference', field: nested.keyField() };
        break;
      }

      case 'nested-list': {
        const { field: list, container } = declaration;
        const child = schema.nestedFieldset(name);
        if (embedded.has(name) && child) {
          plan[name] = {
            kind: 'nested-list',
            plan: compile(
              child,
              nestedFields.get(name) ?? new Set(),
              nestedEmbeds.get(name) ?? new Set()
            ),
            options: container.nestedOptions(),
            attribute: list.attribute,
            default: list.default,
          };
        } else {
          const keyField = container.keyField();
          plan[name] = {
            kind: 'reference-list',
            field: keyField
              ? new ListField(keyField, { attribute: list.attribute, default: list.default })
              : null,
          };
        }
        break;
      }
    }
  }
  return plan;
}

/**
 * Compile a caller's selection into a render plan.
 *
 * Empty or missing selections fall back to the fieldset's defaults at every
 * level. A dotted path selects its nested field too: `owner.email` renders
 * `owner` with only `email` inside. A nested field is embedded only when its
 * own name is in the embed selection; otherwise it renders its plain key and
 * dotted embed paths below it are ignored.
 *
 * @example
 * ```ts
 * buildRenderPlan(PostFieldset, ['title', 'author.email'], ['author']);
 * // { title: { kind: 'field', ... },
 * //   author: { kind: 'nested', plan: { email: { kind: 'field', ... } }, ... } }
 * ```
 */
export function buildRenderPlan(
  schema: FieldsetSchema,
  selectedFields?: Iterable<string> | null,
  selectedEmbed?: Iterable<string> | null
): RenderPlan {
  schema.assertAcyclic();
  return compile(schema, toSet(selectedFields), toSet(selectedEmbed));
}
