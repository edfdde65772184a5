import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import {
  fieldset,
  fields,
  buildRenderPlan,
  marshal,
  marshalOne,
  setLogger,
  resetLogger,
  ObjectMemberField,
  StringField,
  type FieldsetSchema,
  type RenderPlan,
  type RenderPlanEntry,
} from '../src/index.js';

const OwnerFieldset = fieldset('Owner')
  .field('id', fields.integer())
  .field('email', fields.string())
  .build();

const ResourceFieldset = fieldset('Resource')
  .field('id', fields.integer())
  .field('name', fields.string())
  .nested('owner', OwnerFieldset, 'id')
  .meta({ defaultEmbed: [] })
  .build();

const PetFieldset = fieldset('Pet')
  .field('id', fields.integer())
  .field('name', fields.string())
  .nested('owner', OwnerFieldset, 'id')
  .build();

const HouseFieldset = fieldset('House')
  .field('id', fields.integer())
  .nestedList('pets', PetFieldset, 'id')
  .nested('owner', OwnerFieldset, 'id')
  .build();

const resource = { id: 1, name: 'Bob', owner: { id: 9, email: 'a@b.c' } };

const house = {
  id: 3,
  pets: [
    { id: 1, name: 'Rex', owner: { id: 9, email: 'a@b.c' } },
    { id: 2, name: 'Tom', owner: null },
  ],
  owner: { id: 9, email: 'a@b.c' },
};

function entry(plan: RenderPlan, name: string): RenderPlanEntry {
  const found = plan[name];
  if (!found) {
    throw new Error(`No plan entry for ${name}`);
  }
  return found;
}

function childPlan(plan: RenderPlan, name: string): RenderPlan {
  const found = entry(plan, name);
  if (found.kind !== 'nested' && found.kind !== 'nested-list') {
    throw new Error(`${name} is not embedded`);
  }
  return found.plan;
}

// ============================================================================
// Plan Compilation
// ============================================================================

describe('buildRenderPlan', () => {
  it('should reference an unembedded nested field by its plain key', () => {
    const plan = buildRenderPlan(ResourceFieldset, ['owner'], []);
    const owner = entry(plan, 'owner');

    expect(Object.keys(plan)).toEqual(['owner']);
    expect(owner.kind).toBe('reference');
    if (owner.kind === 'reference') {
      expect(owner.field).toBeInstanceOf(ObjectMemberField);
      expect(owner.field?.member).toBe('id');
    }
  });

  it('should embed a selected nested field with its default fields', () => {
    const plan = buildRenderPlan(ResourceFieldset, ['owner'], ['owner']);

    expect(entry(plan, 'owner').kind).toBe('nested');
    expect(Object.keys(childPlan(plan, 'owner'))).toEqual(['id', 'email']);
  });

  it('should follow declaration order, not selection order', () => {
    const plan = buildRenderPlan(ResourceFieldset, ['owner', 'name', 'id']);
    expect(Object.keys(plan)).toEqual(['id', 'name', 'owner']);
  });

  it('should be idempotent', () => {
    expect(buildRenderPlan(ResourceFieldset, ['name', 'owner'], ['owner'])).toEqual(
      buildRenderPlan(ResourceFieldset, ['name', 'owner'], ['owner'])
    );
  });

  it.each<{ name: string; schema: FieldsetSchema }>([
    { name: 'Resource', schema: ResourceFieldset },
    { name: 'House', schema: HouseFieldset },
  ])('should fall back to the defaults for empty selections ($name)', ({ schema }) => {
    const defaults = buildRenderPlan(schema, schema.defaultFieldSet(), schema.defaultEmbedSet());

    expect(buildRenderPlan(schema, [], [])).toEqual(defaults);
    expect(buildRenderPlan(schema)).toEqual(defaults);
    expect(schema.plan(null, null)).toEqual(defaults);
  });

  it('should select the nested field of a dotted path', () => {
    const plan = buildRenderPlan(ResourceFieldset, ['name', 'owner.email'], ['owner']);

    expect(Object.keys(plan)).toEqual(['name', 'owner']);
    expect(Object.keys(childPlan(plan, 'owner'))).toEqual(['email']);
  });

  it('should reference a dotted path head that is not embedded', () => {
    const plan = buildRenderPlan(ResourceFieldset, ['owner.email'], []);
    expect(entry(plan, 'owner').kind).toBe('reference');
  });

  it('should embed along a dotted embed path', () => {
    const plan = buildRenderPlan(HouseFieldset, ['pets'], ['pets', 'pets.owner']);

    expect(entry(plan, 'pets').kind).toBe('nested-list');
    const pets = childPlan(plan, 'pets');
    expect(Object.keys(pets)).toEqual(['id', 'name', 'owner']);
    expect(entry(pets, 'owner').kind).toBe('nested');
  });

  it('should not embed the head of a dotted embed path', () => {
    const plan = buildRenderPlan(HouseFieldset, ['pets'], ['pets.owner']);
    expect(entry(plan, 'pets').kind).toBe('reference-list');
  });

  it('should reference nested lists that are not embedded', () => {
    const plan = buildRenderPlan(HouseFieldset, ['pets'], ['owner']);
    expect(entry(plan, 'pets').kind).toBe('reference-list');
  });

  it('should skip the nested defaults of unselected heads', () => {
    const plan = buildRenderPlan(HouseFieldset, ['id'], ['pets']);
    expect(Object.keys(plan)).toEqual(['id']);
  });
});

// ============================================================================
// Marshalling
// ============================================================================

describe('marshal', () => {
  it('should render selected fields with an embedded dotted path', () => {
    const plan = buildRenderPlan(ResourceFieldset, ['name', 'owner.email'], ['owner']);
    expect(marshal(resource, plan)).toEqual({ name: 'Bob', owner: { email: 'a@b.c' } });
  });

  it('should render plain keys for references', () => {
    const plan = buildRenderPlan(ResourceFieldset);
    expect(marshal(resource, plan)).toEqual({ id: 1, name: 'Bob', owner: 9 });
  });

  it('should marshal lists element by element', () => {
    const plan = buildRenderPlan(ResourceFieldset, ['id', 'owner']);
    const second = { id: 2, name: 'Eve', owner: { id: 4 } };

    expect(marshal([resource, second], plan)).toEqual([
      { id: 1, owner: 9 },
      { id: 2, owner: 4 },
    ]);
  });

  it('should render a missing nested object with its defaults', () => {
    const plan = buildRenderPlan(ResourceFieldset, ['owner'], ['owner']);
    expect(marshalOne({ owner: null }, plan)).toEqual({ owner: { id: 0, email: null } });
  });

  it('should render null for a missing reference', () => {
    const plan = buildRenderPlan(ResourceFieldset, ['owner']);
    expect(marshalOne({}, plan)).toEqual({ owner: null });
  });

  it('should embed nested lists', () => {
    const plan = buildRenderPlan(HouseFieldset, ['pets.name'], ['pets']);
    expect(marshal(house, plan)).toEqual({ pets: [{ name: 'Rex' }, { name: 'Tom' }] });
  });

  it('should embed inside nested lists', () => {
    const plan = buildRenderPlan(HouseFieldset, ['pets.name', 'pets.owner.email'], ['pets.owner']);

    expect(marshal(house, plan)).toEqual({
      pets: [
        { name: 'Rex', owner: { email: 'a@b.c' } },
        { name: 'Tom', owner: { email: null } },
      ],
    });
  });

  it('should render plain keys for unembedded nested lists', () => {
    const plan = buildRenderPlan(HouseFieldset, ['pets'], ['owner']);
    expect(marshal(house, plan)).toEqual({ pets: [1, 2] });
  });

  it('should render null for a missing nested list', () => {
    expect(marshal({}, buildRenderPlan(HouseFieldset, ['pets'], ['pets']))).toEqual({ pets: null });
    expect(marshal({}, buildRenderPlan(HouseFieldset, ['pets'], ['owner']))).toEqual({ pets: null });
  });
});

describe('nested field options', () => {
  beforeAll(() => {
    setLogger({ warn: vi.fn(), error: vi.fn() });
  });

  afterAll(() => {
    resetLogger();
  });

  it('should read nested values from the attribute', () => {
    const Post = fieldset('Post')
      .nested('author', OwnerFieldset, 'id', { attribute: 'createdBy' })
      .meta({ defaultEmbed: [] })
      .build();
    const post = { createdBy: { id: 5, email: 'x@y.z' } };

    expect(marshal(post, buildRenderPlan(Post, ['author.email'], ['author']))).toEqual({
      author: { email: 'x@y.z' },
    });
    expect(marshal(post, buildRenderPlan(Post, ['author'], []))).toEqual({ author: 5 });
  });

  it('should format plain keys with the plain field', () => {
    const Post = fieldset('Post')
      .nested('author', OwnerFieldset, 'id', { plainField: StringField })
      .meta({ defaultEmbed: [] })
      .build();

    expect(marshal({ author: { id: 5 } }, buildRenderPlan(Post))).toEqual({ author: '5' });
  });

  it('should render null for missing nested objects with allowNull', () => {
    const Post = fieldset('Post')
      .nested('author', OwnerFieldset, 'id', { allowNull: true })
      .build();

    expect(marshal({ author: null }, buildRenderPlan(Post))).toEqual({ author: null });
  });

  it('should render the default for missing nested objects', () => {
    const Post = fieldset('Post')
      .nested('author', OwnerFieldset, 'id', { default: 'anonymous' })
      .build();

    expect(marshal({}, buildRenderPlan(Post))).toEqual({ author: 'anonymous' });
  });

  it('should render null for unembedded fields without a plain key', () => {
    const Post = fieldset('Post')
      .field('id', fields.integer())
      .nested('author', OwnerFieldset, null)
      .nestedList('tags', fieldset('Tag').field('name', fields.string()), null)
      .meta({ defaultEmbed: [] })
      .build();

    const plan = buildRenderPlan(Post);
    expect(entry(plan, 'author')).toEqual({ kind: 'reference', field: null });
    expect(entry(plan, 'tags')).toEqual({ kind: 'reference-list', field: null });
    expect(marshal({ id: 1, author: { id: 5 }, tags: [{ name: 'ts' }] }, plan)).toEqual({
      id: 1,
      author: null,
      tags: null,
    });
  });

  it('should render the list default for a missing nested list', () => {
    const Post = fieldset('Post')
      .nestedList('tags', fieldset('Tag').field('name', fields.string()), 'name', { list: { default: [] } })
      .build();

    const Compact = fieldset('CompactPost').extends(Post).meta({ defaultEmbed: [] }).build();

    expect(marshal({}, buildRenderPlan(Post))).toEqual({ tags: [] });
    expect(entry(buildRenderPlan(Compact), 'tags').kind).toBe('reference-list');
    expect(marshal({}, buildRenderPlan(Compact))).toEqual({ tags: [] });
  });
});
