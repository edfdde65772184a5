/**
 * Example: Blog API with fieldsets
 *
 * Posts embed their author and comments on request; everything else renders
 * as plain keys. Callers pick fields with ?fields= and nested objects with
 * ?embedd=.
 *
 * Run with: npx tsx examples/blog.ts
 */

import { serve } from '@hono/node-server';
import { OpenAPIHono, createRoute } from '@hono/zod-openapi';
import { requestId } from 'hono/request-id';
import {
  fieldset,
  fields,
  marshalWithFieldset,
  withStatus,
  createErrorHandler,
  getFieldSelection,
  fieldsetQuerySchema,
  selectionErrorResponse,
  ApiException,
} from '../src/index.js';

// ============================================================================
// Data
// ============================================================================

interface User {
  id: number;
  name: string;
  email: string;
}

interface Comment {
  id: number;
  body: string;
  author: User;
}

interface Post {
  id: number;
  title: string;
  publishedAt: Date;
  tags: string[];
  author: User;
  comments: Comment[];
}

const ada: User = { id: 1, name: 'Ada', email: 'ada@example.com' };
const alan: User = { id: 2, name: 'Alan', email: 'alan@example.com' };

const posts: Post[] = [
  {
    id: 1,
    title: 'Notes on the engine',
    publishedAt: new Date(Date.UTC(2024, 2, 1)),
    tags: ['history', 'computing'],
    author: ada,
    comments: [{ id: 10, body: 'Fascinating', author: alan }],
  },
  {
    id: 2,
    title: 'On computable numbers',
    publishedAt: new Date(Date.UTC(2024, 3, 12)),
    tags: ['math'],
    author: alan,
    comments: [],
  },
];

// ============================================================================
// Fieldsets
// ============================================================================

const UserFieldset = fieldset('User')
  .field('id', fields.integer())
  .field('name', fields.string())
  .field('email', fields.string())
  .meta({ defaultFields: ['id', 'name'] })
  .build();

const CommentFieldset = fieldset('Comment')
  .field('id', fields.integer())
  .field('body', fields.string())
  .nested('author', UserFieldset, 'id')
  .build();

const PostFieldset = fieldset('Post')
  .field('id', fields.integer())
  .field('title', fields.string())
  .field('publishedAt', fields.dateTime())
  .field('tags', fields.list(fields.string()))
  .nested('author', UserFieldset, 'id')
  .nestedList('comments', () => CommentFieldset, 'id')
  .meta({ defaultEmbed: [] })
  .build();

// ============================================================================
// App
// ============================================================================

const app = new OpenAPIHono();
app.use('*', requestId());
app.onError(createErrorHandler());

const withPost = marshalWithFieldset(PostFieldset);

app.openAPIRegistry.registerPath(
  createRoute({
    method: 'get',
    path: '/posts',
    request: { query: fieldsetQuerySchema(PostFieldset) },
    responses: {
      200: { description: 'Posts' },
      400: selectionErrorResponse(),
    },
  })
);

app.get(
  '/posts',
  withPost((c) => {
    // Unembedded comments only need their ids
    const embeds = [...(getFieldSelection(c)?.embed ?? [])];
    if (embeds.some((path) => path === 'comments' || path.startsWith('comments.'))) {
      return posts;
    }
    return posts.map((post) => ({
      ...post,
      comments: post.comments.map((comment) => ({ id: comment.id })),
    }));
  })
);

app.get(
  '/posts/:id',
  withPost((c) => {
    const post = posts.find((candidate) => candidate.id === Number(c.req.param('id')));
    if (!post) {
      throw new ApiException('Post not found', 404, 'NOT_FOUND');
    }
    return post;
  })
);

app.post(
  '/posts/:id/copy',
  withPost((c) => {
    const source = posts.find((candidate) => candidate.id === Number(c.req.param('id')));
    if (!source) {
      throw new ApiException('Post not found', 404, 'NOT_FOUND');
    }
    const copy: Post = { ...source, id: posts.length + 1, comments: [] };
    posts.push(copy);
    return withStatus(copy, 201, { Location: `/posts/${copy.id}` });
  })
);

app.doc('/openapi.json', {
  openapi: '3.0.0',
  info: { title: 'Blog API', version: '1.0.0' },
});

// Start server
const port = 3456;
console.log(`Blog example running at http://localhost:${port}`);
console.log(`OpenAPI spec: http://localhost:${port}/openapi.json`);
console.log('\nTry these requests:');
console.log(`\n1. Defaults (author as a plain key):`);
console.log(`   curl http://localhost:${port}/posts | jq`);
console.log(`\n2. Embed the author:`);
console.log(`   curl "http://localhost:${port}/posts/1?embedd=author" | jq`);
console.log(`\n3. Pick nested fields:`);
console.log(`   curl "http://localhost:${port}/posts/1?fields=title,author.email&embedd=author" | jq`);
console.log(`\n4. Embed comments and their authors:`);
console.log(`   curl "http://localhost:${port}/posts?fields=id,comments.body,comments.author.name&embedd=comments,comments.author" | jq`);
console.log(`\n5. Unknown fields are rejected:`);
console.log(`   curl "http://localhost:${port}/posts?fields=id,password" | jq`);

serve({ fetch: app.fetch, port });
