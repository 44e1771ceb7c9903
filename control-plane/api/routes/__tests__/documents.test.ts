import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { BackendUnavailableError, SearchBackendError } from '@errors';

import { createArticlePayload, createUserPayload } from '../../../../test/factories';
import type { InMemorySearchBackend } from '../../../../test/mocks/search-backend';
import { createTestApp, TEST_INDEXES } from '../../../../test/utils/containers';
import { setupMockLogger } from '../../../../test/utils/logger-mock';
import type { ArticleResponse, UserResponse } from '../documents';

const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/;

describe('document routes', () => {
  const mockLogger = setupMockLogger();
  let app: FastifyInstance;
  let backend: InMemorySearchBackend;

  beforeEach(async () => {
    ({ app, backend } = await createTestApp());
  });

  afterEach(async () => {
    await app.close();
  });

  async function createArticle(overrides: Parameters<typeof createArticlePayload>[0] = {}): Promise<ArticleResponse> {
    const res = await app.inject({
      method: 'POST',
      url: '/documents/articles',
      payload: createArticlePayload(overrides),
    });
    expect(res.statusCode).toBe(200);
    return res.json<ArticleResponse>();
  }

  describe('POST /documents/articles', () => {
    it('creates an article and returns it in snake_case', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/documents/articles',
        payload: {
          title: 'Test Article',
          content: 'Body text',
          author: 'A',
          category: 'technology',
          tags: ['python', 'elasticsearch'],
          views: 100,
          rating: 4.5,
        },
      });

      expect(res.statusCode).toBe(200);
      const body = res.json<ArticleResponse>();
      expect(body.id).not.toBe('');
      expect(body.category).toBe('technology');
      expect(body.tags).toEqual(expect.arrayContaining(['python', 'elasticsearch']));
      expect(body.views).toBe(100);
      expect(body.rating).toBe(4.5);
      expect(body.created_at).toMatch(ISO_TIMESTAMP);
      expect(body.created_at).toBe(body.updated_at);
      expect(backend.count(TEST_INDEXES.articles)).toBe(1);
    });

    it('rejects a body without required fields', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/documents/articles',
        payload: { title: 'Only a title' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: 'Validation failed',
        code: 'VALIDATION_ERROR',
        requestId: res.headers['x-request-id'],
      });
      expect(backend.count(TEST_INDEXES.articles)).toBe(0);
    });

    it('rejects wrongly typed fields', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/documents/articles',
        payload: createArticlePayload({ views: 1.5 }),
      });

      expect(res.statusCode).toBe(400);
      expect(res.json<{ code: string }>().code).toBe('VALIDATION_ERROR');
    });

    it('rejects views beyond the integer field range', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/documents/articles',
        payload: createArticlePayload({ views: 3_000_000_000 }),
      });

      expect(res.statusCode).toBe(400);
      expect(res.json<{ code: string }>().code).toBe('VALIDATION_ERROR');
      expect(backend.count(TEST_INDEXES.articles)).toBe(0);
    });

    it('accepts the largest integer views value', async () => {
      const created = await createArticle({ views: 2_147_483_647 });
      expect(created.views).toBe(2_147_483_647);
    });

    it('hides backend error text behind a generic message', async () => {
      backend.failWith(new SearchBackendError('[es_rejected_execution_exception] queue full'));

      const res = await app.inject({
        method: 'POST',
        url: '/documents/articles',
        payload: createArticlePayload(),
      });

      expect(res.statusCode).toBe(500);
      expect(res.json()).toEqual({
        error: 'An error occurred processing your request',
        code: 'SEARCH_BACKEND_ERROR',
        requestId: res.headers['x-request-id'],
      });
      expect(mockLogger.hasLog('error', /create article failed/)).toBe(true);
    });

    it('answers 503 when the backend is unreachable', async () => {
      backend.failWith(new BackendUnavailableError('connect ECONNREFUSED 127.0.0.1:9200'));

      const res = await app.inject({
        method: 'POST',
        url: '/documents/articles',
        payload: createArticlePayload(),
      });

      expect(res.statusCode).toBe(503);
      expect(res.json<{ error: string; code: string }>()).toMatchObject({
        error: 'Search backend unavailable',
        code: 'SERVICE_UNAVAILABLE',
      });
    });
  });

  describe('GET /documents/articles/:id', () => {
    it('returns a created article', async () => {
      const created = await createArticle();

      const res = await app.inject({ method: 'GET', url: `/documents/articles/${created.id}` });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual(created);
    });

    it('returns 404 for an unknown id', async () => {
      const res = await app.inject({
        method: 'GET',
        url: '/documents/articles/does-not-exist',
        headers: { 'x-request-id': 'req-404' },
      });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({
        error: 'Article not found',
        code: 'ARTICLE_NOT_FOUND',
        requestId: 'req-404',
      });
    });
  });

  describe('PUT /documents/articles/:id', () => {
    it('changes only the fields present in the body', async () => {
      const created = await createArticle({ tags: ['a', 'b'] });

      const res = await app.inject({
        method: 'PUT',
        url: `/documents/articles/${created.id}`,
        payload: { title: 'Renamed', rating: null },
      });

      expect(res.statusCode).toBe(200);
      const body = res.json<ArticleResponse>();
      expect(body).toEqual({
        ...created,
        title: 'Renamed',
        updated_at: body.updated_at,
      });
      expect(Date.parse(body.updated_at)).toBeGreaterThan(Date.parse(created.updated_at));
      expect(body.created_at).toBe(created.created_at);
    });

    it('accepts an empty body and only bumps updated_at', async () => {
      const created = await createArticle();

      const res = await app.inject({
        method: 'PUT',
        url: `/documents/articles/${created.id}`,
        payload: {},
      });

      expect(res.statusCode).toBe(200);
      const body = res.json<ArticleResponse>();
      expect(body.title).toBe(created.title);
      expect(Date.parse(body.updated_at)).toBeGreaterThan(Date.parse(created.updated_at));
    });

    it('returns 404 for an unknown id', async () => {
      const res = await app.inject({
        method: 'PUT',
        url: '/documents/articles/missing',
        payload: { title: 'x' },
      });

      expect(res.statusCode).toBe(404);
      expect(res.json<{ error: string }>().error).toBe('Article not found');
    });

    it('rejects wrongly typed fields', async () => {
      const created = await createArticle();

      const res = await app.inject({
        method: 'PUT',
        url: `/documents/articles/${created.id}`,
        payload: { tags: 'not-a-list' },
      });

      expect(res.statusCode).toBe(400);
    });

    it('rejects views beyond the integer field range', async () => {
      const created = await createArticle({ views: 4 });

      const res = await app.inject({
        method: 'PUT',
        url: `/documents/articles/${created.id}`,
        payload: { views: 3_000_000_000 },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json<{ code: string }>().code).toBe('VALIDATION_ERROR');
      const stored = await app.inject({ method: 'GET', url: `/documents/articles/${created.id}` });
      expect(stored.json<ArticleResponse>().views).toBe(4);
    });
  });

  describe('DELETE /documents/articles/:id', () => {
    it('deletes once and reports not found afterwards', async () => {
      const created = await createArticle();

      const first = await app.inject({ method: 'DELETE', url: `/documents/articles/${created.id}` });
      expect(first.statusCode).toBe(200);
      expect(first.json()).toEqual({ message: 'Article deleted successfully' });

      const second = await app.inject({ method: 'DELETE', url: `/documents/articles/${created.id}` });
      expect(second.statusCode).toBe(404);

      const third = await app.inject({ method: 'DELETE', url: `/documents/articles/${created.id}` });
      expect(third.statusCode).toBe(404);
      expect(mockLogger.hasLog('error', /delete article failed/)).toBe(false);
    });
  });

  describe('GET /documents/articles', () => {
    beforeEach(async () => {
      for (let i = 1; i <= 7; i++) {
        await createArticle({
          title: `Article ${i}`,
          category: i % 2 === 0 ? 'science' : 'technology',
          tags: i === 3 ? ['featured'] : ['regular'],
        });
      }
    });

    it('never returns more than limit', async () => {
      const res = await app.inject({ method: 'GET', url: '/documents/articles?limit=5' });

      expect(res.statusCode).toBe(200);
      expect(res.json<ArticleResponse[]>()).toHaveLength(5);
    });

    it('defaults to ten results', async () => {
      const res = await app.inject({ method: 'GET', url: '/documents/articles' });
      expect(res.json<ArticleResponse[]>()).toHaveLength(7);
    });

    it('skips the first offset results of the same query', async () => {
      const all = (await app.inject({ method: 'GET', url: '/documents/articles?limit=100' })).json<ArticleResponse[]>();
      const page = (await app.inject({ method: 'GET', url: '/documents/articles?limit=5&offset=2' })).json<ArticleResponse[]>();

      expect(page.map(a => a.id)).toEqual(all.slice(2, 7).map(a => a.id));
    });

    it('returns only exact category matches', async () => {
      const res = await app.inject({ method: 'GET', url: '/documents/articles?category=technology' });

      const categories = res.json<ArticleResponse[]>().map(a => a.category);
      expect(categories).toEqual(['technology', 'technology', 'technology', 'technology']);
    });

    it('accepts tags both repeated and with brackets', async () => {
      const repeated = await app.inject({ method: 'GET', url: '/documents/articles?tags=featured&tags=missing' });
      const bracketed = await app.inject({ method: 'GET', url: '/documents/articles?tags[]=featured' });

      expect(repeated.json<ArticleResponse[]>().map(a => a.title)).toEqual(['Article 3']);
      expect(bracketed.json<ArticleResponse[]>().map(a => a.title)).toEqual(['Article 3']);
    });

    it('searches title and content', async () => {
      const res = await app.inject({ method: 'GET', url: '/documents/articles?query=Article%205' });

      expect(res.json<ArticleResponse[]>()[0]?.title).toBe('Article 5');
    });

    it('ignores unknown query parameters', async () => {
      const res = await app.inject({ method: 'GET', url: '/documents/articles?_=123&limit=5' });

      expect(res.statusCode).toBe(200);
      expect(res.json<ArticleResponse[]>()).toHaveLength(5);
    });

    it('treats a whitespace-only category as an exact value', async () => {
      const res = await app.inject({ method: 'GET', url: '/documents/articles?category=%20%20%20' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual([]);
    });

    it('returns an empty list when nothing matches', async () => {
      const res = await app.inject({ method: 'GET', url: '/documents/articles?category=history' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual([]);
    });

    it.each([
      ['limit=0'],
      ['limit=101'],
      ['limit=abc'],
      ['offset=-1'],
    ])('rejects %s without searching', async (query) => {
      const searchesBefore = backend.searches.length;

      const res = await app.inject({ method: 'GET', url: `/documents/articles?${query}` });

      expect(res.statusCode).toBe(400);
      expect(res.json<{ code: string }>().code).toBe('VALIDATION_ERROR');
      expect(backend.searches).toHaveLength(searchesBefore);
    });
  });

  describe('users', () => {
    it('creates a user with defaults and fetches it back', async () => {
      const created = await app.inject({
        method: 'POST',
        url: '/documents/users',
        payload: { username: 'jdoe', email: 'jdoe@example.com', full_name: 'J Doe' },
      });

      expect(created.statusCode).toBe(200);
      const user = created.json<UserResponse>();
      expect(user).toMatchObject({
        username: 'jdoe',
        email: 'jdoe@example.com',
        full_name: 'J Doe',
        bio: '',
        is_active: 'true',
      });
      expect(user.created_at).toBe(user.updated_at);

      const fetched = await app.inject({ method: 'GET', url: `/documents/users/${user.id}` });
      expect(fetched.statusCode).toBe(200);
      expect(fetched.json()).toEqual(user);
    });

    it('keeps the string active flag', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/documents/users',
        payload: createUserPayload({ isActive: 'false' }),
      });

      expect(res.json<UserResponse>().is_active).toBe('false');
    });

    it('rejects an invalid email', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/documents/users',
        payload: createUserPayload({ email: 'not-an-email' }),
      });

      expect(res.statusCode).toBe(400);
      expect(backend.count(TEST_INDEXES.users)).toBe(0);
    });

    it('rejects a boolean active flag', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/documents/users',
        payload: { ...createUserPayload(), is_active: true },
      });

      expect(res.statusCode).toBe(400);
    });

    it('returns 404 for an unknown user', async () => {
      const res = await app.inject({ method: 'GET', url: '/documents/users/missing' });

      expect(res.statusCode).toBe(404);
      expect(res.json<{ error: string; code: string }>()).toMatchObject({
        error: 'User not found',
        code: 'USER_NOT_FOUND',
      });
    });
  });
});
