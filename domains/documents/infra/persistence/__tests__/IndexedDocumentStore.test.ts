import { beforeEach, describe, expect, it } from 'vitest';

import { SearchBackendError } from '@errors';

import { InMemorySearchBackend } from '../../../../../test/mocks/search-backend';
import { articleCodec, newArticle, type ArticleFields } from '../../../domain/entities/Article';
import { ARTICLES_INDEX } from '../../../domain/mappings';
import { IndexedDocumentStore } from '../IndexedDocumentStore';

const INDEX = 'test_articles';

describe('IndexedDocumentStore', () => {
  let backend: InMemorySearchBackend;
  let now: Date;
  let store: IndexedDocumentStore<ArticleFields>;

  const fields = newArticle({ title: 'Hello', content: 'World', author: 'A', category: 'news' });

  beforeEach(async () => {
    backend = new InMemorySearchBackend();
    await backend.ensureIndex(INDEX, ARTICLES_INDEX);
    now = new Date('2024-03-01T10:00:00.000Z');
    store = new IndexedDocumentStore(backend, INDEX, articleCodec, () => now);
  });

  it('assigns an id and equal timestamps on first save', async () => {
    const saved = await store.save(fields);

    expect(saved.id).not.toBe('');
    expect(saved.createdAt).toEqual(now);
    expect(saved.updatedAt).toEqual(now);
    expect(backend.rawSource(INDEX, saved.id)).toEqual({
      title: 'Hello',
      content: 'World',
      author: 'A',
      category: 'news',
      tags: [],
      views: 0,
      rating: 0,
      created_at: '2024-03-01T10:00:00.000Z',
      updated_at: '2024-03-01T10:00:00.000Z',
    });
  });

  it('reads back what it saved', async () => {
    const saved = await store.save(fields);
    await expect(store.get(saved.id)).resolves.toEqual(saved);
  });

  it('returns null for a missing id', async () => {
    await expect(store.get('does-not-exist')).resolves.toBeNull();
  });

  it('keeps id and createdAt when saving over an existing document', async () => {
    const saved = await store.save(fields);
    now = new Date('2024-03-02T10:00:00.000Z');

    const resaved = await store.save({ ...fields, title: 'Changed' }, saved);

    expect(resaved.id).toBe(saved.id);
    expect(resaved.createdAt).toEqual(saved.createdAt);
    expect(resaved.updatedAt).toEqual(now);
    expect(backend.count(INDEX)).toBe(1);
  });

  it('decodes search hits in engine order', async () => {
    const first = await store.save({ ...fields, title: 'First' });
    const second = await store.save({ ...fields, title: 'Second' });

    const hits = await store.search({ query: { match_all: {} }, from: 0, size: 10 });
    expect(hits.map(hit => hit.id)).toEqual([first.id, second.id]);
    expect(hits[1]?.title).toBe('Second');
  });

  it('reports whether delete removed a document', async () => {
    const saved = await store.save(fields);
    await expect(store.delete(saved.id)).resolves.toBe(true);
    await expect(store.delete(saved.id)).resolves.toBe(false);
  });

  it('turns a malformed stored source into SearchBackendError', async () => {
    backend.put(INDEX, 'broken', { title: 'Only a title' });

    const error = await store.get('broken').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(SearchBackendError);
    if (error instanceof SearchBackendError) {
      expect(error.message).toBe('Stored document does not match the expected shape');
    }
  });
});
