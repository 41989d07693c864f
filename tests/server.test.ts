import { afterEach, describe, expect, it } from 'vitest';
import fastify, { FastifyInstance } from 'fastify';
import { buildServer } from '../src/api/index';
import { createApiKeyGuard } from '../src/api/hooks/auth';
import { SearchMode } from '../src/types';
import { FakeEmbedder, FakeStore } from './helpers/fakes';

const MODES: SearchMode[] = ['hybrid', 'bm25', 'semantic', 'exact'];

describe('server routes', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  it('describes the API at the root', async () => {
    app = await buildServer({ store: new FakeStore(), embedder: new FakeEmbedder() });
    const res = await app.inject({ method: 'GET', url: '/' });
    expect(res.statusCode).toBe(200);
    expect(Object.keys(res.json().search_types)).toEqual(['hybrid', 'bm25', 'semantic', 'exact']);
  });

  it('health reports the store and embedding configuration', async () => {
    app = await buildServer({ store: new FakeStore(), embedder: new FakeEmbedder() });
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      status: 'ok',
      services: { api: 'ok', store: 'ok', embedding: 'configured' }
    });
  });

  it('health degrades when the store check fails', async () => {
    const store = new FakeStore();
    store.checkHealth.mockRejectedValueOnce(new Error('connection refused'));
    app = await buildServer({ store, embedder: new FakeEmbedder() });

    const res = await app.inject({ method: 'GET', url: '/health?services=store' });

    expect(res.json()).toEqual({
      status: 'degraded',
      services: { api: 'ok', store: 'error', embedding: 'unknown' }
    });
  });

  it.each(MODES)('rejects an empty query in %s mode before any collaborator call', async (mode) => {
    const store = new FakeStore();
    const embedder = new FakeEmbedder();
    app = await buildServer({ store, embedder });

    const res = await app.inject({ method: 'POST', url: '/search', payload: { query: '', search_type: mode } });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('Invalid search request');
    expect(embedder.embed).not.toHaveBeenCalled();
    expect(store.search).not.toHaveBeenCalled();
  });

  it('rejects an unsupported search_type and lists the valid ones', async () => {
    const store = new FakeStore();
    const embedder = new FakeEmbedder();
    app = await buildServer({ store, embedder });

    const res = await app.inject({ method: 'POST', url: '/search', payload: { query: 'hello', search_type: 'foo' } });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'Invalid search_type. Must be one of: hybrid, bm25, semantic, exact' });
    expect(embedder.embed).not.toHaveBeenCalled();
    expect(store.search).not.toHaveBeenCalled();
  });

  it('runs an exact search with a title filter', async () => {
    const store = new FakeStore([[{ id: 42, distance: 3.2, text: 'a test phrase in context' }]]);
    app = await buildServer({ store, embedder: new FakeEmbedder() });

    const res = await app.inject({
      method: 'POST',
      url: '/search',
      payload: { query: 'test phrase', search_type: 'exact', limit: 10, filter: { title: 'Chapter1' } }
    });

    expect(res.statusCode).toBe(200);
    expect(store.requests[0].filter).toBe(`PHRASE_MATCH(text, 'test phrase') && title == "Chapter1"`);
    expect(res.json()).toEqual({
      query: 'test phrase',
      search_type: 'exact',
      results: [{ id: 42, distance: 3.2, entity: { text: 'a test phrase in context' } }],
      count: 1
    });
  });

  it('echoes the lower-cased mode', async () => {
    app = await buildServer({ store: new FakeStore(), embedder: new FakeEmbedder() });
    const res = await app.inject({ method: 'POST', url: '/search', payload: { query: 'q', search_type: 'BM25' } });
    expect(res.json().search_type).toBe('bm25');
  });

  it('answers 502 with the provider detail when embedding fails', async () => {
    const store = new FakeStore();
    const embedder = new FakeEmbedder();
    embedder.embed.mockRejectedValueOnce(new Error('API key not valid'));
    app = await buildServer({ store, embedder });

    const res = await app.inject({ method: 'POST', url: '/search', payload: { query: 'q', search_type: 'semantic' } });

    expect(res.statusCode).toBe(502);
    expect(res.json()).toEqual({ error: 'Error generating embedding: API key not valid' });
    expect(store.search).not.toHaveBeenCalled();
  });

  it('answers 502 with the store detail when the search fails', async () => {
    const store = new FakeStore();
    store.search.mockRejectedValueOnce(new Error('collection not loaded'));
    app = await buildServer({ store, embedder: new FakeEmbedder() });

    const res = await app.inject({ method: 'POST', url: '/search', payload: { query: 'q', search_type: 'bm25' } });

    expect(res.statusCode).toBe(502);
    expect(res.json()).toEqual({ error: 'Search failed: collection not loaded' });
  });
});

describe('api key guard', () => {
  async function guarded(): Promise<FastifyInstance> {
    const app = fastify();
    app.addHook('onRequest', createApiKeyGuard('test-secret'));
    app.get('/health', async () => ({ status: 'ok' }));
    app.post('/search', async () => ({ ok: true }));
    return app;
  }

  it('rejects requests without the key', async () => {
    const app = await guarded();
    const res = await app.inject({ method: 'POST', url: '/search', payload: {} });
    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ error: 'unauthorized' });
    await app.close();
  });

  it('accepts the key and leaves health public', async () => {
    const app = await guarded();
    const withKey = await app.inject({ method: 'POST', url: '/search', headers: { 'x-api-key': 'test-secret' }, payload: {} });
    const health = await app.inject({ method: 'GET', url: '/health' });
    expect(withKey.statusCode).toBe(200);
    expect(health.statusCode).toBe(200);
    await app.close();
  });

  it('is a no-op without a configured key', async () => {
    const app = fastify();
    app.addHook('onRequest', createApiKeyGuard(undefined));
    app.post('/search', async () => ({ ok: true }));
    const res = await app.inject({ method: 'POST', url: '/search', payload: {} });
    expect(res.statusCode).toBe(200);
    await app.close();
  });
});
