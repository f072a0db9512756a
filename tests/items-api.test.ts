import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { FastifyInstance, InjectOptions } from 'fastify';
import { createServer } from '../src/api/server.js';
import { ItemStore } from '../src/items/store.js';
import { DEFAULT_SEED_ITEMS } from '../src/items/item.types.js';
import type { Item } from '../src/items/item.types.js';
import { RequestMetrics } from '../src/lib/metrics.js';

const CREATED_AT = '2026-03-01T12:00:00.000Z';
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

const UNROUTABLE_REQUESTS: Array<[NonNullable<InjectOptions['method']>, string]> = [
  ['GET', '/api/unknown'],
  ['GET', '/api/items/abc'],
  ['GET', '/api/items/1.5'],
  ['DELETE', '/api/items/-1'],
  ['PUT', '/api/items/1'],
];

class BrokenListStore extends ItemStore {
  override list(): Promise<Item[]> {
    return Promise.reject(new Error('list failed'));
  }
}

describe('items API', () => {
  let app: FastifyInstance;
  let metrics: RequestMetrics;

  beforeEach(async () => {
    metrics = new RequestMetrics();
    app = await createServer({
      store: new ItemStore({ seed: DEFAULT_SEED_ITEMS, now: () => new Date(CREATED_AT) }),
      metrics,
      service: { name: 'test-service', version: '9.9.9' },
    });
  });

  afterEach(async () => {
    await app.close();
  });

  it('lists the seeded items', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/items' });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toContain('application/json');
    expect(response.json()).toEqual({
      items: [
        { id: 1, name: 'Item 1', description: 'First item', created_at: CREATED_AT },
        { id: 2, name: 'Item 2', description: 'Second item', created_at: CREATED_AT },
      ],
      count: 2,
    });
  });

  it('creates an item that can be read back', async () => {
    const created = await app.inject({
      method: 'POST',
      url: '/api/items',
      payload: { name: 'Widget' },
    });

    expect(created.statusCode).toBe(201);
    expect(created.json()).toEqual({ id: 3, name: 'Widget', description: '', created_at: CREATED_AT });

    const fetched = await app.inject({ method: 'GET', url: '/api/items/3' });

    expect(fetched.statusCode).toBe(200);
    expect(fetched.json()).toEqual(created.json());
  });

  it('rejects a create without a name', async () => {
    const response = await app.inject({ method: 'POST', url: '/api/items', payload: {} });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'Name is required' });
  });

  it('rejects a create with no body at all', async () => {
    const response = await app.inject({ method: 'POST', url: '/api/items' });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'Name is required' });
  });

  it('deletes an item so it can no longer be fetched', async () => {
    const deleted = await app.inject({ method: 'DELETE', url: '/api/items/1' });

    expect(deleted.statusCode).toBe(200);
    expect(deleted.json()).toEqual({ message: 'Item 1 deleted successfully' });

    const fetched = await app.inject({ method: 'GET', url: '/api/items/1' });

    expect(fetched.statusCode).toBe(404);
    expect(fetched.json()).toEqual({ error: 'Item not found' });
  });

  it('returns 404 when deleting an item that never existed', async () => {
    const response = await app.inject({ method: 'DELETE', url: '/api/items/999' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'Item not found' });
  });

  it('reports healthy regardless of store contents', async () => {
    await app.inject({ method: 'DELETE', url: '/api/items/1' });
    await app.inject({ method: 'DELETE', url: '/api/items/2' });

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    const body = response.json() as Record<string, unknown>;
    expect(body).toMatchObject({ status: 'healthy', service: 'test-service', version: '9.9.9' });
    expect(typeof body.timestamp).toBe('string');
    expect(new Date(String(body.timestamp)).toISOString()).toBe(body.timestamp);
  });

  it.each(UNROUTABLE_REQUESTS)('answers %s %s with "Endpoint not found"', async (method, url) => {
    const response = await app.inject({ method, url });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'Endpoint not found' });
  });

  it('returns 400 for a malformed JSON body', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/items',
      headers: { 'content-type': 'application/json' },
      payload: '{"name":',
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'Invalid request body' });
  });

  it('treats an empty JSON body as a missing name', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/items',
      headers: { 'content-type': 'application/json' },
      payload: '',
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'Name is required' });
  });

  it('returns 415 for an unsupported content type', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/items',
      headers: { 'content-type': 'application/xml' },
      payload: '<name>Widget</name>',
    });

    expect(response.statusCode).toBe(415);
    expect(response.json()).toEqual({ error: 'Invalid request body' });
  });

  it('hides internal failures behind a generic 500', async () => {
    const broken = await createServer({ store: new BrokenListStore() });

    const response = await broken.inject({ method: 'GET', url: '/api/items' });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ error: 'Internal server error' });
    await broken.close();
  });

  it('tags every response with a fresh correlation id', async () => {
    const first = await app.inject({ method: 'GET', url: '/api/items' });
    const second = await app.inject({ method: 'GET', url: '/api/unknown' });

    const firstId = first.headers['x-correlation-id'];
    const secondId = second.headers['x-correlation-id'];
    expect(firstId).toMatch(UUID_PATTERN);
    expect(secondId).toMatch(UUID_PATTERN);
    expect(firstId).not.toBe(secondId);
  });

  it('ignores a client-supplied correlation id', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/api/items',
      headers: { 'x-correlation-id': 'client-chosen' },
    });

    expect(response.headers['x-correlation-id']).toMatch(UUID_PATTERN);
  });

  it('assigns distinct ids to concurrent creates', async () => {
    const responses = await Promise.all(
      Array.from({ length: 20 }, (_, i) =>
        app.inject({ method: 'POST', url: '/api/items', payload: { name: `parallel-${i}` } })
      )
    );

    const ids = responses.map((response) => (response.json() as Item).id);
    expect(responses.every((response) => response.statusCode === 201)).toBe(true);
    expect(new Set(ids).size).toBe(20);
    expect(Math.min(...ids)).toBe(3);
    expect(Math.max(...ids)).toBe(22);

    const list = await app.inject({ method: 'GET', url: '/api/items' });
    expect((list.json() as { count: number }).count).toBe(22);
  });

  it('counts completed requests by route pattern, method and status', async () => {
    await app.inject({ method: 'GET', url: '/api/items' });
    await app.inject({ method: 'GET', url: '/api/items' });
    await app.inject({ method: 'GET', url: '/api/items/1' });
    await app.inject({ method: 'GET', url: '/api/items/404' });

    const response = await app.inject({ method: 'GET', url: '/metrics' });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('text/plain; version=0.0.4; charset=utf-8');
    const lines = response.body.split('\n');
    expect(lines).toContain('http_requests_total{method="GET",path="/api/items",status="200"} 2');
    expect(lines).toContain('http_requests_total{method="GET",path="/api/items/:id",status="200"} 1');
    expect(lines).toContain('http_requests_total{method="GET",path="/api/items/:id",status="404"} 1');
    expect(lines).toContain('http_request_duration_seconds_count{method="GET",path="/api/items/:id"} 2');
  });

  it('does not record scrapes of the metrics endpoint', async () => {
    await app.inject({ method: 'GET', url: '/metrics' });
    await app.inject({ method: 'GET', url: '/metrics' });

    expect(metrics.snapshot().requests).toEqual([]);
  });

  it('allows cross-origin requests from any origin by default', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/api/items',
      headers: { origin: 'http://example.test' },
    });

    expect(response.headers['access-control-allow-origin']).toBe('http://example.test');
  });
});

describe('items API CORS allow-list', () => {
  it('only reflects configured origins', async () => {
    const app = await createServer({ corsAllowedOrigins: 'http://allowed.test, http://other.test' });

    const allowed = await app.inject({
      method: 'GET',
      url: '/api/items',
      headers: { origin: 'http://allowed.test' },
    });
    const denied = await app.inject({
      method: 'GET',
      url: '/api/items',
      headers: { origin: 'http://denied.test' },
    });

    expect(allowed.headers['access-control-allow-origin']).toBe('http://allowed.test');
    expect(denied.headers['access-control-allow-origin']).toBeUndefined();
    await app.close();
  });
});
