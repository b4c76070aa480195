/**
 * HTTP API tests: the real server on an ephemeral port, called with fetch.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { openTaskDb } from '../../store/sqlite.js';
import type { TaskDbHandle } from '../../store/sqlite.js';
import { TaskStore } from '../../store/task-store.js';
import { TaskService } from '../../core/tasks/task-service.js';
import { startHttpServer } from '../server.js';
import type { HttpServerHandle } from '../server.js';

interface ApiResponse {
  status: number;
  body: unknown;
  headers: Headers;
}

describe('HTTP API', () => {
  let db: TaskDbHandle;
  let service: TaskService;
  let server: HttpServerHandle;

  beforeEach(async () => {
    db = openTaskDb(':memory:');
    service = new TaskService(new TaskStore(db.db));
    server = await startHttpServer({ service, host: '127.0.0.1', port: 0 });
  });

  afterEach(async () => {
    await server.close();
    db.close();
  });

  async function call(method: string, path: string, body?: unknown): Promise<ApiResponse> {
    const res = await fetch(`http://${server.host}:${server.port}${path}`, {
      method,
      headers: body === undefined ? undefined : { 'content-type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const text = await res.text();
    const parsed: unknown = text.length > 0 ? JSON.parse(text) : undefined;
    return { status: res.status, body: parsed, headers: res.headers };
  }

  /** Root (id 1) with one child (id 2). */
  function seed(): void {
    service.create({ title: 'root' });
    service.create({ title: 'child' }, 1);
  }

  it('binds an ephemeral port', () => {
    expect(server.port).toBeGreaterThan(0);
  });

  it('GET /health reports ok', async () => {
    const res = await call('GET', '/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok' });
  });

  describe('GET /tasks', () => {
    it('returns an empty list for an empty store', async () => {
      const res = await call('GET', '/tasks');
      expect(res.status).toBe(200);
      expect(res.body).toEqual([]);
    });

    it('returns roots with their descendants', async () => {
      seed();
      const res = await call('GET', '/tasks');
      expect(res.body).toMatchObject([{ id: 1, title: 'root', childs: [{ id: 2, title: 'child', childs: [] }] }]);
    });
  });

  describe('GET /tasks/{id}', () => {
    it('returns the hydrated task', async () => {
      seed();
      const res = await call('GET', '/tasks/2');
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ id: 2, parent: { id: 1, parent: null, childs: [] }, childs: [] });
    });

    it('returns 404 with the error envelope', async () => {
      const res = await call('GET', '/tasks/7');
      expect(res.status).toBe(404);
      expect(res.body).toEqual({
        success: false,
        error: { code: 'E_NOT_FOUND', name: 'NOT_FOUND', message: 'Task not found: 7' },
      });
    });

    it('returns 400 for a malformed escape in the id', async () => {
      const res = await call('GET', '/tasks/%E0');
      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: { code: 'E_INVALID_INPUT' } });
    });

    it('returns 400 for a non-numeric id', async () => {
      const res = await call('GET', '/tasks/abc');
      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: { code: 'E_INVALID_INPUT' } });
    });
  });

  describe('POST /tasks', () => {
    it('creates a root task with 201', async () => {
      const res = await call('POST', '/tasks', { title: '  Write docs  ', description: 'first draft' });
      expect(res.status).toBe(201);
      expect(res.body).toMatchObject({
        id: 1,
        title: 'Write docs',
        description: 'first draft',
        status: false,
        parent: null,
        childs: [],
      });
    });

    it('creates under the parent given in the query', async () => {
      service.create({ title: 'root' });
      const res = await call('POST', '/tasks?parent=1', { title: 'child', status: true });
      expect(res.status).toBe(201);
      expect(res.body).toMatchObject({ id: 2, status: true, parent: { id: 1 } });
      expect(service.show(1).childs.map((c) => c.id)).toEqual([2]);
    });

    it('returns 404 when the parent is absent', async () => {
      const res = await call('POST', '/tasks?parent=9', { title: 'orphan' });
      expect(res.status).toBe(404);
      expect(res.body).toMatchObject({ error: { code: 'E_PARENT_NOT_FOUND' } });
    });

    it('returns 400 for a missing or blank title', async () => {
      expect((await call('POST', '/tasks', {})).status).toBe(400);
      expect((await call('POST', '/tasks', { title: '   ' })).status).toBe(400);
      expect((await call('POST', '/tasks')).status).toBe(400);
    });

    it('returns 400 for a malformed JSON body', async () => {
      const res = await fetch(`http://${server.host}:${server.port}/tasks`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: '{"title":',
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { code: 'E_INVALID_INPUT', message: 'Request body is not valid JSON' },
      });
    });
  });

  describe('PATCH /tasks/{id}', () => {
    it('updates the title', async () => {
      seed();
      const res = await call('PATCH', '/tasks/2', { title: 'renamed' });
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ id: 2, title: 'renamed', parent: { id: 1 } });
    });

    it('returns 400 for an empty update', async () => {
      seed();
      expect((await call('PATCH', '/tasks/2', {})).status).toBe(400);
    });

    it('returns 404 for an unknown task', async () => {
      expect((await call('PATCH', '/tasks/9', { title: 'x' })).status).toBe(404);
    });
  });

  describe('DELETE /tasks', () => {
    it('deletes by query id and returns the snapshot', async () => {
      seed();
      const res = await call('DELETE', '/tasks?id=1');
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ id: 1, childs: [{ id: 2 }] });
      expect((await call('GET', '/tasks/2')).status).toBe(404);
    });

    it('deletes by body id', async () => {
      seed();
      const res = await call('DELETE', '/tasks', { id: 2 });
      expect(res.status).toBe(200);
      expect(service.show(1).childs).toEqual([]);
    });

    it('returns 400 without an id and 404 for an unknown one', async () => {
      expect((await call('DELETE', '/tasks')).status).toBe(400);
      expect((await call('DELETE', '/tasks?id=5')).status).toBe(404);
    });
  });

  describe('POST /tasks/{id}/toggle', () => {
    it('cascades done to children', async () => {
      seed();
      const res = await call('POST', '/tasks/1/toggle?with_childs=true');
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ id: 1, status: true, childs: [{ id: 2, status: true }] });
    });

    it('returns 404 for an unknown task', async () => {
      expect((await call('POST', '/tasks/3/toggle')).status).toBe(404);
    });

    it('returns 400 for an unparseable with_childs', async () => {
      seed();
      expect((await call('POST', '/tasks/1/toggle?with_childs=maybe')).status).toBe(400);
    });
  });

  describe('POST /tasks/{id}/change-parent', () => {
    it('moves a task to the root level', async () => {
      seed();
      const res = await call('POST', '/tasks/2/change-parent', { parent_id: null });
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ id: 2, parent: null });
      expect(service.listRoots().map((r) => r.id)).toEqual([1, 2]);
    });

    it('treats a missing body as a move to the root level', async () => {
      seed();
      const res = await call('POST', '/tasks/2/change-parent');
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ id: 2, parent: null });
    });

    it('returns 400 for a self or descendant parent', async () => {
      seed();
      const self = await call('POST', '/tasks/1/change-parent', { parent_id: 1 });
      const below = await call('POST', '/tasks/1/change-parent', { parent_id: 2 });
      expect(self.status).toBe(400);
      expect(self.body).toMatchObject({ error: { code: 'E_INVALID_PARENT' } });
      expect(below.status).toBe(400);
    });

    it('returns 404 for an unknown task or parent', async () => {
      seed();
      expect((await call('POST', '/tasks/8/change-parent', { parent_id: 1 })).status).toBe(404);
      expect((await call('POST', '/tasks/2/change-parent', { parent_id: 8 })).status).toBe(404);
    });
  });

  describe('routing', () => {
    it('returns 404 for an unknown path', async () => {
      const res = await call('GET', '/nope');
      expect(res.status).toBe(404);
      expect(res.body).toMatchObject({ success: false, error: { code: 'E_NOT_FOUND' } });
    });

    it('returns 405 with an allow header for a wrong method', async () => {
      const res = await call('PUT', '/tasks');
      expect(res.status).toBe(405);
      expect(res.headers.get('allow')).toBe('GET, POST, DELETE');
    });
  });
});
