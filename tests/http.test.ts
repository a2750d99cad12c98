import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { once } from 'node:events';
import type { Server } from 'node:http';
import { createApp } from '../src/http.js';
import type { ScheduleService } from '../src/schedule-service.js';
import { FIZIKA, createTestContext } from './helpers/upstream.js';

async function listen(service: ScheduleService): Promise<{ server: Server; baseUrl: string }> {
  const server = createApp(service).listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Expected a TCP address');
  }
  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
}

async function close(server: Server): Promise<void> {
  server.closeAllConnections();
  server.close();
  await once(server, 'close');
}

function postJson(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

describe('createApp', () => {
  let server: Server;
  let baseUrl: string;

  before(async () => {
    ({ server, baseUrl } = await listen(createTestContext().service));
  });

  after(async () => {
    await close(server);
  });

  describe('getFilterOptions', () => {
    it('should answer GET with query parameters', async () => {
      const response = await fetch(
        `${baseUrl}/api/getFilterOptions?group=154479&dateFrom=2025-01-01T00:00:00Z&dateTo=2025-01-31T23:59:59Z`
      );

      assert.strictEqual(response.status, 200);
      const body: unknown = await response.json();
      assert.deepStrictEqual(body, {
        disciplines: [
          { id: 13255091, name: 'Физика' },
          { id: 44380512, name: 'Математика' },
        ],
        locations: [{ id: 90869456, name: 'Корпус 1' }],
        lecturers: [
          { id: 17018911, name: 'Иванов Иван Иванович', short: 'Иванов И.И.' },
          { id: 10070114, name: 'Петров Петр Петрович', short: 'Петров П.П.' },
        ],
      });
    });

    it('should answer 400 for a malformed group', async () => {
      const response = await fetch(`${baseUrl}/api/getFilterOptions?group=abc`);

      assert.strictEqual(response.status, 400);
      const body: unknown = await response.json();
      assert.ok(typeof body === 'object' && body !== null && 'error' in body);
    });
  });

  describe('getRUZ', () => {
    it('should take filters from a JSON body', async () => {
      const response = await postJson(`${baseUrl}/api/getRUZ`, {
        dateFrom: '2025-01-01T00:00:00Z',
        dateTo: '2025-01-31T23:59:59Z',
        filters: { disciplineIds: [FIZIKA] },
      });

      assert.strictEqual(response.status, 200);
      assert.deepStrictEqual(await response.json(), {
        lessons: [
          {
            start: '2025.01.10T10:10Z',
            end: '2025.01.10T11:40Z',
            lecturerInfo: { lecturerId: 17018911, lecturerName: 'Иванов Иван Иванович', lecturerNameShort: 'Иванов И.И.' },
            locationInfo: { locationId: 90869456, locationName: 'Корпус 1', cabinet: '101' },
            disciplineInfo: { disciplineId: FIZIKA, disciplineName: 'Физика' },
            kindOfWork: 'Лекция',
          },
        ],
      });
    });

    it('should take filters as a JSON query parameter on GET', async () => {
      const filters = encodeURIComponent(JSON.stringify({ disciplineIds: [FIZIKA] }));
      const response = await fetch(`${baseUrl}/api/getRUZ?dateFrom=2025-01-01T00:00:00Z&filters=${filters}`);

      assert.strictEqual(response.status, 200);
      const body: unknown = await response.json();
      assert.ok(typeof body === 'object' && body !== null && 'lessons' in body && Array.isArray(body.lessons));
      assert.strictEqual(body.lessons.length, 1);
    });

    it('should answer 400 for filters that are not JSON', async () => {
      const response = await fetch(`${baseUrl}/api/getRUZ?filters=disciplineIds`);

      assert.strictEqual(response.status, 400);
      assert.deepStrictEqual(await response.json(), { error: 'filters must be a JSON object' });
    });
  });

  describe('search', () => {
    it('should report short search strings in the body', async () => {
      const response = await fetch(`${baseUrl}/api/search?searchString=${encodeURIComponent('П')}`);

      assert.strictEqual(response.status, 200);
      assert.deepStrictEqual(await response.json(), {
        result: [],
        error: 'Search string too short, minimum 2 characters',
      });
    });

    it('should reject POST bodies that are not JSON', async () => {
      const response = await fetch(`${baseUrl}/api/search`, {
        method: 'POST',
        headers: { 'Content-Type': 'text/plain' },
        body: 'searchString=ПИ',
      });

      assert.strictEqual(response.status, 400);
      assert.deepStrictEqual(await response.json(), { error: 'Request must be JSON' });
    });

    it('should reject malformed JSON bodies', async () => {
      const response = await fetch(`${baseUrl}/api/search`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"searchString":',
      });

      assert.strictEqual(response.status, 400);
      assert.deepStrictEqual(await response.json(), { error: 'Request must be JSON' });
    });
  });

  describe('cache management', () => {
    it('should reject a clear request whose body is not JSON', async () => {
      const cleared: unknown[] = [];
      const recording: ScheduleService = {
        getFilterOptions: async () => ({ disciplines: [], locations: [], lecturers: [] }),
        getLessons: async () => ({ lessons: [] }),
        search: async () => ({ result: [] }),
        clearCache: async (input) => {
          cleared.push(input);
          return { status: 'success', message: 'All caches cleared' };
        },
        cacheStats: () => ({}),
      };
      const app = await listen(recording);

      try {
        const response = await fetch(`${app.baseUrl}/api/clearCache`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          body: 'group=154479',
        });

        assert.strictEqual(response.status, 400);
        assert.deepStrictEqual(await response.json(), { error: 'Request must be JSON' });
        assert.deepStrictEqual(cleared, []);
      } finally {
        await close(app.server);
      }
    });

    it('should clear everything on an empty POST', async () => {
      const response = await fetch(`${baseUrl}/api/clearCache`, { method: 'POST' });

      assert.strictEqual(response.status, 200);
      assert.deepStrictEqual(await response.json(), { status: 'success', message: 'All caches cleared' });
    });

    it('should clear one group', async () => {
      const response = await postJson(`${baseUrl}/api/clearCache`, { group: 154479 });

      assert.strictEqual(response.status, 200);
      const body: unknown = await response.json();
      assert.ok(typeof body === 'object' && body !== null && 'message' in body);
      assert.strictEqual(body.message, 'Cleared cache entries for group 154479');
    });

    it('should expose counters per namespace', async () => {
      const response = await fetch(`${baseUrl}/api/cacheStats`);

      assert.strictEqual(response.status, 200);
      const body: unknown = await response.json();
      assert.ok(typeof body === 'object' && body !== null);
      assert.deepStrictEqual(Object.keys(body), ['schedule', 'filters', 'lessons', 'search']);
    });
  });

  describe('middleware', () => {
    it('should allow any origin', async () => {
      const response = await fetch(`${baseUrl}/api/cacheStats`, {
        headers: { Origin: 'http://schedule.example' },
      });

      assert.strictEqual(response.status, 200);
      assert.strictEqual(response.headers.get('access-control-allow-origin'), '*');
    });

    it('should gzip successful responses for clients that accept it', async () => {
      const response = await fetch(`${baseUrl}/api/cacheStats`, {
        headers: { 'Accept-Encoding': 'gzip' },
      });

      assert.strictEqual(response.status, 200);
      assert.strictEqual(response.headers.get('content-encoding'), 'gzip');
      const body: unknown = await response.json();
      assert.ok(typeof body === 'object' && body !== null);
      assert.deepStrictEqual(Object.keys(body), ['schedule', 'filters', 'lessons', 'search']);
    });

    it('should not compress for clients that do not accept gzip', async () => {
      const response = await fetch(`${baseUrl}/api/cacheStats`, {
        headers: { 'Accept-Encoding': 'identity' },
      });

      assert.strictEqual(response.status, 200);
      assert.strictEqual(response.headers.get('content-encoding'), null);
    });

    it('should not compress error responses', async () => {
      const response = await fetch(`${baseUrl}/api/getFilterOptions?group=abc`, {
        headers: { 'Accept-Encoding': 'gzip' },
      });

      assert.strictEqual(response.status, 400);
      assert.strictEqual(response.headers.get('content-encoding'), null);
    });
  });

  describe('unexpected failures', () => {
    it('should answer 500 with the error message', async () => {
      const failing: ScheduleService = {
        getFilterOptions: async () => {
          throw new Error('boom');
        },
        getLessons: async () => ({ lessons: [] }),
        search: async () => ({ result: [] }),
        clearCache: async () => ({ status: 'success', message: 'All caches cleared' }),
        cacheStats: () => ({}),
      };
      const app = await listen(failing);

      try {
        const response = await fetch(`${app.baseUrl}/api/getFilterOptions`);

        assert.strictEqual(response.status, 500);
        assert.deepStrictEqual(await response.json(), { error: 'Request processing error: boom' });
      } finally {
        await close(app.server);
      }
    });
  });
});
