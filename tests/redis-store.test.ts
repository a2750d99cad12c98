import { describe, it } from 'node:test';
import assert from 'node:assert';
import { z } from 'zod';
import { createRedisStore } from '../src/stores/redis-store.js';
import { BackingStoreUnavailableError } from '../src/errors.js';
import { FakeRedis } from './helpers/fake-redis.js';

const lessonNames = z.array(z.string());

function setup() {
  const redis = new FakeRedis();
  const store = createRedisStore({ redis, schema: lessonNames, prefix: 'ruz:' });
  return { redis, store };
}

describe('createRedisStore', () => {
  it('should round-trip an entry through SETEX and GET', async () => {
    const { redis, store } = setup();
    const entry = { value: ['Физика', 'Математика'], createdAt: Date.now(), expiresAt: Date.now() + 60_000 };

    await store.set('schedule:k1', entry);

    assert.ok(redis.data.has('ruz:schedule:k1'));
    assert.deepStrictEqual(await store.get('schedule:k1'), entry);
  });

  it('should derive the Redis TTL in whole seconds, rounding up', async () => {
    const { redis, store } = setup();
    const now = Date.now();

    await store.set('k', { value: ['a'], createdAt: now, expiresAt: now + 1_500 });

    const stored = redis.data.get('ruz:k');
    assert.ok(stored);
    const ttl = stored.expiresAt - now;
    assert.ok(ttl >= 2_000 && ttl <= 2_100, `unexpected ttl ${ttl}`);
  });

  it('should not write entries that are already expired', async () => {
    const { redis, store } = setup();
    const now = Date.now();

    await store.set('k', { value: ['a'], createdAt: now - 2_000, expiresAt: now - 1_000 });

    assert.deepStrictEqual(redis.calls, []);
  });

  it('should drop values that fail the schema', async () => {
    const { redis, store } = setup();
    await redis.setex('ruz:k', 60, { value: [1, 2], createdAt: 0, expiresAt: Date.now() + 60_000 });

    assert.strictEqual(await store.get('k'), undefined);
    assert.strictEqual(redis.data.has('ruz:k'), false);
  });

  it('should accept envelopes stored as JSON strings', async () => {
    const { redis, store } = setup();
    const envelope = { value: ['a'], createdAt: 1, expiresAt: Date.now() + 60_000 };
    await redis.setex('ruz:k', 60, JSON.stringify(envelope));

    assert.deepStrictEqual(await store.get('k'), envelope);
  });

  it('should clear keys under its prefix only', async () => {
    const { redis, store } = setup();
    const entry = { value: ['a'], createdAt: Date.now(), expiresAt: Date.now() + 60_000 };
    await store.set('filters:v1:filters:2025.01.01:2025.01.31:g154479:lng3', entry);
    await store.set('filters:v1:filters:2025.01.01:2025.01.31:g200000:lng3', entry);
    await redis.setex('other:filters:x', 60, 'foreign');

    assert.strictEqual(await store.clear('filters:*:g154479:*'), 1);
    assert.strictEqual(await store.has('filters:v1:filters:2025.01.01:2025.01.31:g154479:lng3'), false);
    assert.strictEqual(await store.has('filters:v1:filters:2025.01.01:2025.01.31:g200000:lng3'), true);
    assert.ok(redis.data.has('other:filters:x'));
  });

  it('should leave expiry to Redis on conditional deletes and prune', async () => {
    const { redis, store } = setup();
    const entry = { value: ['a'], createdAt: Date.now(), expiresAt: Date.now() + 60_000 };
    await store.set('k', entry);
    redis.calls.length = 0;

    assert.strictEqual(await store.delete('k', entry.expiresAt), false);
    assert.strictEqual(await store.prune(Date.now()), 0);
    assert.deepStrictEqual(redis.calls, []);
    assert.strictEqual(store.size(), undefined);
  });

  it('should delete unconditionally when no expiry is given', async () => {
    const { store } = setup();
    await store.set('k', { value: ['a'], createdAt: Date.now(), expiresAt: Date.now() + 60_000 });

    assert.strictEqual(await store.delete('k'), true);
    assert.strictEqual(await store.get('k'), undefined);
  });

  it('should wrap client failures in BackingStoreUnavailableError', async () => {
    const { redis, store } = setup();
    redis.failing = true;

    await assert.rejects(store.get('k'), (error: unknown) => {
      assert.ok(error instanceof BackingStoreUnavailableError);
      assert.strictEqual(error.operation, 'GET');
      assert.strictEqual(error.message, 'Redis GET failed: connection refused');
      return true;
    });
  });
});
