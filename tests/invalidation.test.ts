import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createCache } from '../src/cache.js';
import { filterOptionsKey, lessonsKey, scheduleKey, searchKey } from '../src/cache-keys.js';
import { createInvalidationController } from '../src/invalidation.js';

const january = { start: new Date('2025-01-01T00:00:00Z'), end: new Date('2025-01-31T23:59:59Z') };
const february = { start: new Date('2025-02-01T00:00:00Z'), end: new Date('2025-02-28T23:59:59Z') };

async function seeded() {
  const schedule = createCache<string>({ namespace: 'schedule', timeToLive: 60_000 });
  const filters = createCache<string>({ namespace: 'filters', timeToLive: 60_000 });
  const lessons = createCache<string>({ namespace: 'lessons', timeToLive: 60_000 });
  const search = createCache<string>({ namespace: 'search', timeToLive: 60_000 });

  const main = { kind: 'group', groupId: 154479 } as const;
  const other = { kind: 'group', groupId: 200000 } as const;
  const lecturer = { kind: 'person', personId: 154479 } as const;

  for (const range of [january, february]) {
    await schedule.set(scheduleKey(range, main, 3), 'main');
    await filters.set(filterOptionsKey(range, main, 3), 'main');
    await lessons.set(lessonsKey(range, main, 3, { disciplineIds: [1] }), 'main');
  }
  await schedule.set(scheduleKey(january, other, 3), 'other');
  await filters.set(filterOptionsKey(january, other, 3), 'other');
  await schedule.set(scheduleKey(january, lecturer, 3), 'lecturer');
  await schedule.set(scheduleKey(january, { kind: 'default' }, 3), 'default');
  await search.set(searchKey(1, '154479'), 'search');

  const controller = createInvalidationController({
    caches: [schedule, filters, lessons, search],
    defaultGroupId: 154479,
  });
  return { schedule, filters, lessons, search, controller, main, other, lecturer };
}

describe('createInvalidationController', () => {
  it('should remove every entry of one group and nothing else', async () => {
    const { schedule, filters, lessons, search, controller, main, other, lecturer } = await seeded();

    assert.strictEqual(await controller.clearByGroup(200000), 2);

    assert.strictEqual(await schedule.get(scheduleKey(january, other, 3)), undefined);
    assert.strictEqual(await filters.get(filterOptionsKey(january, other, 3)), undefined);
    assert.strictEqual(await schedule.get(scheduleKey(january, main, 3)), 'main');
    assert.strictEqual(await lessons.get(lessonsKey(february, main, 3, { disciplineIds: [1] })), 'main');
    assert.strictEqual(await schedule.get(scheduleKey(january, lecturer, 3)), 'lecturer');
    assert.strictEqual(await search.get(searchKey(1, '154479')), 'search');
  });

  it('should include default-selector entries for the default group', async () => {
    const { schedule, controller, lecturer } = await seeded();

    assert.strictEqual(await controller.clearByGroup(154479), 7);

    assert.strictEqual(await schedule.get(scheduleKey(january, { kind: 'default' }, 3)), undefined);
    assert.strictEqual(await schedule.get(scheduleKey(january, lecturer, 3)), 'lecturer');
  });

  it('should remove a lecturer without touching the group of the same number', async () => {
    const { schedule, controller, main, lecturer } = await seeded();

    assert.strictEqual(await controller.clearByLecturer(154479), 1);

    assert.strictEqual(await schedule.get(scheduleKey(january, lecturer, 3)), undefined);
    assert.strictEqual(await schedule.get(scheduleKey(january, main, 3)), 'main');
  });

  it('should report zero for unknown ids', async () => {
    const { controller } = await seeded();
    assert.strictEqual(await controller.clearByGroup(1), 0);
  });

  it('should clear every cache on clearAll', async () => {
    const { schedule, filters, lessons, search, controller } = await seeded();

    await controller.clearAll();

    for (const cache of [schedule, filters, lessons, search]) {
      assert.strictEqual(cache.stats().entries, 0);
    }
  });
});
