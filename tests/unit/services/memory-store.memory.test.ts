/**
 * In-Process MemoryStoreDb Unit Tests
 */

import { describe, it, expect } from 'vitest';

import { createInMemoryMemoryStoreDb } from '@/services/memory-store.memory.js';
import type { Intervention, Reflection } from '@/types/index.js';

const T0 = new Date('2024-01-01T00:00:00Z');

function later(ms: number): Date {
  return new Date(T0.getTime() + ms);
}

function intervention(id: string, userId: string, ttlMs: number): Intervention {
  return {
    id,
    userId,
    interventionText: 'Try a timer',
    contextText: 'Stalled',
    taskLabel: 'report',
    outcome: 'task_started',
    embedding: [1, 0],
    createdAt: T0,
    ttlMs,
  };
}

function reflection(id: string, userId: string, ttlMs: number): Reflection {
  return {
    id,
    userId,
    insightText: 'Timers help',
    sessionSummary: '',
    createdAt: T0,
    ttlMs,
  };
}

describe('InMemoryMemoryStoreDb', () => {
  it('should list records per user in insertion order', async () => {
    const db = createInMemoryMemoryStoreDb();
    await db.insertIntervention(intervention('a', 'alice', 5000));
    await db.insertIntervention(intervention('b', 'bob', 5000));
    await db.insertIntervention(intervention('c', 'alice', 5000));

    const listed = await db.listInterventions('alice', T0);

    expect(listed.map((i) => i.id)).toEqual(['a', 'c']);
  });

  it('should leave out expired records when listing', async () => {
    const db = createInMemoryMemoryStoreDb();
    await db.insertReflection(reflection('r1', 'alice', 1000));
    await db.insertReflection(reflection('r2', 'alice', 5000));

    const listed = await db.listReflections('alice', later(1000));

    expect(listed.map((r) => r.id)).toEqual(['r2']);
  });

  it('should store copies of inserted records', async () => {
    const db = createInMemoryMemoryStoreDb();
    const record = intervention('a', 'alice', 5000);
    await db.insertIntervention(record);
    record.taskLabel = 'changed';

    const [stored] = await db.listInterventions('alice', T0);

    expect(stored?.taskLabel).toBe('report');
  });

  it('should purge expired records and report counts', async () => {
    const db = createInMemoryMemoryStoreDb();
    await db.insertIntervention(intervention('a', 'alice', 1000));
    await db.insertIntervention(intervention('b', 'alice', 5000));
    await db.insertIntervention(intervention('c', 'bob', 1000));
    await db.insertReflection(reflection('r', 'bob', 1000));

    expect(db.size()).toEqual({ interventions: 3, reflections: 1 });

    const purged = await db.purgeExpired(later(2000));

    expect(purged).toEqual({ interventions: 2, reflections: 1 });
    expect(db.size()).toEqual({ interventions: 1, reflections: 0 });
    expect(await db.listInterventions('bob', T0)).toEqual([]);
  });
});
