/**
 * MemoryStore In-Process Adapter
 * Implements MemoryStoreDb with per-user Maps. Used for local runs and tests.
 */

import type { Intervention, PurgeCounts, Reflection } from '@/types/index.js';

import type { MemoryStoreDb } from './memory-store.service.js';
import { recordExpiresAt } from './retention.service.js';

function isLive(record: Intervention | Reflection, now: Date): boolean {
  return now.getTime() < recordExpiresAt(record).getTime();
}

// Stored records are never handed out: callers get copies on the way in and out
function copyIntervention(intervention: Intervention): Intervention {
  return {
    ...intervention,
    embedding: [...intervention.embedding],
    createdAt: new Date(intervention.createdAt.getTime()),
  };
}

function copyReflection(reflection: Reflection): Reflection {
  return {
    ...reflection,
    createdAt: new Date(reflection.createdAt.getTime()),
  };
}

function append<T>(map: Map<string, T[]>, userId: string, record: T): void {
  const existing = map.get(userId);
  if (existing === undefined) {
    map.set(userId, [record]);
  } else {
    existing.push(record);
  }
}

function purge<T extends Intervention | Reflection>(
  map: Map<string, T[]>,
  now: Date
): number {
  let removed = 0;
  for (const [userId, records] of map) {
    const live = records.filter((record) => isLive(record, now));
    removed += records.length - live.length;
    if (live.length === 0) {
      map.delete(userId);
    } else {
      map.set(userId, live);
    }
  }
  return removed;
}

export interface InMemoryMemoryStoreDb extends MemoryStoreDb {
  /** Stored records including expired ones not yet purged */
  size(): PurgeCounts;
}

/**
 * Create MemoryStoreDb implementation backed by process memory
 */
export function createInMemoryMemoryStoreDb(): InMemoryMemoryStoreDb {
  const interventions = new Map<string, Intervention[]>();
  const reflections = new Map<string, Reflection[]>();

  return {
    async insertIntervention(intervention: Intervention): Promise<void> {
      append(interventions, intervention.userId, copyIntervention(intervention));
    },

    async listInterventions(
      userId: string,
      now: Date
    ): Promise<Intervention[]> {
      return (interventions.get(userId) ?? [])
        .filter((i) => isLive(i, now))
        .map(copyIntervention);
    },

    async insertReflection(reflection: Reflection): Promise<void> {
      append(reflections, reflection.userId, copyReflection(reflection));
    },

    async listReflections(userId: string, now: Date): Promise<Reflection[]> {
      return (reflections.get(userId) ?? [])
        .filter((r) => isLive(r, now))
        .map(copyReflection);
    },

    async purgeExpired(now: Date): Promise<PurgeCounts> {
      return {
        interventions: purge(interventions, now),
        reflections: purge(reflections, now),
      };
    },

    size(): PurgeCounts {
      let interventionTotal = 0;
      let reflectionTotal = 0;
      for (const records of interventions.values()) {
        interventionTotal += records.length;
      }
      for (const records of reflections.values()) {
        reflectionTotal += records.length;
      }
      return { interventions: interventionTotal, reflections: reflectionTotal };
    },
  };
}
