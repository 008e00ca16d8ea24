/**
 * MemoryStore Database Adapter
 * Implements MemoryStoreDb using Supabase
 *
 * Tables: memory_interventions, memory_reflections (see sql/schema.sql).
 * Embeddings are stored as float4[]; similarity is computed in the service
 * layer, so no vector extension is required.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import type { Logger } from '@/lib/logger.js';
import { silentLogger } from '@/lib/logger.js';
import type { Intervention, PurgeCounts, Reflection } from '@/types/index.js';
import { OUTCOMES, StoreUnavailableError } from '@/types/index.js';

import type { MemoryStoreDb } from './memory-store.service.js';
import { recordExpiresAt } from './retention.service.js';

const INTERVENTIONS_TABLE = 'memory_interventions';
const REFLECTIONS_TABLE = 'memory_reflections';

/**
 * Database row schemas
 */
const interventionRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  intervention_text: z.string(),
  context_text: z.string(),
  task_label: z.string(),
  outcome: z.enum(OUTCOMES),
  embedding: z.array(z.coerce.number()),
  created_at: z.string(),
  ttl_ms: z.coerce.number(),
});

const reflectionRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  insight_text: z.string(),
  session_summary: z.string(),
  created_at: z.string(),
  ttl_ms: z.coerce.number(),
});

type InterventionRow = z.infer<typeof interventionRowSchema>;
type ReflectionRow = z.infer<typeof reflectionRowSchema>;

/**
 * Map database row to Intervention entity
 */
function mapRowToIntervention(row: InterventionRow): Intervention {
  return {
    id: row.id,
    userId: row.user_id,
    interventionText: row.intervention_text,
    contextText: row.context_text,
    taskLabel: row.task_label,
    outcome: row.outcome,
    embedding: row.embedding,
    createdAt: new Date(row.created_at),
    ttlMs: row.ttl_ms,
  };
}

/**
 * Map database row to Reflection entity
 */
function mapRowToReflection(row: ReflectionRow): Reflection {
  return {
    id: row.id,
    userId: row.user_id,
    insightText: row.insight_text,
    sessionSummary: row.session_summary,
    createdAt: new Date(row.created_at),
    ttlMs: row.ttl_ms,
  };
}

/**
 * Create MemoryStoreDb implementation using Supabase
 */
export function createSupabaseMemoryStoreDb(
  supabase: SupabaseClient,
  logger: Logger = silentLogger
): MemoryStoreDb {
  function parseRows<Row, T>(
    table: string,
    data: unknown[] | null,
    schema: z.ZodType<Row, z.ZodTypeDef, unknown>,
    map: (row: Row) => T
  ): T[] {
    const records: T[] = [];
    for (const raw of data ?? []) {
      const parsed = schema.safeParse(raw);
      if (parsed.success) {
        records.push(map(parsed.data));
      } else {
        logger.warn('Skipping malformed memory row', {
          table,
          issue: parsed.error.issues[0]?.message,
        });
      }
    }
    return records;
  }

  async function purgeTable(table: string, now: Date): Promise<number> {
    const { data, error } = await supabase
      .from(table)
      .delete()
      .lte('expires_at', now.toISOString())
      .select('id');

    if (error !== null) {
      throw new StoreUnavailableError(`Failed to purge ${table}: ${error.message}`);
    }

    return (data ?? []).length;
  }

  return {
    /**
     * Insert an intervention
     */
    async insertIntervention(intervention: Intervention): Promise<void> {
      const { error } = await supabase.from(INTERVENTIONS_TABLE).insert({
        id: intervention.id,
        user_id: intervention.userId,
        intervention_text: intervention.interventionText,
        context_text: intervention.contextText,
        task_label: intervention.taskLabel,
        outcome: intervention.outcome,
        embedding: intervention.embedding,
        created_at: intervention.createdAt.toISOString(),
        ttl_ms: intervention.ttlMs,
        expires_at: recordExpiresAt(intervention).toISOString(),
      });

      if (error !== null) {
        throw new StoreUnavailableError(`Failed to insert intervention: ${error.message}`);
      }
    },

    /**
     * List a user's interventions that have not expired at `now`
     */
    async listInterventions(
      userId: string,
      now: Date
    ): Promise<Intervention[]> {
      const { data, error } = await supabase
        .from(INTERVENTIONS_TABLE)
        .select('*')
        .eq('user_id', userId)
        .gt('expires_at', now.toISOString())
        .order('created_at', { ascending: true });

      if (error !== null) {
        throw new StoreUnavailableError(`Failed to list interventions: ${error.message}`);
      }

      return parseRows(
        INTERVENTIONS_TABLE,
        data,
        interventionRowSchema,
        mapRowToIntervention
      );
    },

    /**
     * Insert a reflection
     */
    async insertReflection(reflection: Reflection): Promise<void> {
      const { error } = await supabase.from(REFLECTIONS_TABLE).insert({
        id: reflection.id,
        user_id: reflection.userId,
        insight_text: reflection.insightText,
        session_summary: reflection.sessionSummary,
        created_at: reflection.createdAt.toISOString(),
        ttl_ms: reflection.ttlMs,
        expires_at: recordExpiresAt(reflection).toISOString(),
      });

      if (error !== null) {
        throw new StoreUnavailableError(`Failed to insert reflection: ${error.message}`);
      }
    },

    /**
     * List a user's reflections that have not expired at `now`
     */
    async listReflections(userId: string, now: Date): Promise<Reflection[]> {
      const { data, error } = await supabase
        .from(REFLECTIONS_TABLE)
        .select('*')
        .eq('user_id', userId)
        .gt('expires_at', now.toISOString())
        .order('created_at', { ascending: true });

      if (error !== null) {
        throw new StoreUnavailableError(`Failed to list reflections: ${error.message}`);
      }

      return parseRows(
        REFLECTIONS_TABLE,
        data,
        reflectionRowSchema,
        mapRowToReflection
      );
    },

    /**
     * Delete expired rows from both tables
     */
    async purgeExpired(now: Date): Promise<PurgeCounts> {
      const interventions = await purgeTable(INTERVENTIONS_TABLE, now);
      const reflections = await purgeTable(REFLECTIONS_TABLE, now);
      return { interventions, reflections };
    },
  };
}
