/**
 * Memory Domain Types
 *
 * Interventions and reflections are immutable once written. They only
 * disappear through TTL expiry.
 */

/**
 * Closed set of intervention outcomes
 */
export const OUTCOMES = [
  'task_started',
  'task_progress',
  'task_completed',
  're_engaged',
  'distracted',
  'abandoned',
  'unknown',
] as const;

export type Outcome = (typeof OUTCOMES)[number];

/**
 * Outcomes that count as a successful intervention
 */
export const SUCCESSFUL_OUTCOMES: readonly Outcome[] = [
  'task_completed',
  're_engaged',
];

export function isOutcome(value: string): value is Outcome {
  return OUTCOMES.some((outcome) => outcome === value);
}

export type MemoryKind = 'intervention' | 'reflection';

/**
 * Anything carrying a creation time and a time-to-live
 */
export interface Expirable {
  createdAt: Date;
  ttlMs: number;
}

/**
 * A recorded behavioral action and how it resolved
 */
export interface Intervention extends Expirable {
  id: string;
  userId: string;
  interventionText: string;
  contextText: string;
  taskLabel: string;
  outcome: Outcome;
  embedding: number[];
}

/**
 * Short insight synthesized when a session closes
 */
export interface Reflection extends Expirable {
  id: string;
  userId: string;
  insightText: string;
  sessionSummary: string;
}

/**
 * Write payload for an intervention.
 * `outcome` is a plain string here: it is checked against OUTCOMES at the
 * store boundary.
 */
export interface NewIntervention {
  kind: 'intervention';
  userId: string;
  interventionText: string;
  contextText: string;
  taskLabel: string;
  outcome: string;
  embedding: number[];
  /** Overrides the retention default */
  ttlMs?: number;
}

export interface NewReflection {
  kind: 'reflection';
  userId: string;
  insightText: string;
  sessionSummary: string;
  ttlMs?: number;
}

export type NewMemoryRecord = NewIntervention | NewReflection;

/**
 * Intervention fields supplied by callers of the engine
 */
export interface InterventionInput {
  text: string;
  context: string;
  task: string;
  outcome: string;
  ttlMs?: number;
}

export interface ScoredIntervention {
  intervention: Intervention;
  similarity: number;
}

export interface SimilarSuccess {
  interventionText: string;
  contextText: string;
  similarity: number;
}

/**
 * Derived view of a user's history, never persisted
 */
export interface PersonalizationBundle {
  /** Insight texts, most recent first */
  recentReflections: string[];
  interventionCount: number;
  /** Highest similarity first */
  similarSuccesses: SimilarSuccess[];
}

export function emptyBundle(): PersonalizationBundle {
  return { recentReflections: [], interventionCount: 0, similarSuccesses: [] };
}

export interface MemoryStats {
  userId: string;
  interventionCount: number;
  reflectionCount: number;
}

export interface PurgeCounts {
  interventions: number;
  reflections: number;
}

export type TranscriptRole = 'user' | 'assistant' | 'system' | 'tool';

export interface TranscriptTurn {
  role: TranscriptRole;
  content: string;
}
