// mcp-swarm-orchestrator/src/services/adaptiveRouting.ts
// Adaptive routing - per-domain complexity threshold for loading a specialist agent.
//
// Files under the state dir (append-only):
//   routing-outcomes.jsonl           - one TaskOutcome per line, keyed by taskId
//   routing-resets.jsonl             - ThresholdReset markers, keyed by domain
//   routing-thresholds.jsonl         - RoutingThreshold snapshots, keyed by domain
//   routing-threshold-history.jsonl  - ThresholdChange audit trail
//
// The outcome log is the source of truth. A domain's threshold is the replay of
// its outcomes since the latest reset, starting from BASE_THRESHOLD; snapshots
// and history are derived views. Each replay step, once a domain has
// MIN_SAMPLES outcomes in its window (last 100 within 30 days of the step):
//   failure without an agent, decayed success rate < target  → threshold - step
//   success without an agent, decayed success rate >= target → threshold + step
//   outcomes with an agent loaded leave the threshold alone
// so failures never raise it and successes never lower it.

import * as path from 'path';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type {
  DomainStats,
  LoadDecision,
  RoutingOverview,
  RoutingThreshold,
  TaskOutcome,
  ThresholdChange,
  ThresholdReset,
} from '../types/index.js';
import { createRecordStore, type RecordStore } from './storage/index.js';
import { getStateDir } from './dataDir.js';
import { eventBus } from './events.js';
import { logger } from './logger.js';
import { InvalidRecordError, LearningStoreUnavailable } from './errors.js';

export const THRESHOLD_MIN = 1;
export const THRESHOLD_MAX = 10;
export const BASE_THRESHOLD = 3;
export const LEARNING_RATE = 0.1;
export const MIN_SAMPLES = 5;
export const SUCCESS_TARGET = 0.85;
export const DECAY_FACTOR = 0.95;
export const WINDOW_DAYS = 30;
export const WINDOW_SIZE = 100;
/** Smallest move worth an audit record */
const SIGNIFICANT_CHANGE = 0.05;

const DAY_MS = 24 * 60 * 60 * 1000;

// ---------------------------------------------------------------------------
// Record schemas
// ---------------------------------------------------------------------------

export const TaskOutcomeSchema = z.object({
  taskId: z.string().min(1),
  timestamp: z.string().datetime(),
  query: z.string().optional(),
  domain: z.string().min(1),
  complexity: z.number().finite(),
  agentUsed: z.string().nullable(),
  agentLoaded: z.boolean(),
  success: z.boolean(),
  qualityScore: z.number().min(0).max(1),
  userCorrections: z.number().int().min(0),
});

export const RoutingThresholdSchema = z.object({
  domain: z.string(),
  baseThreshold: z.number(),
  currentThreshold: z.number(),
  successRate: z.number(),
  sampleCount: z.number(),
  lastUpdated: z.string(),
});

export const ThresholdChangeSchema = z.object({
  domain: z.string(),
  timestamp: z.string(),
  oldThreshold: z.number(),
  newThreshold: z.number(),
  triggerReason: z.string(),
  sampleCount: z.number(),
});

export const ThresholdResetSchema = z.object({
  domain: z.string(),
  timestamp: z.string(),
  outcomeCount: z.number().int().min(0),
});

// ---------------------------------------------------------------------------
// Pure helpers
// ---------------------------------------------------------------------------

export function clampThreshold(value: number): number {
  const rounded = Math.round(value * 100) / 100;
  return Math.min(THRESHOLD_MAX, Math.max(THRESHOLD_MIN, rounded));
}

/** Success rate with weight DECAY_FACTOR^i, i = 0 for the newest outcome */
export function decayedSuccessRate(newestFirst: readonly TaskOutcome[]): number {
  let totalWeight = 0;
  let weightedSuccess = 0;
  newestFirst.forEach((o, i) => {
    const w = DECAY_FACTOR ** i;
    totalWeight += w;
    if (o.success) weightedSuccess += w;
  });
  return totalWeight === 0 ? 0 : weightedSuccess / totalWeight;
}

/** Outcomes inside the trailing window ending at `nowMs`, newest first */
export function trailingWindow(outcomes: readonly TaskOutcome[], nowMs: number): TaskOutcome[] {
  const cutoff = nowMs - WINDOW_DAYS * DAY_MS;
  return outcomes
    .filter(o => Date.parse(o.timestamp) > cutoff)
    .sort((a, b) => Date.parse(b.timestamp) - Date.parse(a.timestamp))
    .slice(0, WINDOW_SIZE);
}

export interface ThresholdState {
  currentThreshold: number;
  successRate: number;
  sampleCount: number;
}

export const INITIAL_STATE: ThresholdState = Object.freeze({
  currentThreshold: BASE_THRESHOLD,
  successRate: 0,
  sampleCount: 0,
});

/** Apply the update rule for the last outcome of `history` (append order) */
export function stepThreshold(current: number, history: readonly TaskOutcome[]): ThresholdState {
  const outcome = history[history.length - 1];
  if (outcome === undefined) return { ...INITIAL_STATE, currentThreshold: current };
  const window = trailingWindow(history, Date.parse(outcome.timestamp));
  const successRate = decayedSuccessRate(window);

  let adjustment = 0;
  if (window.length >= MIN_SAMPLES && !outcome.agentLoaded) {
    if (!outcome.success && successRate < SUCCESS_TARGET) {
      adjustment = -LEARNING_RATE;
    } else if (outcome.success && successRate >= SUCCESS_TARGET) {
      adjustment = LEARNING_RATE;
    }
  }
  return { currentThreshold: clampThreshold(current + adjustment), successRate, sampleCount: window.length };
}

/** Threshold after replaying `outcomes` (one domain, append order) from `from` */
export function replayThreshold(
  outcomes: readonly TaskOutcome[],
  from: ThresholdState = INITIAL_STATE,
  alreadyApplied: number = 0,
): ThresholdState {
  let state = from;
  for (let i = alreadyApplied; i < outcomes.length; i++) {
    state = stepThreshold(state.currentThreshold, outcomes.slice(0, i + 1));
  }
  return state;
}

export function generateTaskId(): string {
  return `task-${randomUUID()}`;
}

function pct(n: number): string {
  return `${Math.round(n * 100)}%`;
}

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
}

// ---------------------------------------------------------------------------
// Controller
// ---------------------------------------------------------------------------

export interface AdaptiveRoutingOptions {
  stateDir?: string;
  outcomes?: RecordStore<TaskOutcome>;
  resets?: RecordStore<ThresholdReset>;
  thresholds?: RecordStore<RoutingThreshold>;
  history?: RecordStore<ThresholdChange>;
  now?: () => Date;
}

/** Replay progress for one domain */
interface ReplayCache {
  resetAt: number;
  applied: number;
  state: ThresholdState;
}

export class AdaptiveRoutingController {
  private readonly outcomes: RecordStore<TaskOutcome>;
  private readonly resets: RecordStore<ThresholdReset>;
  private readonly thresholds: RecordStore<RoutingThreshold>;
  private readonly history: RecordStore<ThresholdChange>;
  private readonly now: () => Date;
  private readonly replays = new Map<string, ReplayCache>();

  constructor(options: AdaptiveRoutingOptions = {}) {
    const dir = options.stateDir ?? getStateDir();
    this.outcomes = options.outcomes
      ?? createRecordStore(path.join(dir, 'routing-outcomes.jsonl'), TaskOutcomeSchema, o => o.taskId);
    this.resets = options.resets
      ?? createRecordStore(path.join(dir, 'routing-resets.jsonl'), ThresholdResetSchema, r => r.domain);
    this.thresholds = options.thresholds
      ?? createRecordStore(path.join(dir, 'routing-thresholds.jsonl'), RoutingThresholdSchema, t => t.domain);
    this.history = options.history
      ?? createRecordStore(path.join(dir, 'routing-threshold-history.jsonl'), ThresholdChangeSchema, h => h.domain);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Current threshold for a domain, replayed from the outcome log.
   * A snapshot is persisted the first time a domain is seen.
   * Throws LearningStoreUnavailable when the outcome log cannot be read.
   */
  getThreshold(domain: string): RoutingThreshold {
    const threshold = this.derive(domain);
    try {
      if (!this.thresholds.latest(domain)) {
        this.thresholds.append(threshold);
        logger.debug(`[Routing] Created threshold for '${domain}' at ${threshold.currentThreshold}`);
      }
    } catch (err) {
      if (!(err instanceof LearningStoreUnavailable)) throw err;
      logger.warn(`[Routing] ${err.message}; snapshot for '${domain}' not persisted`);
    }
    return threshold;
  }

  private derive(domain: string): RoutingThreshold {
    const reset = this.resets.latest(domain);
    const resetAt = reset?.outcomeCount ?? 0;
    const since = this.outcomes.query().slice(resetAt).filter(o => o.domain === domain);

    const cached = this.replays.get(domain);
    const state = cached && cached.resetAt === resetAt && cached.applied <= since.length
      ? replayThreshold(since, cached.state, cached.applied)
      : replayThreshold(since);
    this.replays.set(domain, { resetAt, applied: since.length, state });

    const last = since[since.length - 1];
    return {
      domain,
      baseThreshold: BASE_THRESHOLD,
      ...state,
      lastUpdated: last?.timestamp ?? reset?.timestamp ?? this.now().toISOString(),
    };
  }

  shouldLoadAgent(domain: string, complexity: number): LoadDecision {
    let threshold: RoutingThreshold;
    let degraded = false;
    try {
      threshold = this.getThreshold(domain);
    } catch (err) {
      if (!(err instanceof LearningStoreUnavailable)) throw err;
      logger.warn(`[Routing] ${err.message}; using base threshold for '${domain}'`);
      threshold = this.baseThreshold(domain);
      degraded = true;
    }

    const current = threshold.currentThreshold;
    const load = complexity >= current;
    let reason = `Complexity ${complexity} ${load ? '>=' : '<'} threshold ${current.toFixed(1)} for ${domain}`;
    if (degraded) {
      reason += ' (learning store unavailable, using base threshold)';
    } else if (threshold.sampleCount >= MIN_SAMPLES) {
      reason += ` (learned from ${threshold.sampleCount} samples, ${pct(threshold.successRate)} success)`;
    }
    return { load, reason };
  }

  /**
   * Record a finished task. Returns false when the taskId was already
   * recorded or the outcome log is down. Throws InvalidRecordError for
   * an outcome that fails TaskOutcomeSchema.
   */
  recordOutcome(outcome: TaskOutcome): boolean {
    const parsed = TaskOutcomeSchema.safeParse(outcome);
    if (!parsed.success) throw new InvalidRecordError('routing outcome', issuesOf(parsed.error));
    const record = parsed.data;

    let before: RoutingThreshold;
    try {
      if (this.outcomes.latest(record.taskId)) {
        logger.debug(`[Routing] Outcome ${record.taskId} already recorded; ignoring`);
        return false;
      }
      before = this.derive(record.domain);
      this.outcomes.append(record);
    } catch (err) {
      if (!(err instanceof LearningStoreUnavailable)) throw err;
      logger.warn(`[Routing] Outcome ${record.taskId} not recorded: ${err.message}`);
      return false;
    }

    // Snapshot and audit are derived; losing them loses no threshold state
    try {
      const after = this.derive(record.domain);
      if (Math.abs(after.currentThreshold - before.currentThreshold) >= SIGNIFICANT_CHANGE) {
        this.logChange(
          record.domain, before.currentThreshold, after.currentThreshold,
          `Success rate: ${pct(after.successRate)}, samples: ${after.sampleCount}`,
          after.sampleCount,
        );
      }
      this.thresholds.append(after);
    } catch (err) {
      if (!(err instanceof LearningStoreUnavailable)) throw err;
      logger.warn(`[Routing] ${err.message}; '${record.domain}' threshold is recomputed from the outcome log on next read`);
    }
    return true;
  }

  /** Every outcome for a domain inside the window ending now, newest first */
  private windowFor(domain: string): TaskOutcome[] {
    return trailingWindow(this.outcomes.query(o => o.domain === domain), this.now().getTime());
  }

  private logChange(domain: string, oldThreshold: number, newThreshold: number, reason: string, sampleCount: number): void {
    this.history.append({
      domain,
      timestamp: this.now().toISOString(),
      oldThreshold,
      newThreshold,
      triggerReason: reason,
      sampleCount,
    });
    eventBus.emitEvent('routing:threshold-changed', { domain, oldThreshold, newThreshold, reason, sampleCount });
    logger.info(`[Routing] '${domain}' threshold ${oldThreshold} → ${newThreshold} (${reason})`);
  }

  /** Audit trail for a domain; empty when the history log cannot be read */
  getThresholdHistory(domain: string): ThresholdChange[] {
    try {
      return this.history.query(h => h.domain === domain);
    } catch (err) {
      if (!(err instanceof LearningStoreUnavailable)) throw err;
      logger.warn(`[Routing] ${err.message}; no history for '${domain}'`);
      return [];
    }
  }

  /** Window statistics for one domain; percentages are 0-100 */
  getDomainStats(domain: string): DomainStats {
    let threshold: RoutingThreshold;
    let window: TaskOutcome[];
    try {
      threshold = this.getThreshold(domain);
      window = this.windowFor(domain);
    } catch (err) {
      if (!(err instanceof LearningStoreUnavailable)) throw err;
      logger.warn(`[Routing] ${err.message}; reporting base stats for '${domain}'`);
      return { ...this.summarise(this.baseThreshold(domain), []), degraded: true };
    }
    return this.summarise(threshold, window);
  }

  private summarise(threshold: RoutingThreshold, window: readonly TaskOutcome[]): DomainStats {
    const total = window.length;
    const successes = window.filter(o => o.success).length;
    const loaded = window.filter(o => o.agentLoaded).length;
    const avg = (pick: (o: TaskOutcome) => number): number =>
      total ? window.reduce((sum, o) => sum + pick(o), 0) / total : 0;

    return {
      domain: threshold.domain,
      currentThreshold: threshold.currentThreshold,
      baseThreshold: threshold.baseThreshold,
      totalTasks: total,
      successCount: successes,
      successRate: total ? (successes / total) * 100 : 0,
      agentUsageRate: total ? (loaded / total) * 100 : 0,
      avgQuality: avg(o => o.qualityScore),
      avgComplexity: avg(o => o.complexity),
      lastUpdated: threshold.lastUpdated,
    };
  }

  /** Stats for every known domain plus the mean current threshold */
  getAllStats(): RoutingOverview {
    let names: string[];
    try {
      const seen = new Set([
        ...this.outcomes.query().map(o => o.domain),
        ...this.resets.query().map(r => r.domain),
      ]);
      try {
        for (const t of this.thresholds.query()) seen.add(t.domain);
      } catch (err) {
        if (!(err instanceof LearningStoreUnavailable)) throw err;
        logger.warn(`[Routing] ${err.message}; listing domains from the outcome log only`);
      }
      names = [...seen].sort();
    } catch (err) {
      if (!(err instanceof LearningStoreUnavailable)) throw err;
      logger.warn(`[Routing] ${err.message}; no domain stats available`);
      return { domains: {}, totalDomains: 0, avgThreshold: BASE_THRESHOLD, degraded: true };
    }

    const domains: Record<string, DomainStats> = {};
    for (const name of names) domains[name] = this.getDomainStats(name);
    const thresholds = names.map(n => domains[n].currentThreshold);
    return {
      domains,
      totalDomains: names.length,
      avgThreshold: thresholds.length
        ? thresholds.reduce((a, b) => a + b, 0) / thresholds.length
        : BASE_THRESHOLD,
    };
  }

  /** True when every backing store can be read */
  isStoreAvailable(): boolean {
    return [this.outcomes, this.resets, this.thresholds, this.history].every(s => s.isAvailable());
  }

  /**
   * Return a domain to its base threshold; the only path back to base.
   * Undefined when the reset could not be written.
   */
  resetDomain(domain: string): RoutingThreshold | undefined {
    let old: number;
    try {
      old = this.derive(domain).currentThreshold;
      this.resets.append({
        domain,
        timestamp: this.now().toISOString(),
        outcomeCount: this.outcomes.query().length,
      });
    } catch (err) {
      if (!(err instanceof LearningStoreUnavailable)) throw err;
      logger.warn(`[Routing] ${err.message}; '${domain}' not reset`);
      return undefined;
    }

    const reset = this.baseThreshold(domain);
    try {
      this.thresholds.append(reset);
      this.logChange(domain, old, BASE_THRESHOLD, 'Manual reset', 0);
    } catch (err) {
      if (!(err instanceof LearningStoreUnavailable)) throw err;
      logger.warn(`[Routing] ${err.message}; reset of '${domain}' not audited`);
    }
    return reset;
  }

  private baseThreshold(domain: string): RoutingThreshold {
    return {
      domain,
      baseThreshold: BASE_THRESHOLD,
      ...INITIAL_STATE,
      lastUpdated: this.now().toISOString(),
    };
  }
}
