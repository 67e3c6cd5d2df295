// mcp-swarm-orchestrator/src/services/adaptiveHitl.ts
// Adaptive human-in-the-loop gate - decides whether an action needs confirmation
// and learns per-type confidence from recorded human decisions.
//
// Pause precedence (first match wins):
//   1. critical category
//   2. bulk target list (targets.length >= bulkThreshold)
//   3. rate limit (more than 10 actions of one type within 60 s)
//   4. confidence < pauseThreshold

import * as path from 'path';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type {
  ActionCategory,
  ActionContext,
  ActionRecord,
  CandidateAction,
  HitlStats,
  PauseDecision,
} from '../types/index.js';
import { createRecordStore, type RecordStore } from './storage/index.js';
import { getStateDir } from './dataDir.js';
import { eventBus } from './events.js';
import { logger } from './logger.js';
import { InvalidRecordError, LearningStoreUnavailable } from './errors.js';

export const DEFAULT_PAUSE_THRESHOLD = 0.6;
export const DEFAULT_BULK_THRESHOLD = 5;
export const RATE_LIMIT_MAX = 10;
export const RATE_LIMIT_WINDOW_MS = 60_000;
export const LEARNING_WINDOW = 50;
export const DECISION_DECAY = 0.95;

export const BASE_CONFIDENCE: Record<ActionCategory, number> = {
  safe: 0.9,
  moderate: 0.6,
  destructive: 0.3,
  critical: 0.1,
};

/** Paused even when the learning store is down */
export const ALWAYS_PAUSE: readonly string[] = [
  'git_push_force',
  'database_drop',
  'rm_rf',
  'format_disk',
  'delete_branch_main',
  'delete_branch_master',
];

const ACTION_CATEGORIES: Record<string, ActionCategory> = {
  file_read: 'safe',
  list_files: 'safe',
  search: 'safe',
  query: 'safe',
  get: 'safe',

  file_write: 'moderate',
  file_create: 'moderate',
  update: 'moderate',
  insert: 'moderate',
  git_commit: 'moderate',
  git_push: 'moderate',

  file_delete: 'destructive',
  delete: 'destructive',
  remove: 'destructive',
  git_reset: 'destructive',

  truncate: 'critical',
  format: 'critical',
  ...Object.fromEntries(ALWAYS_PAUSE.map(t => [t, 'critical' as const])),
};

// Most severe first, so `force_delete` is critical and `drop_query` destructive
const CATEGORY_PATTERNS: ReadonlyArray<[ActionCategory, readonly string[]]> = [
  ['critical', ['force', 'reset_hard', 'truncate']],
  ['destructive', ['delete', 'remove', 'drop']],
  ['moderate', ['write', 'create', 'update', 'insert']],
  ['safe', ['read', 'get', 'list', 'search', 'query']],
];

const HIGH_VALUE_TARGET = /prod|main|master/i;

export const ActionRecordSchema = z.object({
  id: z.string(),
  actionType: z.string().min(1),
  target: z.string().optional(),
  environment: z.string().optional(),
  targets: z.array(z.string()).optional(),
  approved: z.boolean(),
  feedback: z.string().nullable(),
  confidence: z.number().min(0).max(1),
  timestamp: z.string().datetime(),
});

function clamp01(n: number): number {
  return Math.min(1, Math.max(0, n));
}

function pct(n: number): string {
  return `${Math.round(n * 100)}%`;
}

/** Deterministic category for an action type */
export function classifyAction(action: Pick<CandidateAction, 'type'>): ActionCategory {
  const type = action.type.trim().toLowerCase();
  const direct = ACTION_CATEGORIES[type];
  if (direct) return direct;
  for (const [category, needles] of CATEGORY_PATTERNS) {
    if (needles.some(n => type.includes(n))) return category;
  }
  return 'moderate';
}

// ---------------------------------------------------------------------------
// Gate
// ---------------------------------------------------------------------------

export interface AdaptiveHitlOptions {
  stateDir?: string;
  decisions?: RecordStore<ActionRecord>;
  pauseThreshold?: number;
  bulkThreshold?: number;
  now?: () => Date;
}

interface ConfidenceDetail {
  confidence: number;
  degraded: boolean;
}

export class AdaptiveHitlGate {
  readonly pauseThreshold: number;
  readonly bulkThreshold: number;
  private readonly decisions: RecordStore<ActionRecord>;
  private readonly now: () => Date;
  /** Attempt timestamps (ms) per action type, for the rate limit */
  private readonly attempts = new Map<string, number[]>();

  constructor(options: AdaptiveHitlOptions = {}) {
    const pauseThreshold = options.pauseThreshold ?? DEFAULT_PAUSE_THRESHOLD;
    const bulkThreshold = options.bulkThreshold ?? DEFAULT_BULK_THRESHOLD;
    if (pauseThreshold < 0 || pauseThreshold > 1) {
      throw new RangeError(`pauseThreshold must be within [0, 1], got ${pauseThreshold}`);
    }
    if (!Number.isInteger(bulkThreshold) || bulkThreshold < 1) {
      throw new RangeError(`bulkThreshold must be a positive integer, got ${bulkThreshold}`);
    }
    this.pauseThreshold = pauseThreshold;
    this.bulkThreshold = bulkThreshold;
    this.decisions = options.decisions
      ?? createRecordStore(
        path.join(options.stateDir ?? getStateDir(), 'hitl-decisions.jsonl'),
        ActionRecordSchema,
        r => r.id,
      );
    this.now = options.now ?? (() => new Date());
  }

  classifyAction(action: Pick<CandidateAction, 'type'>): ActionCategory {
    return classifyAction(action);
  }

  /**
   * Decay-weighted approval ratio over the last 50 decisions of a type, with a
   * uniform prior: (Σw·approved + 1) / (Σw + 2). Undefined without history.
   * Throws LearningStoreUnavailable when the store cannot be read.
   */
  getLearnedConfidence(actionType: string): number | undefined {
    const history = this.decisions
      .query(r => r.actionType === actionType)
      .slice(-LEARNING_WINDOW)
      .reverse();
    if (history.length === 0) return undefined;

    let total = 0;
    let approved = 0;
    history.forEach((r, i) => {
      const w = DECISION_DECAY ** i;
      total += w;
      if (r.approved) approved += w;
    });
    return (approved + 1) / (total + 2);
  }

  /** Confidence in [0, 1]; does not touch rate-limit state */
  calculateConfidence(action: CandidateAction, context?: ActionContext): number {
    return this.confidenceDetail(action, context).confidence;
  }

  private confidenceDetail(action: CandidateAction, context?: ActionContext): ConfidenceDetail {
    if (action.confidenceOverride !== undefined) {
      return { confidence: clamp01(action.confidenceOverride), degraded: false };
    }

    let confidence = BASE_CONFIDENCE[classifyAction(action)];
    let degraded = false;
    try {
      const learned = this.getLearnedConfidence(action.type);
      if (learned !== undefined) confidence = 0.3 * confidence + 0.7 * learned;
    } catch (err) {
      if (!(err instanceof LearningStoreUnavailable)) throw err;
      degraded = true;
    }

    const environment = context?.environment ?? action.environment;
    if (environment === 'production') {
      confidence *= 0.7;
    } else if (environment === 'development') {
      confidence *= 1.1;
    }
    if ([action.target, action.path].some(s => s !== undefined && HIGH_VALUE_TARGET.test(s))) {
      confidence *= 0.8;
    }
    return { confidence: clamp01(confidence), degraded };
  }

  /** Registers an attempt and reports whether the type is over the limit */
  private checkRateLimit(actionType: string): number | undefined {
    const nowMs = this.now().getTime();
    const recent = (this.attempts.get(actionType) ?? []).filter(t => nowMs - t < RATE_LIMIT_WINDOW_MS);
    recent.push(nowMs);
    this.attempts.set(actionType, recent);
    return recent.length > RATE_LIMIT_MAX ? recent.length : undefined;
  }

  shouldPause(action: CandidateAction, context?: ActionContext): PauseDecision {
    const decision = this.decide(action, context);
    if (decision.pause) {
      eventBus.emitEvent('hitl:paused', {
        actionType: action.type,
        category: decision.category,
        reason: decision.reason,
        confidence: decision.confidence,
      });
    }
    logger.debug(`[HITL] ${action.type}: ${decision.reason}`);
    return decision;
  }

  private decide(action: CandidateAction, context?: ActionContext): PauseDecision {
    const category = classifyAction(action);

    if (category === 'critical') {
      return { pause: true, category, reason: `Critical action '${action.type}' always requires confirmation` };
    }

    const targets = action.targets ?? [];
    if (targets.length >= this.bulkThreshold) {
      return { pause: true, category, reason: `Bulk operation affecting ${targets.length} items requires confirmation` };
    }

    const rate = this.checkRateLimit(action.type);
    if (rate !== undefined) {
      return {
        pause: true,
        category,
        reason: `Rate limit reached: ${rate} '${action.type}' actions within ${RATE_LIMIT_WINDOW_MS / 1000}s - pausing for confirmation`,
      };
    }

    const { confidence, degraded } = this.confidenceDetail(action, context);
    if (degraded) {
      logger.warn(`[HITL] Learning store unavailable; '${action.type}' allowed without learned confidence`);
      return {
        pause: ALWAYS_PAUSE.includes(action.type),
        category,
        degraded: true,
        reason: 'Learning store unavailable - pausing only for hard-coded critical actions',
      };
    }
    if (confidence < this.pauseThreshold) {
      return {
        pause: true,
        category,
        confidence,
        reason: `Confidence ${pct(confidence)} below threshold ${pct(this.pauseThreshold)} - requesting human confirmation`,
      };
    }
    return { pause: false, category, confidence, reason: `High confidence (${pct(confidence)}) - proceeding` };
  }

  /**
   * Record a human decision. Returns the stored record, or undefined when the
   * learning store is unavailable. Throws InvalidRecordError for a record
   * that fails ActionRecordSchema.
   */
  recordDecision(action: CandidateAction, approved: boolean, feedback?: string): ActionRecord | undefined {
    const confidence = this.calculateConfidence(action);
    const parsed = ActionRecordSchema.safeParse({
      id: randomUUID(),
      actionType: action.type,
      ...(action.target !== undefined ? { target: action.target } : {}),
      ...(action.environment !== undefined ? { environment: action.environment } : {}),
      ...(action.targets !== undefined ? { targets: [...action.targets] } : {}),
      approved,
      feedback: feedback ?? null,
      confidence,
      timestamp: this.now().toISOString(),
    });
    if (!parsed.success) {
      throw new InvalidRecordError(
        'HITL decision',
        parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`),
      );
    }
    const record = parsed.data;
    try {
      this.decisions.append(record);
    } catch (err) {
      if (!(err instanceof LearningStoreUnavailable)) throw err;
      logger.warn(`[HITL] Decision for '${action.type}' not recorded: ${err.message}`);
      return undefined;
    }
    eventBus.emitEvent('hitl:decision', { actionType: action.type, approved, confidence });
    return record;
  }

  /** Newest first; empty when the learning store cannot be read */
  getRecentDecisions(limit: number = 50): ActionRecord[] {
    if (limit <= 0) return [];
    try {
      return this.decisions.query().slice(-limit).reverse();
    } catch (err) {
      if (!(err instanceof LearningStoreUnavailable)) throw err;
      logger.warn(`[HITL] ${err.message}; no recent decisions`);
      return [];
    }
  }

  isStoreAvailable(): boolean {
    return this.decisions.isAvailable();
  }

  getStats(): HitlStats {
    let all: ActionRecord[];
    try {
      all = this.decisions.query();
    } catch (err) {
      if (!(err instanceof LearningStoreUnavailable)) throw err;
      logger.warn(`[HITL] ${err.message}; reporting empty stats`);
      return { totalDecisions: 0, approvals: 0, rejections: 0, approvalRate: 0, degraded: true };
    }
    const approvals = all.filter(r => r.approved).length;
    return {
      totalDecisions: all.length,
      approvals,
      rejections: all.length - approvals,
      approvalRate: all.length ? (approvals / all.length) * 100 : 0,
    };
  }
}
