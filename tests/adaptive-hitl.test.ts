// tests/adaptive-hitl.test.ts
// Adaptive HITL gate - classification, confidence, pause precedence, learning, degraded mode.

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';

vi.mock('../src/services/logger.js', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { AdaptiveHitlGate, classifyAction, type AdaptiveHitlOptions } from '../src/services/adaptiveHitl.js';
import { eventBus } from '../src/services/events.js';
import { InvalidRecordError } from '../src/services/errors.js';
import { makeTempDir, cleanupTempDirs } from './helpers/setup.js';

const START = new Date('2026-03-01T12:00:00.000Z').getTime();
let clock = START;
let stateDir: string;

beforeEach(() => {
  clock = START;
  stateDir = makeTempDir('state-');
});

afterEach(() => cleanupTempDirs());

function gate(overrides: Partial<AdaptiveHitlOptions> = {}): AdaptiveHitlGate {
  return new AdaptiveHitlGate({ stateDir, now: () => new Date(clock), ...overrides });
}

// ===========================================================================
// Classification
// ===========================================================================

describe('classifyAction', () => {
  it('uses the direct table first', () => {
    expect(classifyAction({ type: 'file_read' })).toBe('safe');
    expect(classifyAction({ type: 'git_push' })).toBe('moderate');
    expect(classifyAction({ type: 'git_reset' })).toBe('destructive');
    expect(classifyAction({ type: 'database_drop' })).toBe('critical');
  });

  it('matches patterns from most to least severe', () => {
    expect(classifyAction({ type: 'force_delete' })).toBe('critical');
    expect(classifyAction({ type: 'drop_query' })).toBe('destructive');
    expect(classifyAction({ type: 'bulk_update' })).toBe('moderate');
    expect(classifyAction({ type: 'readme_export' })).toBe('safe');
  });

  it('defaults unknown types to moderate', () => {
    expect(classifyAction({ type: 'custom_action' })).toBe('moderate');
  });
});

// ===========================================================================
// Confidence
// ===========================================================================

describe('AdaptiveHitlGate - calculateConfidence', () => {
  it('starts from the category base', () => {
    expect(gate().calculateConfidence({ type: 'file_read' })).toBe(0.9);
    expect(gate().calculateConfidence({ type: 'file_write' })).toBe(0.6);
  });

  it('is lower in production than in development', () => {
    const g = gate();
    const production = g.calculateConfidence({ type: 'file_write' }, { environment: 'production' });
    const development = g.calculateConfidence({ type: 'file_write' }, { environment: 'development' });
    expect(production).toBeCloseTo(0.42);
    expect(development).toBeCloseTo(0.66);
    expect(production).toBeLessThan(development);
  });

  it('reduces confidence for high-value targets and paths', () => {
    expect(gate().calculateConfidence({ type: 'file_write', target: 'main' })).toBeCloseTo(0.48);
    expect(gate().calculateConfidence({ type: 'file_write', path: '/srv/prod/app.conf' })).toBeCloseTo(0.48);
  });

  it('clamps an explicit override', () => {
    expect(gate().calculateConfidence({ type: 'file_write', confidenceOverride: 1.5 })).toBe(1);
    expect(gate().calculateConfidence({ type: 'file_write', confidenceOverride: -1 })).toBe(0);
  });

  it('returns the same value on repeated calls', () => {
    const g = gate();
    const first = g.calculateConfidence({ type: 'file_write', environment: 'staging' });
    for (let i = 0; i < 20; i++) {
      expect(g.calculateConfidence({ type: 'file_write', environment: 'staging' })).toBe(first);
    }
    expect(g.shouldPause({ type: 'file_write' }).reason).toBe('High confidence (60%) - proceeding');
  });
});

// ===========================================================================
// Pause decisions
// ===========================================================================

describe('AdaptiveHitlGate - shouldPause', () => {
  it('always pauses critical actions, even without history', () => {
    expect(gate().shouldPause({ type: 'database_drop', target: 'prod_db' })).toEqual({
      pause: true,
      category: 'critical',
      reason: "Critical action 'database_drop' always requires confirmation",
    });
  });

  it('pauses bulk operations at the bulk threshold', () => {
    const g = gate();
    const five = ['a', 'b', 'c', 'd', 'e'];
    expect(g.shouldPause({ type: 'file_read', targets: five })).toEqual({
      pause: true,
      category: 'safe',
      reason: 'Bulk operation affecting 5 items requires confirmation',
    });
    expect(g.shouldPause({ type: 'file_read', targets: five.slice(0, 4) }).pause).toBe(false);
  });

  it('pauses the eleventh action of a type within a minute', () => {
    const g = gate();
    for (let i = 0; i < 10; i++) {
      expect(g.shouldPause({ type: 'file_read' }).pause).toBe(false);
    }
    expect(g.shouldPause({ type: 'file_read' })).toEqual({
      pause: true,
      category: 'safe',
      reason: "Rate limit reached: 11 'file_read' actions within 60s - pausing for confirmation",
    });
    expect(g.shouldPause({ type: 'list_files' }).pause).toBe(false);

    clock += 61_000;
    expect(g.shouldPause({ type: 'file_read' }).pause).toBe(false);
  });

  it('pauses below the confidence threshold', () => {
    const decision = gate().shouldPause({ type: 'file_write', environment: 'production' });
    expect(decision.pause).toBe(true);
    expect(decision.reason).toBe('Confidence 42% below threshold 60% - requesting human confirmation');
  });

  it('proceeds at high confidence', () => {
    expect(gate().shouldPause({ type: 'file_read' })).toEqual({
      pause: false,
      category: 'safe',
      confidence: 0.9,
      reason: 'High confidence (90%) - proceeding',
    });
  });

  it('emits hitl:paused for pauses only', () => {
    const handler = vi.fn();
    eventBus.onEvent('hitl:paused', handler);
    try {
      const g = gate();
      g.shouldPause({ type: 'file_read' });
      g.shouldPause({ type: 'rm_rf' });
    } finally {
      eventBus.offEvent('hitl:paused', handler);
    }
    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith(expect.objectContaining({ actionType: 'rm_rf', category: 'critical' }));
  });

  it('validates its thresholds', () => {
    expect(() => gate({ pauseThreshold: 1.5 })).toThrow(RangeError);
    expect(() => gate({ bulkThreshold: 0 })).toThrow(RangeError);
  });
});

// ===========================================================================
// Learning from decisions
// ===========================================================================

describe('AdaptiveHitlGate - learned confidence', () => {
  it('has no learned confidence without history', () => {
    expect(gate().getLearnedConfidence('custom_action')).toBeUndefined();
  });

  it('rises above 0.5 after repeated approvals', () => {
    const g = gate();
    for (let i = 0; i < 5; i++) g.recordDecision({ type: 'custom_action' }, true);
    const learned = g.getLearnedConfidence('custom_action');
    expect(learned).toBeGreaterThan(0.5);
    expect(learned).toBeCloseTo(0.8467, 3);
  });

  it('falls below 0.5 after repeated rejections', () => {
    const g = gate();
    for (let i = 0; i < 5; i++) g.recordDecision({ type: 'custom_action' }, false);
    const learned = g.getLearnedConfidence('custom_action');
    expect(learned).toBeLessThan(0.5);
    expect(learned).toBeCloseTo(0.1533, 3);
  });

  it('blends learned confidence into the base', () => {
    const g = gate();
    for (let i = 0; i < 5; i++) g.recordDecision({ type: 'custom_action' }, true);
    expect(g.calculateConfidence({ type: 'custom_action' })).toBeCloseTo(0.3 * 0.6 + 0.7 * (5.52438125 / 6.52438125), 6);
  });

  it('keeps decisions per action type', () => {
    const g = gate();
    g.recordDecision({ type: 'file_write' }, false);
    expect(g.getLearnedConfidence('file_read')).toBeUndefined();
  });

  it('persists decisions across instances', () => {
    gate().recordDecision({ type: 'custom_action' }, true, 'looks fine');
    expect(gate().getLearnedConfidence('custom_action')).toBeCloseTo(2 / 3);
  });
});

// ===========================================================================
// Records and stats
// ===========================================================================

describe('AdaptiveHitlGate - records', () => {
  it('stores the decision with its context', () => {
    const record = gate().recordDecision({ type: 'file_write', target: 'notes.md', environment: 'staging' }, true);
    expect(record).toMatchObject({
      actionType: 'file_write',
      target: 'notes.md',
      environment: 'staging',
      approved: true,
      feedback: null,
      confidence: 0.6,
      timestamp: new Date(START).toISOString(),
    });
  });

  it('returns recent decisions newest first', () => {
    const g = gate();
    g.recordDecision({ type: 'a' }, true);
    g.recordDecision({ type: 'b' }, false);
    g.recordDecision({ type: 'c' }, true);
    expect(g.getRecentDecisions(2).map(r => r.actionType)).toEqual(['c', 'b']);
    expect(g.getRecentDecisions(0)).toEqual([]);
  });

  it('summarises approvals', () => {
    const g = gate();
    g.recordDecision({ type: 'a' }, true);
    g.recordDecision({ type: 'a' }, true);
    g.recordDecision({ type: 'a' }, false);
    const stats = g.getStats();
    expect(stats.totalDecisions).toBe(3);
    expect(stats.approvals).toBe(2);
    expect(stats.rejections).toBe(1);
    expect(stats.approvalRate).toBeCloseTo(66.67, 1);
  });

  it('rejects a decision that fails validation without storing it', () => {
    const g = gate();
    expect(() => g.recordDecision({ type: '' }, true)).toThrow(InvalidRecordError);
    expect(() => g.recordDecision({ type: 'file_write', confidenceOverride: Number.NaN }, true)).toThrow(InvalidRecordError);
    expect(g.getStats().totalDecisions).toBe(0);
    expect(gate().getRecentDecisions()).toEqual([]);
  });
});

// ===========================================================================
// Degraded mode
// ===========================================================================

describe('AdaptiveHitlGate - learning store unavailable', () => {
  beforeEach(() => {
    fs.mkdirSync(path.join(stateDir, 'hitl-decisions.jsonl'));
  });

  it('allows ordinary actions and flags the decision as degraded', () => {
    expect(gate().shouldPause({ type: 'file_write', environment: 'production' })).toEqual({
      pause: false,
      category: 'moderate',
      degraded: true,
      reason: 'Learning store unavailable - pausing only for hard-coded critical actions',
    });
  });

  it('still pauses hard-coded critical actions', () => {
    expect(gate().shouldPause({ type: 'git_push_force' }).pause).toBe(true);
  });

  it('does not record decisions', () => {
    expect(gate().recordDecision({ type: 'file_write' }, true)).toBeUndefined();
  });

  it('reports empty stats marked degraded', () => {
    expect(gate().getStats()).toEqual({
      totalDecisions: 0, approvals: 0, rejections: 0, approvalRate: 0, degraded: true,
    });
  });

  it('returns no recent decisions', () => {
    expect(gate().getRecentDecisions(5)).toEqual([]);
  });

  it('reports the store as unavailable', () => {
    expect(gate().isStoreAvailable()).toBe(false);
  });
});
