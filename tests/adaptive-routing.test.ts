// tests/adaptive-routing.test.ts
// Adaptive routing - load decisions, threshold learning, clamping, reset, degraded mode.

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';

vi.mock('../src/services/logger.js', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import {
  AdaptiveRoutingController,
  clampThreshold,
  decayedSuccessRate,
  generateTaskId,
  replayThreshold,
  BASE_THRESHOLD,
} from '../src/services/adaptiveRouting.js';
import { eventBus } from '../src/services/events.js';
import { InvalidRecordError, LearningStoreUnavailable } from '../src/services/errors.js';
import { MemoryRecordStore } from '../src/services/storage/index.js';
import type { RoutingThreshold, TaskOutcome } from '../src/types/index.js';
import { makeTempDir, cleanupTempDirs } from './helpers/setup.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');
let stateDir: string;
let seq = 0;

beforeEach(() => {
  stateDir = makeTempDir('state-');
  seq = 0;
});

afterEach(() => cleanupTempDirs());

function controller(dir: string = stateDir): AdaptiveRoutingController {
  return new AdaptiveRoutingController({ stateDir: dir, now: () => NOW });
}

/** Memory store whose appends fail while `failing` is set */
class FlakyStore<T> extends MemoryRecordStore<T> {
  failing = false;

  append(record: T): void {
    if (this.failing) throw new LearningStoreUnavailable(this.name, 'disk full');
    super.append(record);
  }
}

/** Outcomes one second apart, newest last */
function outcome(overrides: Partial<TaskOutcome> = {}): TaskOutcome {
  seq++;
  return {
    taskId: `task-${seq}`,
    timestamp: new Date(NOW.getTime() - 3_600_000 + seq * 1000).toISOString(),
    domain: 'general',
    complexity: 3,
    agentUsed: null,
    agentLoaded: false,
    success: true,
    qualityScore: 0.8,
    userCorrections: 0,
    ...overrides,
  };
}

// ===========================================================================
// Load decisions
// ===========================================================================

describe('AdaptiveRoutingController - shouldLoadAgent', () => {
  it('loads at or above the base threshold for a new domain', () => {
    const routing = controller();
    expect(routing.shouldLoadAgent('general', 3)).toEqual({
      load: true,
      reason: 'Complexity 3 >= threshold 3.0 for general',
    });
    expect(routing.shouldLoadAgent('general', 2)).toEqual({
      load: false,
      reason: 'Complexity 2 < threshold 3.0 for general',
    });
  });

  it('creates a threshold record on first use', () => {
    const routing = controller();
    expect(routing.getThreshold('dns')).toEqual({
      domain: 'dns',
      baseThreshold: 3,
      currentThreshold: 3,
      successRate: 0,
      sampleCount: 0,
      lastUpdated: NOW.toISOString(),
    });
    expect(fs.existsSync(path.join(stateDir, 'routing-thresholds.jsonl'))).toBe(true);
  });

  it('mentions learned samples once enough outcomes exist', () => {
    const routing = controller();
    for (let i = 0; i < 5; i++) routing.recordOutcome(outcome());
    expect(routing.shouldLoadAgent('general', 3)).toEqual({
      load: false,
      reason: 'Complexity 3 < threshold 3.1 for general (learned from 5 samples, 100% success)',
    });
  });
});

// ===========================================================================
// Learning
// ===========================================================================

describe('AdaptiveRoutingController - threshold learning', () => {
  it('holds the threshold until five samples exist', () => {
    const routing = controller();
    for (let i = 0; i < 4; i++) routing.recordOutcome(outcome());
    expect(routing.getThreshold('general').currentThreshold).toBe(BASE_THRESHOLD);
  });

  it('raises the threshold after sustained direct successes', () => {
    const routing = controller();
    for (let i = 0; i < 5; i++) routing.recordOutcome(outcome());
    expect(routing.getThreshold('general').currentThreshold).toBe(3.1);
    expect(routing.getThresholdHistory('general')).toEqual([{
      domain: 'general',
      timestamp: NOW.toISOString(),
      oldThreshold: 3,
      newThreshold: 3.1,
      triggerReason: 'Success rate: 100%, samples: 5',
      sampleCount: 5,
    }]);
  });

  it('lowers the threshold after direct failures', () => {
    const routing = controller();
    for (let i = 0; i < 5; i++) routing.recordOutcome(outcome({ success: false }));
    expect(routing.getThreshold('general').currentThreshold).toBe(2.9);
  });

  it('never raises on failure and never lowers on success', () => {
    const routing = controller();
    const pattern = [true, true, true, true, true, false, true, false, false, true, false, true];
    for (const success of pattern) {
      const before = routing.getThreshold('general').currentThreshold;
      routing.recordOutcome(outcome({ success }));
      const after = routing.getThreshold('general').currentThreshold;
      if (success) expect(after).toBeGreaterThanOrEqual(before);
      else expect(after).toBeLessThanOrEqual(before);
    }
  });

  it('leaves the threshold alone when an agent was loaded', () => {
    const routing = controller();
    for (let i = 0; i < 6; i++) routing.recordOutcome(outcome({ agentLoaded: true, agentUsed: 'dns_specialist' }));
    expect(routing.getThreshold('general').currentThreshold).toBe(3);
  });

  it('clamps at the lower bound', () => {
    const routing = controller();
    for (let i = 0; i < 30; i++) routing.recordOutcome(outcome({ success: false }));
    expect(routing.getThreshold('general').currentThreshold).toBe(1);
  });

  it('emits routing:threshold-changed on significant moves', () => {
    const handler = vi.fn();
    eventBus.onEvent('routing:threshold-changed', handler);
    try {
      const routing = controller();
      for (let i = 0; i < 5; i++) routing.recordOutcome(outcome());
    } finally {
      eventBus.offEvent('routing:threshold-changed', handler);
    }
    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({
      domain: 'general', oldThreshold: 3, newThreshold: 3.1, reason: 'Success rate: 100%, samples: 5', sampleCount: 5,
    });
  });

  it('ignores outcomes outside the 30-day window', () => {
    const routing = controller();
    routing.recordOutcome(outcome({ timestamp: new Date(NOW.getTime() - 40 * 24 * 3_600_000).toISOString() }));
    expect(routing.getDomainStats('general').totalTasks).toBe(0);
  });

  it('ignores a duplicate task id', () => {
    const routing = controller();
    const first = outcome();
    expect(routing.recordOutcome(first)).toBe(true);
    expect(routing.recordOutcome({ ...first, success: false })).toBe(false);
    expect(routing.getDomainStats('general').totalTasks).toBe(1);
  });

  it('persists learned thresholds across instances', () => {
    const routing = controller();
    for (let i = 0; i < 5; i++) routing.recordOutcome(outcome());
    expect(controller().getThreshold('general').currentThreshold).toBe(3.1);
  });

  it('keeps every update when two instances record into the same directory', () => {
    const first = controller();
    const second = controller();
    for (let i = 0; i < 5; i++) first.recordOutcome(outcome());
    expect(second.recordOutcome(outcome())).toBe(true);
    expect(first.recordOutcome(outcome())).toBe(true);

    expect(first.getThreshold('general').currentThreshold).toBe(3.3);
    expect(second.getThreshold('general').currentThreshold).toBe(3.3);
  });

  it('rejects an outcome that fails validation without storing it', () => {
    const routing = controller();
    const bad = outcome({ qualityScore: 1.5 });
    expect(() => routing.recordOutcome(bad)).toThrow(InvalidRecordError);
    expect(routing.getDomainStats('general').totalTasks).toBe(0);
    expect(controller().recordOutcome({ ...bad, qualityScore: 0.9 })).toBe(true);
  });

  it('names the failing fields', () => {
    let caught: unknown;
    try {
      controller().recordOutcome(outcome({ userCorrections: -1 }));
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidRecordError);
    if (!(caught instanceof InvalidRecordError)) return;
    expect(caught.issues).toHaveLength(1);
    expect(caught.issues[0]).toMatch(/^userCorrections: /);
  });
});

// ===========================================================================
// Derived thresholds
// ===========================================================================

describe('AdaptiveRoutingController - thresholds derived from the outcome log', () => {
  it('replays outcomes from the base threshold', () => {
    const five = Array.from({ length: 5 }, () => outcome());
    expect(replayThreshold(five)).toEqual({ currentThreshold: 3.1, successRate: 1, sampleCount: 5 });
    expect(replayThreshold([])).toEqual({ currentThreshold: BASE_THRESHOLD, successRate: 0, sampleCount: 0 });
  });

  it('keeps a threshold move when its snapshot cannot be written', () => {
    const thresholds = new FlakyStore<RoutingThreshold>('thresholds', t => t.domain);
    const outcomes = new MemoryRecordStore<TaskOutcome>('outcomes', o => o.taskId);
    const routing = new AdaptiveRoutingController({
      stateDir, outcomes, thresholds, now: () => NOW,
    });
    for (let i = 0; i < 5; i++) routing.recordOutcome(outcome());
    expect(routing.getThreshold('general').currentThreshold).toBe(3.1);

    thresholds.failing = true;
    const sixth = outcome({ taskId: 'x' });
    expect(routing.recordOutcome(sixth)).toBe(true);
    expect(routing.recordOutcome(sixth)).toBe(false);
    expect(outcomes.query()).toHaveLength(6);
    expect(routing.getThreshold('general').currentThreshold).toBe(3.2);

    thresholds.failing = false;
    expect(routing.getThreshold('general').currentThreshold).toBe(3.2);
  });
});

// ===========================================================================
// Reset and stats
// ===========================================================================

describe('AdaptiveRoutingController - reset and stats', () => {
  it('resets a domain to base and records the change', () => {
    const routing = controller();
    for (let i = 0; i < 5; i++) routing.recordOutcome(outcome());
    const reset = routing.resetDomain('general');

    expect(reset?.currentThreshold).toBe(3);
    expect(routing.getThreshold('general').currentThreshold).toBe(3);
    const history = routing.getThresholdHistory('general');
    expect(history[history.length - 1]).toMatchObject({
      oldThreshold: 3.1, newThreshold: 3, triggerReason: 'Manual reset', sampleCount: 0,
    });
  });

  it('summarises a domain window', () => {
    const routing = controller();
    routing.recordOutcome(outcome({ success: true, qualityScore: 0.8, complexity: 2 }));
    routing.recordOutcome(outcome({ success: true, qualityScore: 0.6, complexity: 4, agentLoaded: true, agentUsed: 'x' }));
    routing.recordOutcome(outcome({ success: true, qualityScore: 1, complexity: 6 }));
    routing.recordOutcome(outcome({ success: false, qualityScore: 0.2, complexity: 8 }));

    const stats = routing.getDomainStats('general');
    expect(stats.totalTasks).toBe(4);
    expect(stats.successCount).toBe(3);
    expect(stats.successRate).toBe(75);
    expect(stats.agentUsageRate).toBe(25);
    expect(stats.avgQuality).toBeCloseTo(0.65);
    expect(stats.avgComplexity).toBe(5);
  });

  it('aggregates every known domain', () => {
    const routing = controller();
    routing.shouldLoadAgent('general', 1);
    routing.shouldLoadAgent('dns', 1);
    const all = routing.getAllStats();
    expect(Object.keys(all.domains)).toEqual(['dns', 'general']);
    expect(all.totalDomains).toBe(2);
    expect(all.avgThreshold).toBe(3);
  });
});

// ===========================================================================
// Degraded mode
// ===========================================================================

describe('AdaptiveRoutingController - outcome log unavailable', () => {
  beforeEach(() => {
    fs.mkdirSync(path.join(stateDir, 'routing-outcomes.jsonl'));
  });

  it('falls back to the base threshold', () => {
    expect(controller().shouldLoadAgent('dns', 5)).toEqual({
      load: true,
      reason: 'Complexity 5 >= threshold 3.0 for dns (learning store unavailable, using base threshold)',
    });
  });

  it('reports outcomes as not recorded', () => {
    expect(controller().recordOutcome(outcome())).toBe(false);
  });

  it('reports the store as unavailable', () => {
    expect(controller().isStoreAvailable()).toBe(false);
    expect(controller(makeTempDir('state-')).isStoreAvailable()).toBe(true);
  });

  it('reports base domain stats marked degraded', () => {
    expect(controller().getDomainStats('dns')).toEqual({
      domain: 'dns',
      currentThreshold: 3,
      baseThreshold: 3,
      totalTasks: 0,
      successCount: 0,
      successRate: 0,
      agentUsageRate: 0,
      avgQuality: 0,
      avgComplexity: 0,
      lastUpdated: NOW.toISOString(),
      degraded: true,
    });
  });

  it('reports empty overall stats marked degraded', () => {
    expect(controller().getAllStats()).toEqual({ domains: {}, totalDomains: 0, avgThreshold: 3, degraded: true });
  });

  it('declines a reset instead of throwing', () => {
    expect(controller().resetDomain('dns')).toBeUndefined();
  });
});

describe('AdaptiveRoutingController - derived stores unavailable', () => {
  it('records outcomes while the snapshot file is unusable', () => {
    fs.mkdirSync(path.join(stateDir, 'routing-thresholds.jsonl'));
    const routing = controller();
    expect(routing.recordOutcome(outcome())).toBe(true);
    expect(routing.shouldLoadAgent('general', 3)).toEqual({
      load: true,
      reason: 'Complexity 3 >= threshold 3.0 for general',
    });
    expect(routing.getAllStats().totalDomains).toBe(1);
  });

  it('returns an empty history when the audit log is unusable', () => {
    fs.mkdirSync(path.join(stateDir, 'routing-threshold-history.jsonl'));
    const routing = controller();
    for (let i = 0; i < 5; i++) routing.recordOutcome(outcome());
    expect(routing.getThresholdHistory('general')).toEqual([]);
    expect(routing.getThreshold('general').currentThreshold).toBe(3.1);
  });
});

// ===========================================================================
// Pure helpers
// ===========================================================================

describe('routing helpers', () => {
  it('clamps and rounds thresholds', () => {
    expect(clampThreshold(0.5)).toBe(1);
    expect(clampThreshold(12)).toBe(10);
    expect(clampThreshold(3.14159)).toBe(3.14);
  });

  it('weights recent outcomes more heavily', () => {
    const newestSuccess = [outcome({ success: true }), outcome({ success: false })];
    expect(decayedSuccessRate(newestSuccess)).toBeCloseTo(1 / 1.95);
    expect(decayedSuccessRate([])).toBe(0);
  });

  it('generates prefixed task ids', () => {
    expect(generateTaskId()).toMatch(/^task-[0-9a-f-]{36}$/);
  });
});
