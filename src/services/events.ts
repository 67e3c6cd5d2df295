// mcp-swarm-orchestrator/src/services/events.ts
// Central event bus for orchestration lifecycle events.
// Components emit events here; the server layer subscribes to push
// MCP notifications, write to the JSONL log, etc.

import { EventEmitter } from 'node:events';
import type { ActionCategory, TerminationReason } from '../types/index.js';

/** Event types emitted by orchestration subsystems */
export interface SwarmEvents {
  'swarm:started': { contextId: string; initialAgent: string; maxHandoffs: number };
  'swarm:completed': {
    contextId: string;
    initialAgent: string;
    finalAgent: string;
    totalHandoffs: number;
    terminationReason: TerminationReason;
    executionTimeMs: number;
  };
  'swarm:aborted': { contextId: string; agent: string; error: string; totalHandoffs: number };
  'handoff:triggered': { contextId: string; fromAgent: string; toAgent: string; reason: string; hop: number };
  'handoff:completed': { contextId: string; fromAgent: string; toAgent: string; contextSize: number };
  'handoff:suppressed': { contextId: string; fromAgent: string; toAgent: string; reason: string };
  'handoff:blocked': { contextId: string; fromAgent: string; toAgent: string; repeatCount: number };
  'routing:threshold-changed': {
    domain: string;
    oldThreshold: number;
    newThreshold: number;
    reason: string;
    sampleCount: number;
  };
  'hitl:paused': { actionType: string; category: ActionCategory; reason: string; confidence?: number };
  'hitl:decision': { actionType: string; approved: boolean; confidence: number };
}

export type SwarmEventName = keyof SwarmEvents;

/** Canonical list of all event names */
export const ALL_EVENT_NAMES: SwarmEventName[] = [
  'swarm:started', 'swarm:completed', 'swarm:aborted',
  'handoff:triggered', 'handoff:completed', 'handoff:suppressed', 'handoff:blocked',
  'routing:threshold-changed',
  'hitl:paused', 'hitl:decision',
];

class SwarmEventBus extends EventEmitter {
  /** Type-safe emit */
  emitEvent<K extends SwarmEventName>(event: K, data: SwarmEvents[K]): void {
    this.emit(event, data);
  }

  /** Type-safe subscribe */
  onEvent<K extends SwarmEventName>(event: K, handler: (data: SwarmEvents[K]) => void): void {
    this.on(event, handler);
  }

  /** Type-safe unsubscribe */
  offEvent<K extends SwarmEventName>(event: K, handler: (data: SwarmEvents[K]) => void): void {
    this.off(event, handler);
  }
}

/** Singleton event bus */
export const eventBus = new SwarmEventBus();
