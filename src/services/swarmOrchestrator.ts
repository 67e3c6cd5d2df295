// mcp-swarm-orchestrator/src/services/swarmOrchestrator.ts
// Drives the bounded agent → handoff → agent loop for one execution context.
//
// Per hop: load descriptor → inject context → invoke → parse handoff → decide.
// A hop ends the run when the agent is terminal, declares no handoff, handoffs
// are disabled, or the cycle guard trips. Unknown targets and the hard cap
// abort the run with the chain attached to the error.

import { randomUUID } from 'node:crypto';
import type {
  AgentDescriptor,
  AgentInvoker,
  AgentOutput,
  HandoffDeclaration,
  HandoffHistoryEntry,
  HandoffPathCount,
  HandoffStats,
  SwarmExecutionRequest,
  SwarmExecutionResult,
  SwarmSession,
  SwarmState,
  TerminationReason,
} from '../types/index.js';
import { AgentRegistry, injectContext } from './agentRegistry.js';
import { parseHandoff } from './handoffParser.js';
import { SessionStore, SESSION_VERSION } from './sessionStore.js';
import { isHandoffsEnabled } from './preferences.js';
import { eventBus } from './events.js';
import { logger } from './logger.js';
import { MaxHandoffsExceeded, errorMessage } from './errors.js';

export const DEFAULT_MAX_HANDOFFS = 10;
export const DEFAULT_REPEAT_TOLERANCE = 1;
const TOP_PATHS = 10;
/** Accepted handoffs kept for getHandoffStats */
export const HANDOFF_HISTORY_LIMIT = 1000;
/** Execution contexts whose state getState can still report */
export const TRACKED_CONTEXT_LIMIT = 200;

export interface SwarmOrchestratorOptions {
  registry: AgentRegistry;
  invoker: AgentInvoker;
  sessions?: SessionStore;
  /** Feature flag; read from preferences on every execution when omitted */
  handoffsEnabled?: boolean | (() => boolean);
  maxHandoffs?: number;
  repeatTolerance?: number;
  now?: () => Date;
}

/** SWARM_MAX_HANDOFFS or the default */
export function resolveMaxHandoffs(): number {
  const raw = process.env.SWARM_MAX_HANDOFFS;
  if (!raw) return DEFAULT_MAX_HANDOFFS;
  const n = Number.parseInt(raw, 10);
  if (Number.isInteger(n) && n >= 0) return n;
  logger.warn(`[Swarm] Ignoring SWARM_MAX_HANDOFFS="${raw}"`);
  return DEFAULT_MAX_HANDOFFS;
}

// ---------------------------------------------------------------------------
// Pure helpers
// ---------------------------------------------------------------------------

/**
 * Times the hop `from → to` would repeat earlier traffic: prior hops with the
 * same directed pair, plus one when `to` is the agent that just handed off to
 * `from`. A self-handoff is its own back-edge.
 */
export function repeatCount(chain: readonly HandoffHistoryEntry[], from: string, to: string): number {
  let count = chain.filter(e => e.fromAgent === from && e.toAgent === to).length;
  const last = chain[chain.length - 1];
  if (from === to || (last && last.toAgent === from && last.fromAgent === to)) count++;
  return count;
}

/** Aggregate directed-pair counts; ties keep first-appearance order */
export function computeHandoffStats(entries: readonly HandoffHistoryEntry[]): HandoffStats {
  const paths = new Map<string, HandoffPathCount>();
  for (const e of entries) {
    const key = `${e.fromAgent}\u0000${e.toAgent}`;
    const existing = paths.get(key);
    if (existing) {
      existing.count++;
    } else {
      paths.set(key, { from: e.fromAgent, to: e.toAgent, count: 1 });
    }
  }
  // Array.prototype.sort is stable, so insertion order breaks ties
  const ranked = [...paths.values()].sort((a, b) => b.count - a.count);
  return {
    totalHandoffs: entries.length,
    uniquePaths: paths.size,
    mostCommonHandoffs: ranked.slice(0, TOP_PATHS).map(p => ({ ...p })),
  };
}

/**
 * New context object for the next hop; the previous one is left untouched.
 * The handing-off agent's raw output travels as `<agent>_output`.
 */
export function mergeContext(
  previous: Record<string, unknown>,
  declaration: HandoffDeclaration,
  fromAgent: string,
  output: string,
): Record<string, unknown> {
  return {
    ...previous,
    ...declaration.context,
    [`${fromAgent}_output`]: output,
    _previousAgent: fromAgent,
    _handoffReason: declaration.reason,
  };
}

function contextSize(context: Record<string, unknown>): number {
  return Buffer.byteLength(JSON.stringify(context), 'utf-8');
}

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

interface Completion {
  reason: TerminationReason;
  diagnostic?: string;
  suppressedHandoff?: HandoffDeclaration;
}

export class SwarmOrchestrator {
  private readonly registry: AgentRegistry;
  private readonly invoker: AgentInvoker;
  private readonly sessions: SessionStore;
  private readonly handoffsEnabled: () => boolean;
  private readonly maxHandoffs: number;
  private readonly repeatTolerance: number;
  private readonly now: () => Date;

  /** Most recent accepted handoffs across every execution this instance ran */
  private readonly history: HandoffHistoryEntry[] = [];
  private readonly states = new Map<string, SwarmState>();
  private lastContextId: string | undefined;

  constructor(options: SwarmOrchestratorOptions) {
    this.registry = options.registry;
    this.invoker = options.invoker;
    this.sessions = options.sessions ?? new SessionStore();
    const flag = options.handoffsEnabled;
    this.handoffsEnabled = typeof flag === 'function'
      ? flag
      : flag === undefined ? () => isHandoffsEnabled() : () => flag;
    this.maxHandoffs = options.maxHandoffs ?? resolveMaxHandoffs();
    this.repeatTolerance = options.repeatTolerance ?? DEFAULT_REPEAT_TOLERANCE;
    this.now = options.now ?? (() => new Date());
  }

  /** State of an execution context (the most recent one by default) */
  getState(contextId: string | undefined = this.lastContextId): SwarmState {
    if (contextId === undefined) return { status: 'idle' };
    return this.states.get(contextId) ?? { status: 'idle' };
  }

  getHandoffStats(): HandoffStats {
    return computeHandoffStats(this.history);
  }

  async execute(request: SwarmExecutionRequest): Promise<SwarmExecutionResult> {
    const maxHandoffs = request.maxHandoffs ?? this.maxHandoffs;
    const tolerance = request.repeatTolerance ?? this.repeatTolerance;
    if (!Number.isInteger(maxHandoffs) || maxHandoffs < 0) {
      throw new RangeError(`maxHandoffs must be a non-negative integer, got ${maxHandoffs}`);
    }
    if (!Number.isInteger(tolerance) || tolerance < 1) {
      throw new RangeError(`repeatTolerance must be a positive integer, got ${tolerance}`);
    }

    this.sessions.cleanupStale(undefined, this.now());

    const contextId = request.contextId ?? randomUUID();
    this.sessions.fileFor(contextId); // rejects ids that are not file-safe
    this.lastContextId = contextId;
    const started = Date.now();
    const handoffsEnabled = this.handoffsEnabled();

    const chain: HandoffHistoryEntry[] = [];
    const outputs: AgentOutput[] = [];
    let agent: AgentDescriptor = this.registry.require(request.initialAgent);
    let context: Record<string, unknown> = { ...request.task };
    let handoffReason: string | undefined;
    let lastOutput = '';

    const createdAt = this.now().toISOString();
    const session: SwarmSession = {
      contextId,
      version: SESSION_VERSION,
      initialAgent: agent.name,
      currentAgent: agent.name,
      status: 'running',
      handoffChain: chain,
      createdAt,
      updatedAt: createdAt,
    };
    this.persist(session);

    eventBus.emitEvent('swarm:started', { contextId, initialAgent: agent.name, maxHandoffs });
    logger.info(`[Swarm] ${contextId} started at ${agent.name}`, { handoffsEnabled, maxHandoffs });

    let completion: Completion;
    try {
      for (;;) {
        this.setState(contextId, { status: 'running', agent: agent.name, hop: chain.length });

        const prompt = injectContext(this.registry.load(agent.name), context, handoffReason);
        lastOutput = await this.invoker(agent, prompt);
        outputs.push({ agent: agent.name, output: lastOutput });

        if (!agent.supportsHandoff) {
          completion = { reason: 'terminal-agent' };
          break;
        }

        const parsed = parseHandoff(lastOutput, this.now());
        if (parsed.kind === 'absent') {
          completion = { reason: 'no-handoff' };
          break;
        }
        if (parsed.kind === 'malformed') {
          logger.warn(`[Swarm] ${contextId} malformed handoff from ${agent.name}: ${parsed.reason}`);
          completion = { reason: 'no-handoff', diagnostic: `Malformed handoff ignored: ${parsed.reason}` };
          break;
        }

        const declaration = parsed.declaration;
        if (!handoffsEnabled) {
          eventBus.emitEvent('handoff:suppressed', {
            contextId, fromAgent: agent.name, toAgent: declaration.toAgent, reason: declaration.reason,
          });
          logger.info(`[Swarm] ${contextId} handoff ${agent.name} → ${declaration.toAgent} suppressed (handoffs disabled)`);
          completion = { reason: 'handoffs-disabled', suppressedHandoff: declaration };
          break;
        }

        const target = this.registry.require(declaration.toAgent, {
          chain: [...chain], lastOutput, lastAgent: agent.name,
        });

        const repeats = repeatCount(chain, agent.name, target.name);
        if (repeats >= tolerance) {
          eventBus.emitEvent('handoff:blocked', {
            contextId, fromAgent: agent.name, toAgent: target.name,
            repeatCount: repeats,
          });
          completion = {
            reason: 'cycle-detected',
            diagnostic: `Cycle guard: handoff ${agent.name} → ${target.name} would repeat ` +
              `(repeat tolerance ${tolerance}); returning ${agent.name}'s output`,
          };
          break;
        }

        if (chain.length >= maxHandoffs) {
          throw new MaxHandoffsExceeded(maxHandoffs, {
            chain: [...chain], lastOutput, lastAgent: agent.name, requestedAgent: target.name,
          });
        }

        const entry: HandoffHistoryEntry = {
          fromAgent: agent.name,
          toAgent: target.name,
          reason: declaration.reason,
          contextSize: contextSize(declaration.context),
          timestamp: declaration.timestamp,
        };
        eventBus.emitEvent('handoff:triggered', {
          contextId, fromAgent: entry.fromAgent, toAgent: entry.toAgent, reason: entry.reason, hop: chain.length + 1,
        });
        chain.push(entry);
        this.history.push(entry);
        if (this.history.length > HANDOFF_HISTORY_LIMIT) {
          this.history.splice(0, this.history.length - HANDOFF_HISTORY_LIMIT);
        }

        context = mergeContext(context, declaration, agent.name, lastOutput);
        handoffReason = declaration.reason;
        agent = target;

        session.currentAgent = agent.name;
        session.updatedAt = this.now().toISOString();
        this.persist(session);
        eventBus.emitEvent('handoff:completed', {
          contextId, fromAgent: entry.fromAgent, toAgent: entry.toAgent, contextSize: entry.contextSize,
        });
      }
    } catch (err) {
      const message = errorMessage(err);
      this.setState(contextId, { status: 'aborted', agent: agent.name, error: message });
      session.status = 'aborted';
      session.updatedAt = this.now().toISOString();
      this.persist(session);
      eventBus.emitEvent('swarm:aborted', { contextId, agent: agent.name, error: message, totalHandoffs: chain.length });
      logger.error(`[Swarm] ${contextId} aborted at ${agent.name}: ${message}`);
      throw err;
    }

    this.setState(contextId, { status: 'complete', agent: agent.name, reason: completion.reason });
    session.status = 'complete';
    session.updatedAt = this.now().toISOString();
    this.persist(session);

    const executionTimeMs = Date.now() - started;
    eventBus.emitEvent('swarm:completed', {
      contextId,
      initialAgent: session.initialAgent,
      finalAgent: agent.name,
      totalHandoffs: chain.length,
      terminationReason: completion.reason,
      executionTimeMs,
    });
    logger.info(`[Swarm] ${contextId} complete at ${agent.name} (${completion.reason}, ${chain.length} handoff(s))`);

    return {
      contextId,
      finalOutput: lastOutput,
      initialAgent: session.initialAgent,
      finalAgent: agent.name,
      handoffChain: chain,
      totalHandoffs: chain.length,
      terminationReason: completion.reason,
      ...(completion.diagnostic !== undefined ? { diagnostic: completion.diagnostic } : {}),
      ...(completion.suppressedHandoff ? { suppressedHandoff: completion.suppressedHandoff } : {}),
      intermediateOutputs: outputs,
      context,
      agentsInvolved: [session.initialAgent, ...chain.map(e => e.toAgent)],
      executionTimeMs,
    };
  }

  /** Latest-updated contexts are kept; the oldest fall back to idle */
  private setState(contextId: string, state: SwarmState): void {
    this.states.delete(contextId);
    this.states.set(contextId, state);
    for (const oldest of this.states.keys()) {
      if (this.states.size <= TRACKED_CONTEXT_LIMIT) break;
      this.states.delete(oldest);
    }
  }

  /** Session write failures are logged; they never fail the execution */
  private persist(session: SwarmSession): void {
    try {
      this.sessions.save({ ...session, handoffChain: [...session.handoffChain] });
    } catch (err) {
      logger.warn(`[Swarm] Failed to persist session ${session.contextId}: ${errorMessage(err)}`);
    }
  }
}
