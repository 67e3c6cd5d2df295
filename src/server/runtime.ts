// mcp-swarm-orchestrator/src/server/runtime.ts
// Explicit wiring of the orchestration services. Tools and resources receive
// this object instead of reaching for module-level singletons.

import type { AgentInvoker } from '../types/index.js';
import { AgentRegistry } from '../services/agentRegistry.js';
import { SwarmOrchestrator } from '../services/swarmOrchestrator.js';
import { SessionStore } from '../services/sessionStore.js';
import { AdaptiveRoutingController } from '../services/adaptiveRouting.js';
import { AdaptiveHitlGate } from '../services/adaptiveHitl.js';
import { Coordinator } from '../services/coordinator.js';
import { isHandoffsEnabled } from '../services/preferences.js';

export interface SwarmRuntime {
  registry: AgentRegistry;
  sessions: SessionStore;
  orchestrator: SwarmOrchestrator;
  routing: AdaptiveRoutingController;
  hitl: AdaptiveHitlGate;
  coordinator: Coordinator;
  /** Config dir holding preferences.json; data-dir default when unset */
  configDir?: string;
}

export interface RuntimeOptions {
  invoker: AgentInvoker;
  agentsDir?: string;
  sessionsDir?: string;
  stateDir?: string;
  configDir?: string;
  /** Fixed flag; preferences.json is read per execution when unset */
  handoffsEnabled?: boolean;
}

export function createRuntime(options: RuntimeOptions): SwarmRuntime {
  const registry = new AgentRegistry(options.agentsDir);
  const sessions = new SessionStore(options.sessionsDir);
  const routing = new AdaptiveRoutingController({ stateDir: options.stateDir });
  return {
    registry,
    sessions,
    orchestrator: new SwarmOrchestrator({
      registry,
      invoker: options.invoker,
      sessions,
      handoffsEnabled: options.handoffsEnabled ?? (() => isHandoffsEnabled(options.configDir)),
    }),
    routing,
    hitl: new AdaptiveHitlGate({ stateDir: options.stateDir }),
    coordinator: new Coordinator(routing, registry),
    configDir: options.configDir,
  };
}
