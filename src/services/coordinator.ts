// mcp-swarm-orchestrator/src/services/coordinator.ts
// Entry-point routing: classify a query, ask the adaptive controller whether a
// specialist is worth loading, then pick the strategy and initial agent.

import type { Intent, RoutingDecision, RoutingStrategy } from '../types/index.js';
import { classifyIntent, getKeywordTables } from './intentClassifier.js';
import type { AdaptiveRoutingController } from './adaptiveRouting.js';
import type { AgentRegistry } from './agentRegistry.js';
import { logger } from './logger.js';

/** Single-domain queries up to this complexity need no swarm */
const SINGLE_AGENT_MAX_COMPLEXITY = 3;

export interface RouteOverrides {
  domain?: string;
  complexity?: number;
}

export interface RoutingStats {
  totalRoutes: number;
  strategies: Record<string, number>;
  initialAgents: Record<string, number>;
}

export class Coordinator {
  private readonly routing: AdaptiveRoutingController;
  private readonly registry: AgentRegistry | undefined;
  /** Running tallies; individual decisions are not retained */
  private readonly stats: RoutingStats = { totalRoutes: 0, strategies: {}, initialAgents: {} };

  constructor(routing: AdaptiveRoutingController, registry?: AgentRegistry) {
    this.routing = routing;
    this.registry = registry;
  }

  /** Agent name for a domain, if one is configured (and registered, when a registry is attached) */
  agentForDomain(domain: string): string | undefined {
    const tables = getKeywordTables();
    const candidate = tables.domainAgents[domain] ?? tables.fallbackAgent;
    if (!this.registry) return candidate;
    return this.registry.get(candidate)?.name;
  }

  route(query: string, overrides: RouteOverrides = {}): RoutingDecision {
    const intent = classifyIntent(query);
    const domain = overrides.domain ?? intent.domains[0];
    const complexity = overrides.complexity ?? intent.complexity;
    const decision = this.routing.shouldLoadAgent(domain, complexity);

    const base = {
      domain,
      complexity,
      intent,
      context: buildContext(query, intent),
    };

    let result: RoutingDecision;
    if (!decision.load) {
      result = { ...base, strategy: 'direct', loadAgent: false, reason: decision.reason, agents: [], confidence: intent.confidence };
    } else {
      const domains = overrides.domain ? [domain, ...intent.domains.filter(d => d !== domain)] : intent.domains;
      const agents = [...new Set(domains.map(d => this.agentForDomain(d)).filter((a): a is string => a !== undefined))];
      const initialAgent = agents[0];
      if (initialAgent === undefined) {
        result = {
          ...base,
          strategy: 'direct',
          loadAgent: false,
          reason: `${decision.reason}; no registered agent for domain '${domain}'`,
          agents: [],
          confidence: intent.confidence,
        };
      } else {
        const single = intent.domains.length === 1 && complexity <= SINGLE_AGENT_MAX_COMPLEXITY;
        const strategy: RoutingStrategy = single ? 'single_agent' : 'swarm';
        result = {
          ...base,
          strategy,
          loadAgent: true,
          reason: single
            ? `${decision.reason}; single ${domain} specialist sufficient`
            : `${decision.reason}; ${intent.domains.length} domain(s) at complexity ${complexity}, swarm collaboration recommended`,
          initialAgent,
          agents,
          confidence: Math.round(intent.confidence * (single ? 1 : 0.9) * 100) / 100,
        };
      }
    }

    this.tally(result);
    logger.debug(`[Coordinator] ${result.strategy} → ${result.initialAgent ?? '(none)'}`, { domain, complexity });
    return result;
  }

  private tally(r: RoutingDecision): void {
    const { strategies, initialAgents } = this.stats;
    this.stats.totalRoutes++;
    strategies[r.strategy] = (strategies[r.strategy] ?? 0) + 1;
    if (r.initialAgent) initialAgents[r.initialAgent] = (initialAgents[r.initialAgent] ?? 0) + 1;
  }

  getRoutingStats(): RoutingStats {
    return {
      totalRoutes: this.stats.totalRoutes,
      strategies: { ...this.stats.strategies },
      initialAgents: { ...this.stats.initialAgents },
    };
  }
}

function buildContext(query: string, intent: Intent): Record<string, unknown> {
  return {
    query,
    intent_category: intent.category,
    complexity: intent.complexity,
    entities: intent.entities,
    domains_involved: intent.domains,
  };
}
