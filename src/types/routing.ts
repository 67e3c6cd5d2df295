// mcp-swarm-orchestrator/src/types/routing.ts
// Adaptive routing types - thresholds, outcomes, routing decisions

export interface RoutingThreshold {
  domain: string;
  /** Integer complexity floor a reset returns to */
  baseThreshold: number;
  currentThreshold: number;
  /** Decay-weighted success rate over the trailing window */
  successRate: number;
  sampleCount: number;
  lastUpdated: string;
}

/** Write-once record of a finished task */
export interface TaskOutcome {
  taskId: string;
  timestamp: string;
  query?: string;
  domain: string;
  complexity: number;
  agentUsed: string | null;
  agentLoaded: boolean;
  success: boolean;
  /** 0-1 */
  qualityScore: number;
  userCorrections: number;
}

/** Marks where a domain's threshold replay restarts from base */
export interface ThresholdReset {
  domain: string;
  timestamp: string;
  /** Outcome-log length when the reset was written */
  outcomeCount: number;
}

export interface ThresholdChange {
  domain: string;
  timestamp: string;
  oldThreshold: number;
  newThreshold: number;
  triggerReason: string;
  sampleCount: number;
}

export interface LoadDecision {
  load: boolean;
  reason: string;
}

export interface DomainStats {
  domain: string;
  currentThreshold: number;
  baseThreshold: number;
  totalTasks: number;
  successCount: number;
  /** Percentages, 0-100 */
  successRate: number;
  agentUsageRate: number;
  avgQuality: number;
  avgComplexity: number;
  lastUpdated: string;
  /** True when the learning store could not be read */
  degraded?: boolean;
}

export interface RoutingOverview {
  domains: Record<string, DomainStats>;
  totalDomains: number;
  avgThreshold: number;
  degraded?: boolean;
}

export type IntentCategory =
  | 'technical_question'
  | 'operational_task'
  | 'strategic_planning'
  | 'analysis_research'
  | 'creative_generation';

export interface Intent {
  category: IntentCategory;
  domains: string[];
  /** 1-10 */
  complexity: number;
  confidence: number;
  entities: IntentEntities;
}

export interface IntentEntities {
  domains?: string[];
  numbers?: Array<{ value: number; unit: string }>;
  emails?: string[];
}

export type RoutingStrategy = 'direct' | 'single_agent' | 'swarm';

export interface RoutingDecision {
  strategy: RoutingStrategy;
  loadAgent: boolean;
  reason: string;
  domain: string;
  complexity: number;
  initialAgent?: string;
  /** Agents likely to take part, in domain order */
  agents: string[];
  confidence: number;
  /** Task context to hand to the initial agent */
  context: Record<string, unknown>;
  intent: Intent;
}
