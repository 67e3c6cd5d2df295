// mcp-swarm-orchestrator/src/types/hitl.ts
// Human-in-the-loop gate types

export type ActionCategory = 'safe' | 'moderate' | 'destructive' | 'critical';

/** An action an agent intends to perform */
export interface CandidateAction {
  type: string;
  target?: string;
  /** Filesystem path or ref the action touches */
  path?: string;
  environment?: string;
  /** Bulk targets; large lists always pause */
  targets?: string[];
  /** Explicit confidence supplied by the caller */
  confidenceOverride?: number;
}

export interface ActionContext {
  environment?: 'production' | 'staging' | 'development' | string;
}

export interface PauseDecision {
  pause: boolean;
  reason: string;
  category: ActionCategory;
  /** Present when the decision reached the confidence rule */
  confidence?: number;
  /** True when the learning store could not be read */
  degraded?: boolean;
}

/** A resolved human decision */
export interface ActionRecord {
  id: string;
  actionType: string;
  target?: string;
  environment?: string;
  targets?: string[];
  approved: boolean;
  feedback: string | null;
  confidence: number;
  timestamp: string;
}

export interface HitlStats {
  totalDecisions: number;
  approvals: number;
  rejections: number;
  /** Percentage, 0-100 */
  approvalRate: number;
  /** True when the learning store could not be read */
  degraded?: boolean;
}
