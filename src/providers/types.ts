// mcp-swarm-orchestrator/src/providers/types.ts
// Provider declarations - how a text-generation backend is configured and described.

import type { AgentInvoker } from '../types/index.js';

/** Billing model for the provider */
export type BillingModel = 'per-token' | 'free' | 'unknown';

export interface ProviderOptions {
  model: string;
  maxTokens: number;
  timeoutMs: number;
  /** Falls back to the provider's environment variable */
  apiKey?: string;
}

/** Builds an invoker bound to one model configuration */
export type InvokerFactory = (options: ProviderOptions) => AgentInvoker;

/** Capabilities declared by a provider backend */
export interface ProviderCapabilities {
  name: string;
  /** Whether the provider returns real token counts from the API */
  supportsTokenCounting: boolean;
  billingModel: BillingModel;
  description: string;
}
