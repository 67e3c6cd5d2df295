// mcp-swarm-orchestrator/src/providers/index.ts
// Provider factory - registers provider backends and builds the configured invoker

import type { AgentInvoker } from '../types/index.js';
import { createAnthropicInvoker } from './anthropic.js';
import { logger } from '../services/logger.js';
import type { InvokerFactory, ProviderCapabilities, ProviderOptions } from './types.js';

const DEFAULT_PROVIDER = 'anthropic';
const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
const DEFAULT_MAX_TOKENS = 4096;
const DEFAULT_TIMEOUT_MS = 120_000;

const factories: Map<string, InvokerFactory> = new Map();
const capabilities: Map<string, ProviderCapabilities> = new Map();

/** Register (or replace) a provider backend */
export function registerProvider(caps: ProviderCapabilities, factory: InvokerFactory): void {
  factories.set(caps.name, factory);
  capabilities.set(caps.name, caps);
}

/** Initialize all provider backends */
export function initializeProviders(): void {
  registerProvider(
    {
      name: 'anthropic',
      supportsTokenCounting: true,
      billingModel: 'per-token',
      description: 'Anthropic Claude API - real token counts, per-token billing',
    },
    createAnthropicInvoker,
  );
  logger.info(`Providers initialized: ${[...factories.keys()].join(', ')}`);
}

/** Provider settings from SWARM_PROVIDER / SWARM_MODEL / SWARM_MAX_TOKENS / SWARM_TIMEOUT_MS */
export function resolveProviderOptions(): { provider: string; options: ProviderOptions } {
  const maxTokens = Number.parseInt(process.env.SWARM_MAX_TOKENS ?? '', 10);
  const timeoutMs = Number.parseInt(process.env.SWARM_TIMEOUT_MS ?? '', 10);
  return {
    provider: process.env.SWARM_PROVIDER || DEFAULT_PROVIDER,
    options: {
      model: process.env.SWARM_MODEL || DEFAULT_MODEL,
      maxTokens: maxTokens > 0 ? maxTokens : DEFAULT_MAX_TOKENS,
      timeoutMs: timeoutMs > 0 ? timeoutMs : DEFAULT_TIMEOUT_MS,
    },
  };
}

/** Build an invoker for a registered provider */
export function createInvoker(provider: string, options: ProviderOptions): AgentInvoker {
  const factory = factories.get(provider);
  if (!factory) {
    throw new Error(`Unknown provider '${provider}'. Registered: ${[...factories.keys()].join(', ') || '(none)'}`);
  }
  return factory(options);
}

export function getProviderCapabilities(name: string): ProviderCapabilities | undefined {
  return capabilities.get(name);
}

export function getAllProviderCapabilities(): ProviderCapabilities[] {
  return Array.from(capabilities.values());
}

export { createAnthropicInvoker } from './anthropic.js';
export type { ProviderCapabilities, ProviderOptions, InvokerFactory, BillingModel } from './types.js';
