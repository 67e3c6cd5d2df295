// tests/provider-framework.test.ts
// Provider framework - registration, option resolution, invoker construction.

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../src/services/logger.js', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import {
  initializeProviders,
  registerProvider,
  resolveProviderOptions,
  createInvoker,
  getProviderCapabilities,
  getAllProviderCapabilities,
} from '../src/providers/index.js';
import type { AgentDescriptor } from '../src/types/index.js';

const ENV_KEYS = ['SWARM_PROVIDER', 'SWARM_MODEL', 'SWARM_MAX_TOKENS', 'SWARM_TIMEOUT_MS', 'ANTHROPIC_API_KEY'];
const saved: Record<string, string | undefined> = {};

const AGENT: AgentDescriptor = {
  name: 'alpha',
  version: 'v1',
  path: '/agents/alpha.md',
  fileName: 'alpha.md',
  supportsHandoff: false,
  specialties: [],
};

beforeEach(() => {
  for (const key of ENV_KEYS) {
    saved[key] = process.env[key];
    delete process.env[key];
  }
});

afterEach(() => {
  for (const key of ENV_KEYS) {
    const value = saved[key];
    if (value === undefined) delete process.env[key];
    else process.env[key] = value;
  }
});

// ===========================================================================
// Registry
// ===========================================================================

describe('providers - registration', () => {
  it('registers the anthropic backend', () => {
    initializeProviders();
    expect(getProviderCapabilities('anthropic')).toMatchObject({
      name: 'anthropic',
      supportsTokenCounting: true,
      billingModel: 'per-token',
    });
  });

  it('builds invokers from registered factories', async () => {
    registerProvider(
      { name: 'echo', supportsTokenCounting: false, billingModel: 'free', description: 'Echo for tests' },
      (options) => async (agent, prompt) => `${options.model}:${agent.name}:${prompt}`,
    );
    const invoker = createInvoker('echo', { model: 'm1', maxTokens: 10, timeoutMs: 100 });
    await expect(invoker(AGENT, 'hi')).resolves.toBe('m1:alpha:hi');
    expect(getAllProviderCapabilities().map(c => c.name)).toContain('echo');
  });

  it('rejects unknown providers', () => {
    expect(() => createInvoker('nope', { model: 'm', maxTokens: 1, timeoutMs: 1 })).toThrow("Unknown provider 'nope'");
  });
});

// ===========================================================================
// Options
// ===========================================================================

describe('providers - resolveProviderOptions', () => {
  it('uses defaults without env', () => {
    expect(resolveProviderOptions()).toEqual({
      provider: 'anthropic',
      options: { model: 'claude-sonnet-4-20250514', maxTokens: 4096, timeoutMs: 120_000 },
    });
  });

  it('reads overrides and ignores invalid numbers', () => {
    process.env.SWARM_PROVIDER = 'echo';
    process.env.SWARM_MODEL = 'custom-model';
    process.env.SWARM_MAX_TOKENS = '512';
    process.env.SWARM_TIMEOUT_MS = 'soon';
    expect(resolveProviderOptions()).toEqual({
      provider: 'echo',
      options: { model: 'custom-model', maxTokens: 512, timeoutMs: 120_000 },
    });
  });
});

describe('providers - anthropic invoker', () => {
  it('fails fast without an API key', async () => {
    initializeProviders();
    const invoker = createInvoker('anthropic', { model: 'm', maxTokens: 16, timeoutMs: 1000 });
    await expect(invoker(AGENT, 'hi')).rejects.toThrow('ANTHROPIC_API_KEY not set and no apiKey provided');
  });
});
