// mcp-swarm-orchestrator/src/providers/anthropic.ts
// Anthropic Claude provider - runs agent prompts via @anthropic-ai/sdk

import Anthropic from '@anthropic-ai/sdk';
import type { AgentDescriptor, AgentInvoker } from '../types/index.js';
import type { ProviderOptions } from './types.js';
import { logger } from '../services/logger.js';

/** Cached Anthropic client instances keyed by API key */
const clients: Map<string, Anthropic> = new Map();

function getClient(apiKey?: string): Anthropic {
  const key = apiKey || process.env.ANTHROPIC_API_KEY || '';
  if (!key) {
    throw new Error('ANTHROPIC_API_KEY not set and no apiKey provided');
  }

  let client = clients.get(key);
  if (!client) {
    client = new Anthropic({ apiKey: key });
    clients.set(key, client);
  }
  return client;
}

/** Invoker that sends the assembled agent prompt as a single user turn */
export function createAnthropicInvoker(options: ProviderOptions): AgentInvoker {
  return async (agent: AgentDescriptor, prompt: string): Promise<string> => {
    const startTime = Date.now();
    const client = getClient(options.apiKey);

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), options.timeoutMs);
    try {
      const message = await client.messages.create(
        {
          model: options.model,
          max_tokens: options.maxTokens,
          messages: [{ role: 'user', content: prompt }],
        },
        { signal: controller.signal },
      );

      const parts: string[] = [];
      for (const block of message.content) {
        if (block.type === 'text') parts.push(block.text);
      }

      const totalTokens = message.usage.input_tokens + message.usage.output_tokens;
      logger.debug(`Anthropic ${options.model} [${agent.name}]: ${totalTokens} tokens, ${Date.now() - startTime}ms`);
      return parts.join('\n');
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      logger.error(`Anthropic error for ${agent.name}: ${reason}`, { latencyMs: Date.now() - startTime });
      throw err;
    } finally {
      clearTimeout(timer);
    }
  };
}
