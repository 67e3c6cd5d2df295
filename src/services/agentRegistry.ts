// mcp-swarm-orchestrator/src/services/agentRegistry.ts
// Discovers agent capability descriptors and turns them into invocable prompts

import * as fs from 'fs';
import * as path from 'path';
import type { AgentDescriptor } from '../types/index.js';
import { logger } from './logger.js';
import { getAgentsDir } from './dataDir.js';
import { AgentNotFoundError, DuplicateAgentError, type ExecutionDiagnostics } from './errors.js';

const DESCRIPTOR_EXT = '.md';
const VERSION_SUFFIX = /_v(\d+)$/i;
const AGENT_SUFFIX = /_agent$/i;
const MAX_CANDIDATES = 10;
const MAX_SPECIALTIES = 8;

/** Prefix marking context keys that are internal metadata */
export const INTERNAL_KEY_PREFIX = '_';

const INTEGRATION_HEADING = /^#{1,6}[ \t]+.*\bIntegration Points\b/m;
const HANDOFF_KEYWORD = 'HANDOFF DECLARATION';

// ---------------------------------------------------------------------------
// Pure helpers
// ---------------------------------------------------------------------------

/**
 * Normalise a descriptor file stem or a requested agent name:
 * `dns_specialist_agent_v2` → `{ name: 'dns_specialist', version: 'v2' }`.
 */
export function normalizeAgentName(raw: string): { name: string; version: string } {
  let stem = raw.trim();
  if (stem.toLowerCase().endsWith(DESCRIPTOR_EXT)) stem = stem.slice(0, -DESCRIPTOR_EXT.length);

  let version = 'v1';
  const versionMatch = VERSION_SUFFIX.exec(stem);
  if (versionMatch) {
    version = `v${versionMatch[1]}`;
    stem = stem.slice(0, versionMatch.index);
  }
  stem = stem.replace(AGENT_SUFFIX, '');
  return { name: stem, version };
}

/** True only when the text has an Integration Points heading and the handoff keyword */
export function checkHandoffCapability(text: string): boolean {
  return INTEGRATION_HEADING.test(text) && text.includes(HANDOFF_KEYWORD);
}

/** Bullets under a `Specialties` heading or bold label */
export function extractSpecialties(text: string): string[] {
  const lines = text.split(/\r?\n/);
  const start = lines.findIndex(l =>
    /^#{1,6}[ \t]+.*\bSpecialties\b/i.test(l) || /^\*\*[^*]*Specialties[^*]*\*\*/i.test(l.trim()),
  );
  if (start === -1) return [];

  const specialties: string[] = [];
  for (const line of lines.slice(start + 1)) {
    const bullet = /^\s*[-*+]\s+(.+)$/.exec(line);
    if (bullet) {
      const item = bullet[1].replace(/\*\*/g, '').trim();
      if (item) specialties.push(item);
      if (specialties.length >= MAX_SPECIALTIES) break;
      continue;
    }
    if (!line.trim() && specialties.length === 0) continue;
    break;
  }
  return specialties;
}

function renderValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value !== null && typeof value === 'object') {
    return '```json\n' + JSON.stringify(value, null, 2) + '\n```';
  }
  return String(value);
}

/**
 * Append a delimited "Context from Previous Agents" block to a descriptor.
 * Keys starting with `_` stay in the context object but are not rendered.
 */
export function injectContext(
  prompt: string,
  context: Record<string, unknown>,
  handoffReason?: string,
): string {
  const entries = Object.entries(context).filter(([key]) => !key.startsWith(INTERNAL_KEY_PREFIX));
  const reason = handoffReason?.trim();
  if (entries.length === 0 && !reason) return prompt;

  const parts: string[] = ['---', '## Context from Previous Agents'];
  if (reason) parts.push(`**Handoff reason:** ${reason}`);
  for (const [key, value] of entries) {
    parts.push(`### ${key}\n\n${renderValue(value)}`);
  }
  parts.push('---');
  return `${prompt.trimEnd()}\n\n${parts.join('\n\n')}\n`;
}

function walkDescriptors(dir: string): string[] {
  const files: string[] = [];
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...walkDescriptors(full));
    } else if (entry.isFile() && entry.name.toLowerCase().endsWith(DESCRIPTOR_EXT)) {
      files.push(full);
    }
  }
  return files;
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

/** Name → descriptor map built once from the descriptor directory */
export class AgentRegistry {
  readonly agentsDir: string;
  private agents: Map<string, AgentDescriptor> = new Map();
  /** Descriptor text as read by the last scan */
  private texts: Map<string, string> = new Map();

  constructor(agentsDir: string = getAgentsDir()) {
    this.agentsDir = agentsDir;
    this.scan();
  }

  /** Rebuild the registry from disk */
  scan(): void {
    const next = new Map<string, AgentDescriptor>();
    const texts = new Map<string, string>();
    if (!fs.existsSync(this.agentsDir)) {
      logger.warn(`[AgentRegistry] Descriptor directory not found: ${this.agentsDir}`);
      this.agents = next;
      this.texts = texts;
      return;
    }

    for (const file of walkDescriptors(this.agentsDir).sort()) {
      const fileName = path.basename(file);
      const { name, version } = normalizeAgentName(fileName);
      const existing = next.get(name);
      if (existing) {
        throw new DuplicateAgentError(name, [existing.path, file]);
      }
      const text = fs.readFileSync(file, 'utf-8');
      texts.set(name, text);
      next.set(name, Object.freeze({
        name,
        version,
        path: file,
        fileName,
        supportsHandoff: checkHandoffCapability(text),
        specialties: Object.freeze(extractSpecialties(text)),
      }));
    }

    this.agents = next;
    this.texts = texts;
    logger.info(`[AgentRegistry] Scanned ${next.size} agent(s) from ${this.agentsDir}`);
  }

  /** Descriptor by exact or normalisable name */
  get(name: string): AgentDescriptor | undefined {
    return this.agents.get(name) ?? this.agents.get(normalizeAgentName(name).name);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  /** All descriptors, alphabetical by name */
  list(): AgentDescriptor[] {
    return [...this.agents.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  get count(): number {
    return this.agents.size;
  }

  /** Descriptor or AgentNotFoundError with closest candidates */
  require(name: string, diagnostics?: ExecutionDiagnostics): AgentDescriptor {
    const agent = this.get(name);
    if (!agent) throw new AgentNotFoundError(name, this.suggest(name), diagnostics);
    return agent;
  }

  /** Full descriptor text as scanned; edits on disk apply after the next scan() */
  load(name: string, diagnostics?: ExecutionDiagnostics): string {
    return this.texts.get(this.require(name, diagnostics).name) ?? '';
  }

  /** Up to 10 names, alphabetical: substring-related ones first, else all */
  suggest(name: string): string[] {
    const target = normalizeAgentName(name).name.toLowerCase();
    const names = [...this.agents.keys()].sort();
    const related = target
      ? names.filter(n => n.toLowerCase().includes(target) || target.includes(n.toLowerCase()))
      : [];
    return (related.length > 0 ? related : names).slice(0, MAX_CANDIDATES);
  }
}
