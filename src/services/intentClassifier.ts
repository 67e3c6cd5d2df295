// mcp-swarm-orchestrator/src/services/intentClassifier.ts
// Keyword/pattern intent classification for incoming queries.
// Keyword tables live in data/intent-keywords.json.

import * as fs from 'fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { Intent, IntentCategory, IntentEntities } from '../types/index.js';

const INTENT_CATEGORIES = [
  'technical_question',
  'operational_task',
  'strategic_planning',
  'analysis_research',
  'creative_generation',
] as const satisfies readonly IntentCategory[];

const DEFAULT_CATEGORY: IntentCategory = 'operational_task';
export const GENERAL_DOMAIN = 'general';
const BASE_COMPLEXITY = 3;
const MAX_COMPLEXITY = 10;
const LARGE_SCALE_USERS = 50;

const KeywordTablesSchema = z.object({
  domainKeywords: z.record(z.array(z.string())),
  intentPatterns: z.record(z.enum(INTENT_CATEGORIES), z.array(z.string())),
  complexityIndicators: z.object({
    multiDomain: z.number(),
    multiStep: z.number(),
    largeScale: z.number(),
    integration: z.number(),
    migration: z.number(),
    custom: z.number(),
    urgent: z.number(),
  }),
  domainAgents: z.record(z.string()),
  fallbackAgent: z.string(),
});

export type KeywordTables = z.infer<typeof KeywordTablesSchema>;

const TABLES_FILE = fileURLToPath(new URL('../../data/intent-keywords.json', import.meta.url));

let cached: KeywordTables | null = null;

/** Keyword tables, read and validated once */
export function getKeywordTables(): KeywordTables {
  if (!cached) {
    cached = KeywordTablesSchema.parse(JSON.parse(fs.readFileSync(TABLES_FILE, 'utf-8')));
  }
  return cached;
}

// ---------------------------------------------------------------------------
// Classification steps
// ---------------------------------------------------------------------------

function detectDomains(q: string, tables: KeywordTables): string[] {
  const detected = Object.entries(tables.domainKeywords)
    .filter(([, keywords]) => keywords.some(k => q.includes(k)))
    .map(([domain]) => domain);
  return detected.length > 0 ? detected : [GENERAL_DOMAIN];
}

function detectCategory(q: string, tables: KeywordTables): IntentCategory {
  let best: IntentCategory = DEFAULT_CATEGORY;
  let bestScore = 0;
  for (const category of INTENT_CATEGORIES) {
    const patterns = tables.intentPatterns[category] ?? [];
    let score = patterns.filter(p => new RegExp(p, 'i').test(q)).length;
    if (category === 'strategic_planning' && /\bshould\s+i\b/i.test(q)) score += 2;
    if (score > bestScore) {
      best = category;
      bestScore = score;
    }
  }
  return best;
}

function assessComplexity(q: string, domains: string[], tables: KeywordTables): number {
  const bonus = tables.complexityIndicators;
  let complexity = BASE_COMPLEXITY;
  if (domains.length > 1) complexity += bonus.multiDomain;
  if (/\band then\b|\bafter that\b/.test(q)) complexity += bonus.multiStep;
  const users = /\b(\d+)\s*users?\b/.exec(q);
  if (users && Number(users[1]) > LARGE_SCALE_USERS) complexity += bonus.largeScale;
  if (/\bmigrate\b|\bmigration\b|\bmove from\b/.test(q)) complexity += bonus.migration;
  if (/\bintegrate\b|\bconnect\b|\blink\b/.test(q)) complexity += bonus.integration;
  if (/\bcustom\b|\bspecific\b|\btailored\b/.test(q)) complexity += bonus.custom;
  if (/\burgent\b|\basap\b|\bemergency\b|\bimmediate\b/.test(q)) complexity += bonus.urgent;
  return Math.min(complexity, MAX_COMPLEXITY);
}

export function extractEntities(query: string): IntentEntities {
  const entities: IntentEntities = {};
  const lower = query.toLowerCase();

  const domains = [...lower.matchAll(/\b([a-z0-9-]+\.(?:com|net|org|io|co|au))\b/g)].map(m => m[1]);
  if (domains.length > 0) entities.domains = domains;

  const numbers = [...query.matchAll(/\b(\d+)\s*(users?|mailboxes?|devices?|dollars?|AUD|USD)?\b/g)]
    .map(m => ({ value: Number(m[1]), unit: m[2] ?? 'count' }));
  if (numbers.length > 0) entities.numbers = numbers;

  const emails = lower.match(/\b[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}\b/g);
  if (emails) entities.emails = emails;

  return entities;
}

function classificationConfidence(domains: string[], category: IntentCategory): number {
  let confidence = 0.8;
  if (domains.length === 1 && domains[0] === GENERAL_DOMAIN) confidence -= 0.2;
  if (category !== DEFAULT_CATEGORY) confidence += 0.1;
  return Math.round(Math.min(confidence, 1) * 100) / 100;
}

/** Category, domains, 1-10 complexity and entities for a free-text query */
export function classifyIntent(query: string): Intent {
  const tables = getKeywordTables();
  const q = query.toLowerCase().trim();
  const domains = detectDomains(q, tables);
  const category = detectCategory(q, tables);
  return {
    category,
    domains,
    complexity: assessComplexity(q, domains, tables),
    confidence: classificationConfidence(domains, category),
    entities: extractEntities(query),
  };
}
