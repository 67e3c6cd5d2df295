// mcp-swarm-orchestrator/src/services/handoffParser.ts
// Extracts a structured handoff declaration from free-form agent output.
//
//   HANDOFF DECLARATION:
//   To: <agent_name>
//   Reason: <free text>
//   Context:
//     - Work completed: <text>
//     - Key data: {"k": "v"}
//
// Never throws. A malformed block is reported as data so the orchestrator can
// treat the output as final.

import type { HandoffDeclaration, HandoffParseResult } from '../types/index.js';

export const HANDOFF_HEADER = 'HANDOFF DECLARATION:';

const TARGET_PATTERN = /^[A-Za-z0-9_.-]+$/;
const LABEL_PATTERN = /^(To|Reason|Context)\s*:\s*(.*)$/i;
const BULLET_PATTERN = /^[-*+]\s+(.*)$/;

type BlockResult =
  | { ok: true; declaration: HandoffDeclaration }
  | { ok: false; reason: string };

/** `Work completed` → `work_completed`; other characters are kept */
export function normalizeContextKey(key: string): string {
  return key.trim().toLowerCase().replace(/\s+/g, '_');
}

/** Split `key: value` at the first colon; undefined without one or with an empty key */
function splitPair(item: string): { key: string; value: string } | undefined {
  const colon = item.indexOf(':');
  if (colon === -1) return undefined;
  const key = normalizeContextKey(item.slice(0, colon));
  if (!key) return undefined;
  return { key, value: item.slice(colon + 1) };
}

function stripQuotes(value: string): string {
  return value.trim().replace(/^[`'"]+|[`'"]+$/g, '').trim();
}

/** Inline JSON for values opening with `{` or `[`; raw string otherwise or on failure */
function parseValue(raw: string): unknown {
  const value = raw.trim();
  if (value.startsWith('{') || value.startsWith('[')) {
    try {
      return JSON.parse(value);
    } catch {
      return value;
    }
  }
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ---------------------------------------------------------------------------
// Block parsing
// ---------------------------------------------------------------------------

function parseBlock(block: string, timestamp: string): BlockResult {
  const lines = block.split(/\r?\n/);
  const headerRest = lines[0] ?? '';
  if (headerRest.trim() !== '') {
    return { ok: false, reason: `Unparsable header: unexpected text '${headerRest.trim()}' after '${HANDOFF_HEADER}'` };
  }

  let toRaw: string | undefined;
  let reason = '';
  const context: Record<string, unknown> = {};
  let inContext = false;
  let seenContent = false;
  let lastKey: string | undefined;

  for (const line of lines.slice(1)) {
    if (!line.trim()) {
      if (seenContent) break;
      continue;
    }

    const indented = /^\s/.test(line);
    const trimmed = line.trim();
    const bullet = BULLET_PATTERN.exec(trimmed);
    const label = !indented && !bullet ? LABEL_PATTERN.exec(trimmed) : null;

    if (label) {
      seenContent = true;
      lastKey = undefined;
      const field = label[1].toLowerCase();
      const value = label[2];
      if (field === 'to') {
        inContext = false;
        if (toRaw === undefined) toRaw = value;
      } else if (field === 'reason') {
        inContext = false;
        reason = value.trim();
      } else {
        inContext = true;
        const inline = parseValue(value);
        if (isPlainObject(inline)) Object.assign(context, inline);
      }
      continue;
    }

    if (!inContext || (!indented && !bullet)) {
      // Unlabelled prose after the block content ends the block
      if (seenContent) break;
      continue;
    }

    const item = bullet ? bullet[1] : trimmed;
    const pair = splitPair(item);
    if (pair) {
      context[pair.key] = parseValue(pair.value);
      lastKey = pair.key;
      continue;
    }

    if (!bullet && lastKey !== undefined) {
      const previous = context[lastKey];
      if (typeof previous === 'string') {
        context[lastKey] = previous ? `${previous} ${trimmed}` : trimmed;
      }
    }
  }

  if (toRaw === undefined) {
    return { ok: false, reason: "Missing required 'To:' line" };
  }
  const toAgent = stripQuotes(toRaw);
  if (!toAgent) {
    return { ok: false, reason: "Empty 'To:' target" };
  }
  if (!TARGET_PATTERN.test(toAgent)) {
    return { ok: false, reason: `Invalid 'To:' target '${toAgent}'` };
  }

  return { ok: true, declaration: { toAgent, reason, context, timestamp } };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parse the first well-formed handoff block in `output`.
 * Later blocks are ignored once one parses.
 */
export function parseHandoff(output: string, now: Date = new Date()): HandoffParseResult {
  const starts: number[] = [];
  let idx = output.indexOf(HANDOFF_HEADER);
  while (idx !== -1) {
    starts.push(idx);
    idx = output.indexOf(HANDOFF_HEADER, idx + HANDOFF_HEADER.length);
  }
  if (starts.length === 0) return { kind: 'absent' };

  const timestamp = now.toISOString();
  let firstFailure: string | undefined;
  for (let i = 0; i < starts.length; i++) {
    const end = i + 1 < starts.length ? starts[i + 1] : output.length;
    const block = output.slice(starts[i] + HANDOFF_HEADER.length, end);
    const result = parseBlock(block, timestamp);
    if (result.ok) return { kind: 'ok', declaration: result.declaration };
    firstFailure ??= result.reason;
  }
  return { kind: 'malformed', reason: firstFailure ?? 'No well-formed handoff block' };
}

/** Declaration or null when absent or malformed */
export function extractHandoff(output: string, now?: Date): HandoffDeclaration | null {
  const result = parseHandoff(output, now);
  return result.kind === 'ok' ? result.declaration : null;
}
