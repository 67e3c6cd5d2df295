// mcp-swarm-orchestrator/src/services/sessionStore.ts
// Per-execution session artifacts.
//
// One file per execution context: <sessionsDir>/swarm-session-<contextId>.json
// Two executions never share a file, so concurrent runs in separate
// processes cannot read or overwrite each other's chain.

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { SwarmSession } from '../types/index.js';
import { getSessionsDir } from './dataDir.js';
import { atomicWriteJson, readJsonFile } from './jsonFile.js';
import { logger } from './logger.js';
import { errorMessage } from './errors.js';

export const SESSION_VERSION = '1';
export const SESSION_RETENTION_MS = 24 * 60 * 60 * 1000;

const SESSION_PREFIX = 'swarm-session-';
const CONTEXT_ID_PATTERN = /^[A-Za-z0-9_.-]+$/;

const HandoffHistoryEntrySchema = z.object({
  fromAgent: z.string(),
  toAgent: z.string(),
  reason: z.string(),
  contextSize: z.number(),
  timestamp: z.string(),
});

export const SwarmSessionSchema = z.object({
  contextId: z.string(),
  version: z.string(),
  initialAgent: z.string(),
  currentAgent: z.string(),
  status: z.enum(['running', 'complete', 'aborted']),
  handoffChain: z.array(HandoffHistoryEntrySchema),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export class SessionStore {
  readonly dir: string;

  constructor(dir: string = getSessionsDir()) {
    this.dir = dir;
  }

  /** Path of the artifact for a context id (rejects ids that are not file-safe) */
  fileFor(contextId: string): string {
    if (!CONTEXT_ID_PATTERN.test(contextId)) {
      throw new Error(`Invalid execution context id '${contextId}'`);
    }
    return path.join(this.dir, `${SESSION_PREFIX}${contextId}.json`);
  }

  save(session: SwarmSession): void {
    atomicWriteJson(this.fileFor(session.contextId), session);
  }

  /** Session for a context id; corrupt or missing → undefined */
  read(contextId: string): SwarmSession | undefined {
    return readJsonFile(this.fileFor(contextId), SwarmSessionSchema) ?? undefined;
  }

  list(): SwarmSession[] {
    if (!fs.existsSync(this.dir)) return [];
    const sessions: SwarmSession[] = [];
    for (const name of fs.readdirSync(this.dir)) {
      if (!name.startsWith(SESSION_PREFIX) || !name.endsWith('.json')) continue;
      const session = readJsonFile(path.join(this.dir, name), SwarmSessionSchema);
      if (session) sessions.push(session);
    }
    return sessions.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  /**
   * Delete session artifacts whose mtime is older than the retention window.
   * Returns the number of files removed.
   */
  cleanupStale(maxAgeMs: number = SESSION_RETENTION_MS, now: Date = new Date()): number {
    if (!fs.existsSync(this.dir)) return 0;
    const cutoff = now.getTime() - maxAgeMs;
    let removed = 0;
    for (const name of fs.readdirSync(this.dir)) {
      if (!name.startsWith(SESSION_PREFIX)) continue;
      const file = path.join(this.dir, name);
      try {
        const st = fs.statSync(file);
        if (st.isFile() && st.mtimeMs < cutoff) {
          fs.unlinkSync(file);
          removed++;
        }
      } catch (err) {
        logger.warn(`[SessionStore] Cleanup skipped ${name}: ${errorMessage(err)}`);
      }
    }
    if (removed > 0) logger.info(`[SessionStore] Removed ${removed} stale session(s)`);
    return removed;
  }
}
