// mcp-swarm-orchestrator/src/services/jsonFile.ts
// JSON file helpers - atomic temp-file → rename writes and validated reads.

import * as fs from 'fs';
import * as path from 'path';
import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from './logger.js';
import { errorMessage } from './errors.js';

/** Write JSON via a temp file in the same directory, then rename over the target */
export function atomicWriteJson(filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmp = filePath + `.tmp-${process.pid}-${Date.now()}`;
  fs.writeFileSync(tmp, JSON.stringify(data, null, 2), 'utf-8');
  try {
    fs.renameSync(tmp, filePath);
  } catch (err) {
    // EPERM on Windows if the target is locked: drop the target and retry once
    if (fs.existsSync(filePath)) fs.unlinkSync(filePath);
    try {
      fs.renameSync(tmp, filePath);
    } catch (retryErr) {
      fs.rmSync(tmp, { force: true });
      throw new Error(`Atomic write failed (${filePath}): ${errorMessage(err)}; retry: ${errorMessage(retryErr)}`);
    }
  }
}

/**
 * Read and validate a JSON file.
 * Missing → null. Unreadable or invalid → null with a warning.
 */
export function readJsonFile<T>(filePath: string, schema: ZodType<T, ZodTypeDef, unknown>): T | null {
  if (!fs.existsSync(filePath)) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    logger.warn(`Failed to read ${filePath}: ${errorMessage(err)}`);
    return null;
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    logger.warn(`Invalid content in ${filePath}: ${result.error.issues.map(i => i.message).join('; ')}`);
    return null;
  }
  return result.data;
}
