// mcp-swarm-orchestrator/src/services/storage/index.ts
// Barrel export + factory for the record-store subsystem.

import * as path from 'node:path';
import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logger.js';
import { JsonlRecordStore } from './jsonlRecordStore.js';
import { MemoryRecordStore } from './memoryRecordStore.js';
import { resolveStorageBackend, type RecordStore } from './storageTypes.js';

export { JsonlRecordStore } from './jsonlRecordStore.js';
export { MemoryRecordStore } from './memoryRecordStore.js';
export type { RecordStore, StorageBackend } from './storageTypes.js';
export { resolveStorageBackend } from './storageTypes.js';

/** Create a record store for `file`, backend chosen by MCP_STORAGE_BACKEND. */
export function createRecordStore<T>(
  file: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  keyOf: (record: T) => string,
): RecordStore<T> {
  const backend = resolveStorageBackend();
  logger.debug(`[Storage] ${path.basename(file)}: backend="${backend}"`);
  if (backend === 'memory') {
    return new MemoryRecordStore<T>(path.basename(file), keyOf);
  }
  return new JsonlRecordStore<T>(file, schema, keyOf);
}
