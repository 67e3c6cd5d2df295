// mcp-swarm-orchestrator/src/services/storage/storageTypes.ts
// Record store interface and backend configuration for the learning stores.

// ---------------------------------------------------------------------------
// Storage backend configuration
// ---------------------------------------------------------------------------

/** Which backend persists outcome, threshold and decision records */
export type StorageBackend = 'disk' | 'memory';

/** Resolve the storage backend from environment */
export function resolveStorageBackend(): StorageBackend {
  const raw = (process.env.MCP_STORAGE_BACKEND || 'disk').toLowerCase().trim();
  if (raw === 'disk' || raw === 'memory') return raw;
  return 'disk';
}

// ---------------------------------------------------------------------------
// Record store interface
// ---------------------------------------------------------------------------

/**
 * Append-only record store. Implementations: JsonlRecordStore, MemoryRecordStore.
 * Disk failures surface as LearningStoreUnavailable.
 */
export interface RecordStore<T> {
  /** Human-readable name for logging */
  readonly name: string;

  /** Append one record */
  append(record: T): void;

  /** All records in insertion order, optionally filtered */
  query(filter?: (record: T) => boolean): T[];

  /** Most recently appended record with this key */
  latest(key: string): T | undefined;

  /** Check whether the backing medium is readable and writable */
  isAvailable(): boolean;
}
