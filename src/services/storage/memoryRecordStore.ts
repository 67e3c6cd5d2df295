// mcp-swarm-orchestrator/src/services/storage/memoryRecordStore.ts
// In-process record store, used when MCP_STORAGE_BACKEND=memory and in tests.

import type { RecordStore } from './storageTypes.js';

export class MemoryRecordStore<T> implements RecordStore<T> {
  readonly name: string;
  private readonly records: T[] = [];
  private readonly keyOf: (record: T) => string;

  constructor(name: string, keyOf: (record: T) => string) {
    this.name = name;
    this.keyOf = keyOf;
  }

  append(record: T): void {
    this.records.push(record);
  }

  query(filter?: (record: T) => boolean): T[] {
    return filter ? this.records.filter(filter) : [...this.records];
  }

  latest(key: string): T | undefined {
    for (let i = this.records.length - 1; i >= 0; i--) {
      if (this.keyOf(this.records[i]) === key) return this.records[i];
    }
    return undefined;
  }

  isAvailable(): boolean {
    return true;
  }
}
