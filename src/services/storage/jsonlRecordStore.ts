// mcp-swarm-orchestrator/src/services/storage/jsonlRecordStore.ts
// Disk-backed record store - append-only JSONL with tolerant, validated reads.

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logger.js';
import { LearningStoreUnavailable } from '../errors.js';
import type { RecordStore } from './storageTypes.js';

interface FileSnapshot {
  size: number;
  mtimeMs: number;
}

/**
 * JSONL RecordStore.
 * Reads are cached and only re-parsed when the file's size or mtime moves,
 * so writes from another process are still picked up.
 */
export class JsonlRecordStore<T> implements RecordStore<T> {
  readonly name: string;
  private readonly file: string;
  private readonly schema: ZodType<T, ZodTypeDef, unknown>;
  private readonly keyOf: (record: T) => string;
  private cache: T[] = [];
  private snapshot: FileSnapshot | null = null;

  constructor(file: string, schema: ZodType<T, ZodTypeDef, unknown>, keyOf: (record: T) => string) {
    this.file = file;
    this.schema = schema;
    this.keyOf = keyOf;
    this.name = path.basename(file);
  }

  /** One O_APPEND write per record; the next read re-parses the file */
  append(record: T): void {
    try {
      fs.mkdirSync(path.dirname(this.file), { recursive: true });
      fs.appendFileSync(this.file, JSON.stringify(record) + '\n', 'utf-8');
    } catch (err) {
      throw new LearningStoreUnavailable(this.name, err);
    }
    // Lines other writers appended since the last load must not hide behind a fresh snapshot
    this.snapshot = null;
  }

  query(filter?: (record: T) => boolean): T[] {
    const records = this.load();
    return filter ? records.filter(filter) : [...records];
  }

  latest(key: string): T | undefined {
    const records = this.load();
    for (let i = records.length - 1; i >= 0; i--) {
      if (this.keyOf(records[i]) === key) return records[i];
    }
    return undefined;
  }

  isAvailable(): boolean {
    try {
      this.load();
      return true;
    } catch {
      return false;
    }
  }

  // ---- internals ----

  private stat(): FileSnapshot | null {
    if (!fs.existsSync(this.file)) return null;
    const st = fs.statSync(this.file);
    if (!st.isFile()) {
      throw new LearningStoreUnavailable(this.name, `${this.file} is not a regular file`);
    }
    return { size: st.size, mtimeMs: st.mtimeMs };
  }

  private load(): T[] {
    let current: FileSnapshot | null;
    try {
      current = this.stat();
    } catch (err) {
      if (err instanceof LearningStoreUnavailable) throw err;
      throw new LearningStoreUnavailable(this.name, err);
    }

    if (current === null) {
      this.cache = [];
      this.snapshot = null;
      return this.cache;
    }
    if (this.snapshot && this.snapshot.size === current.size && this.snapshot.mtimeMs === current.mtimeMs) {
      return this.cache;
    }

    let raw: string;
    try {
      raw = fs.readFileSync(this.file, 'utf-8');
    } catch (err) {
      throw new LearningStoreUnavailable(this.name, err);
    }

    const records: T[] = [];
    let skipped = 0;
    for (const line of raw.split('\n')) {
      if (!line.trim()) continue;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        skipped++;
        continue;
      }
      const result = this.schema.safeParse(parsed);
      if (result.success) {
        records.push(result.data);
      } else {
        skipped++;
      }
    }
    if (skipped > 0) {
      logger.warn(`[RecordStore] Skipped ${skipped} malformed line(s) in ${this.name}`);
    }

    this.cache = records;
    this.snapshot = current;
    return this.cache;
  }
}
