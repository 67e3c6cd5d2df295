// mcp-swarm-orchestrator/src/services/eventLog.ts
// Structured JSONL event log - appends every bus event to a machine-parseable file.
// Each line is a self-contained JSON object: timestamp, event_type, then the
// event payload with snake_case keys (from_agent, to_agent, ...).

import { appendFileSync, mkdirSync, readFileSync, existsSync, writeFileSync, renameSync } from 'node:fs';
import { join } from 'node:path';
import { ALL_EVENT_NAMES, eventBus, type SwarmEventName, type SwarmEvents } from './events.js';
import { logger } from './logger.js';
import { getLogsDir } from './dataDir.js';
import { errorMessage } from './errors.js';

/** Max events kept in-memory ring buffer for snapshot API */
const RECENT_EVENT_LIMIT = 200;

let logFile = join(getLogsDir(), 'events.jsonl');
let dirReady = false;
let detach: (() => void) | null = null;

/** In-memory ring buffer of recent events for the snapshot API */
const recentEvents: EventLogEntry[] = [];

export interface EventLogEntry {
  timestamp: string;
  event_type: string;
  [key: string]: unknown;
}

function toSnakeCase(key: string): string {
  return key.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toLowerCase();
}

/** Ensure log directory exists */
function ensureLogDir(): void {
  if (dirReady) return;
  try {
    mkdirSync(join(logFile, '..'), { recursive: true });
    dirReady = true;
  } catch (err) {
    logger.warn(`Failed to create event log directory: ${errorMessage(err)}`);
  }
}

/** Append a single event line to the JSONL log */
export function writeEvent(eventType: string, data: object): EventLogEntry {
  const entry: EventLogEntry = {
    timestamp: new Date().toISOString(),
    event_type: eventType,
  };
  for (const [key, value] of Object.entries(data)) {
    if (value !== undefined) entry[toSnakeCase(key)] = value;
  }

  recentEvents.push(entry);
  if (recentEvents.length > RECENT_EVENT_LIMIT) {
    recentEvents.splice(0, recentEvents.length - RECENT_EVENT_LIMIT);
  }

  ensureLogDir();
  if (dirReady) {
    try {
      appendFileSync(logFile, JSON.stringify(entry) + '\n');
    } catch (err) {
      logger.warn(`Failed to write event log: ${errorMessage(err)}`);
    }
  }
  return entry;
}

/**
 * Get recent events from the in-memory ring buffer.
 * On first call, seeds the buffer from the tail of the JSONL file.
 */
export function getRecentEvents(limit: number = 100): EventLogEntry[] {
  if (recentEvents.length === 0) {
    seedRecentEvents();
  }
  return recentEvents.slice(-limit);
}

/** Clear the event log on disk and in memory */
export function clearEventLog(): void {
  recentEvents.length = 0;
  try {
    ensureLogDir();
    const tmpFile = logFile + '.tmp';
    writeFileSync(tmpFile, '', 'utf-8');
    renameSync(tmpFile, logFile);
    logger.info('[EventLog] Cleared event log');
  } catch (err) {
    logger.warn(`[EventLog] Failed to clear: ${errorMessage(err)}`);
  }
}

function isEventLogEntry(value: unknown): value is EventLogEntry {
  return typeof value === 'object' && value !== null
    && 'timestamp' in value && typeof value.timestamp === 'string'
    && 'event_type' in value && typeof value.event_type === 'string';
}

/** Seed the in-memory ring buffer from the tail of the JSONL file */
function seedRecentEvents(): void {
  if (!existsSync(logFile)) return;
  let raw: string;
  try {
    raw = readFileSync(logFile, 'utf-8');
  } catch (err) {
    logger.warn(`[EventLog] Failed to read ${logFile}: ${errorMessage(err)}`);
    return;
  }
  const tail = raw.trim().split('\n').filter(l => l.trim()).slice(-RECENT_EVENT_LIMIT);
  for (const line of tail) {
    try {
      const parsed: unknown = JSON.parse(line);
      if (isEventLogEntry(parsed)) recentEvents.push(parsed);
    } catch {
      logger.debug('[EventLog] Skipping corrupt line');
    }
  }
}

function subscribe<K extends SwarmEventName>(eventName: K): () => void {
  const handler = (data: SwarmEvents[K]): void => {
    writeEvent(eventName, data);
  };
  eventBus.onEvent(eventName, handler);
  return () => eventBus.offEvent(eventName, handler);
}

/**
 * Subscribe to all event bus events and log them to `<logDir>/events.jsonl`.
 * Calling again re-targets the log without subscribing twice.
 */
export function initializeEventLog(logDir: string = getLogsDir()): string {
  logFile = join(logDir, 'events.jsonl');
  dirReady = false;
  recentEvents.length = 0;

  if (!detach) {
    const unsubscribers = ALL_EVENT_NAMES.map(name => subscribe(name));
    detach = () => unsubscribers.forEach(off => off());
  }

  writeEvent('server:started', {
    pid: process.pid,
    nodeVersion: process.version,
  });

  logger.info(`Event log initialized: ${logFile}`);
  return logFile;
}

/** Detach from the bus (tests, shutdown) */
export function shutdownEventLog(): void {
  detach?.();
  detach = null;
}
