// mcp-swarm-orchestrator/src/services/preferences.ts
// Preferences store - the handoffs_enabled feature flag.
//
// File: <configDir>/preferences.json  { "handoffs_enabled": false }
// Env SWARM_HANDOFFS_ENABLED (true/false/1/0) overrides the file.

import * as path from 'path';
import { z } from 'zod';
import { getConfigDir } from './dataDir.js';
import { atomicWriteJson, readJsonFile } from './jsonFile.js';
import { logger } from './logger.js';

export const PreferencesSchema = z.object({
  handoffs_enabled: z.boolean(),
}).passthrough();

export type Preferences = z.infer<typeof PreferencesSchema>;

export const DEFAULT_PREFERENCES: Preferences = { handoffs_enabled: false };

export function getPreferencesFile(configDir: string = getConfigDir()): string {
  return path.join(configDir, 'preferences.json');
}

function envOverride(): boolean | undefined {
  const raw = process.env.SWARM_HANDOFFS_ENABLED?.trim().toLowerCase();
  if (!raw) return undefined;
  if (raw === 'true' || raw === '1' || raw === 'yes') return true;
  if (raw === 'false' || raw === '0' || raw === 'no') return false;
  logger.warn(`[Preferences] Ignoring SWARM_HANDOFFS_ENABLED="${raw}"`);
  return undefined;
}

/** Current preferences; defaults when the file is missing or invalid */
export function loadPreferences(configDir?: string): Preferences {
  const file = getPreferencesFile(configDir);
  const stored = readJsonFile(file, PreferencesSchema);
  const prefs = stored ?? { ...DEFAULT_PREFERENCES };
  const override = envOverride();
  return override === undefined ? prefs : { ...prefs, handoffs_enabled: override };
}

export function isHandoffsEnabled(configDir?: string): boolean {
  return loadPreferences(configDir).handoffs_enabled;
}

/** Persist the flag, keeping any other keys in the file */
export function setHandoffsEnabled(enabled: boolean, configDir?: string): Preferences {
  const file = getPreferencesFile(configDir);
  const stored = readJsonFile(file, PreferencesSchema) ?? { ...DEFAULT_PREFERENCES };
  const next = { ...stored, handoffs_enabled: enabled };
  atomicWriteJson(file, next);
  logger.info(`[Preferences] handoffs_enabled=${enabled}`);
  return next;
}
