// mcp-swarm-orchestrator/src/services/dataDir.ts
// Centralized data directory resolution.
//
// Default: %APPDATA%/mcp-swarm-orchestrator  (Windows)
//          ~/Library/Application Support/mcp-swarm-orchestrator  (macOS)
//          $XDG_CONFIG_HOME/mcp-swarm-orchestrator  or  ~/.config/mcp-swarm-orchestrator  (Linux)
//
// Override: set MCP_DATA_DIR env var.

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

const APP_DIR_NAME = 'mcp-swarm-orchestrator';

// ---------------------------------------------------------------------------
// Base data directory
// ---------------------------------------------------------------------------

function resolveBaseDir(): string {
  if (process.env.MCP_DATA_DIR) {
    return path.resolve(process.env.MCP_DATA_DIR);
  }

  const platform = os.platform();
  if (platform === 'win32') {
    const appData = process.env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming');
    return path.join(appData, APP_DIR_NAME);
  }
  if (platform === 'darwin') {
    return path.join(os.homedir(), 'Library', 'Application Support', APP_DIR_NAME);
  }
  // Linux / other
  const configHome = process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(configHome, APP_DIR_NAME);
}

/** The resolved base data directory (absolute path). */
export const DATA_DIR = resolveBaseDir();

// ---------------------------------------------------------------------------
// Subdirectory helpers - each service calls these
// ---------------------------------------------------------------------------

/** Agent capability descriptors (*.md) */
export function getAgentsDir(): string {
  return process.env.AGENTS_DIR || path.join(DATA_DIR, 'agents');
}

export function getConfigDir(): string {
  return process.env.CONFIG_DIR || path.join(DATA_DIR, 'config');
}

export function getLogsDir(): string {
  return process.env.EVENT_LOG_DIR || path.join(DATA_DIR, 'logs');
}

/** Outcome, threshold and decision records */
export function getStateDir(): string {
  return process.env.STATE_DIR || path.join(DATA_DIR, 'state');
}

/** One session artifact per execution context */
export function getSessionsDir(): string {
  return process.env.SESSIONS_DIR || path.join(DATA_DIR, 'sessions');
}

// ---------------------------------------------------------------------------
// Directory initialization
// ---------------------------------------------------------------------------

/** Ensure the base data directory and all subdirectories exist. */
export function ensureDataDirs(): void {
  const dirs = [DATA_DIR, getAgentsDir(), getConfigDir(), getLogsDir(), getStateDir(), getSessionsDir()];
  for (const dir of dirs) {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }
}
