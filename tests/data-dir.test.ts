// tests/data-dir.test.ts
// Unit tests for the centralized data directory module

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { makeTempDir, cleanupTempDirs } from './helpers/setup.js';

// The module reads MCP_DATA_DIR at import time, so we use dynamic import + resetModules.

const OVERRIDES = ['MCP_DATA_DIR', 'AGENTS_DIR', 'CONFIG_DIR', 'EVENT_LOG_DIR', 'STATE_DIR', 'SESSIONS_DIR'];

describe('dataDir', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    for (const key of OVERRIDES) delete process.env[key];
  });

  afterEach(() => {
    for (const key of Object.keys(process.env)) {
      if (!(key in originalEnv)) delete process.env[key];
    }
    Object.assign(process.env, originalEnv);
    vi.resetModules();
    cleanupTempDirs();
  });

  describe('DATA_DIR resolution', () => {
    it('uses MCP_DATA_DIR env var when set', async () => {
      process.env.MCP_DATA_DIR = '/custom/data';
      const { DATA_DIR } = await import('../src/services/dataDir.js');
      expect(DATA_DIR).toBe(path.resolve('/custom/data'));
    });

    it('falls back to a platform default named after the server', async () => {
      const { DATA_DIR } = await import('../src/services/dataDir.js');
      expect(path.basename(DATA_DIR)).toBe('mcp-swarm-orchestrator');
      expect(path.isAbsolute(DATA_DIR)).toBe(true);
    });
  });

  describe('subdirectory helpers', () => {
    beforeEach(() => {
      process.env.MCP_DATA_DIR = '/test/base';
    });

    it('derives every subdirectory from DATA_DIR by default', async () => {
      const dirs = await import('../src/services/dataDir.js');
      expect(path.resolve(dirs.getAgentsDir())).toBe(path.resolve('/test/base', 'agents'));
      expect(path.resolve(dirs.getConfigDir())).toBe(path.resolve('/test/base', 'config'));
      expect(path.resolve(dirs.getLogsDir())).toBe(path.resolve('/test/base', 'logs'));
      expect(path.resolve(dirs.getStateDir())).toBe(path.resolve('/test/base', 'state'));
      expect(path.resolve(dirs.getSessionsDir())).toBe(path.resolve('/test/base', 'sessions'));
    });

    it('honours per-directory overrides', async () => {
      process.env.AGENTS_DIR = '/elsewhere/agents';
      process.env.STATE_DIR = '/elsewhere/state';
      process.env.SESSIONS_DIR = '/elsewhere/sessions';
      const dirs = await import('../src/services/dataDir.js');
      expect(dirs.getAgentsDir()).toBe('/elsewhere/agents');
      expect(dirs.getStateDir()).toBe('/elsewhere/state');
      expect(dirs.getSessionsDir()).toBe('/elsewhere/sessions');
    });
  });

  describe('ensureDataDirs', () => {
    it('creates the base directory and all subdirectories', async () => {
      const base = path.join(makeTempDir('data-'), 'root');
      process.env.MCP_DATA_DIR = base;
      const { ensureDataDirs } = await import('../src/services/dataDir.js');
      ensureDataDirs();
      for (const sub of ['agents', 'config', 'logs', 'state', 'sessions']) {
        expect(fs.statSync(path.join(base, sub)).isDirectory()).toBe(true);
      }
    });
  });
});
