/**
 * Unit tests for ConfigService.
 *
 * Tests cover:
 * - Defaults when no file exists
 * - Zod validation of a full file
 * - Partial recovery (valid fields survive, invalid ones fall back)
 * - Unreadable / corrupted JSON
 * - Load and validation problems recorded as MonitorErrors
 * - Default path resolution from XDG_CONFIG_HOME
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

// ─── Mock fs ───
let mockFileContent: string | null = null;
let mockFileExists = false;
let readShouldFail = false;

vi.mock('fs', () => ({
  existsSync: vi.fn(() => mockFileExists),
  readFileSync: vi.fn(() => {
    if (readShouldFail) throw new Error('EACCES');
    return mockFileContent ?? '';
  }),
}));

// ─── Mock logger ───
vi.mock('../src/main/services/logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import * as path from 'path';
import { ConfigService, defaultConfigPath } from '../src/main/services/config';
import { TermdashConfigSchema } from '../src/shared/schemas/config-schema';
import { ErrorCode } from '../src/shared/types/errors';

// ─── Helpers ───

function createService(fileContent?: string): ConfigService {
  if (fileContent !== undefined) {
    mockFileExists = true;
    mockFileContent = fileContent;
  } else {
    mockFileExists = false;
    mockFileContent = null;
  }
  return new ConfigService('/mock/termdash/config.json');
}

// ─── Tests ───

describe('ConfigService', () => {
  beforeEach(() => {
    readShouldFail = false;
  });

  describe('loading', () => {
    it('uses defaults when no file exists', () => {
      const config = createService();
      expect(config.getAll()).toEqual({ theme: 'default', processLimit: 20, logLevel: 'info' });
    });

    it('reads a valid file', () => {
      const config = createService(
        JSON.stringify({ theme: 'ocean', processLimit: 50, logLevel: 'debug', logFile: '/tmp/termdash.log' }),
      );
      expect(config.get('theme')).toBe('ocean');
      expect(config.get('processLimit')).toBe(50);
      expect(config.get('logLevel')).toBe('debug');
      expect(config.get('logFile')).toBe('/tmp/termdash.log');
    });

    it('keeps valid fields when others are invalid', () => {
      const config = createService(JSON.stringify({ theme: 'forest', processLimit: 0, logLevel: 'verbose' }));
      expect(config.get('theme')).toBe('forest');
      expect(config.get('processLimit')).toBe(20);
      expect(config.get('logLevel')).toBe('info');
    });

    it('rejects an out-of-range process limit', () => {
      const config = createService(JSON.stringify({ processLimit: 501 }));
      expect(config.get('processLimit')).toBe(20);
    });

    it('ignores unknown fields', () => {
      const config = createService(JSON.stringify({ refreshMs: 10, theme: 'mono' }));
      expect(config.getAll()).toEqual({ theme: 'mono', processLimit: 20, logLevel: 'info' });
    });

    it('falls back to defaults on corrupted JSON', () => {
      const config = createService('{ not json');
      expect(config.get('theme')).toBe('default');
    });

    it('falls back to defaults when the file is not an object', () => {
      const config = createService('[1, 2, 3]');
      expect(config.getAll()).toEqual(TermdashConfigSchema.parse({}));
    });

    it('falls back to defaults when the file cannot be read', () => {
      readShouldFail = true;
      const config = createService('{}');
      expect(config.get('processLimit')).toBe(20);
    });

    it('reports no problems for a valid file', () => {
      const config = createService(JSON.stringify({ theme: 'ocean' }));
      expect(config.problems).toEqual([]);
    });

    it('records a load error with the path for corrupted JSON', () => {
      const config = createService('{ not json');
      expect(config.problems.map((p) => p.code)).toEqual([ErrorCode.CONFIG_LOAD_ERROR]);
      expect(config.problems[0].context).toEqual({ path: '/mock/termdash/config.json' });
      expect(config.problems[0].cause).toBeInstanceOf(SyntaxError);
      expect(config.problems[0].fatal).toBe(false);
    });

    it('records a load error when the file cannot be read', () => {
      readShouldFail = true;
      const config = createService('{}');
      expect(config.problems).toHaveLength(1);
      expect(config.problems[0].code).toBe(ErrorCode.CONFIG_LOAD_ERROR);
      expect(config.problems[0].describe()).toBe(
        'CONFIG_LOAD_ERROR: Failed to read config file, using defaults\n  caused by: EACCES',
      );
    });

    it('records a validation error listing the offending fields', () => {
      const config = createService(JSON.stringify({ theme: 'forest', processLimit: 0 }));
      expect(config.problems).toHaveLength(1);
      const [problem] = config.problems;
      expect(problem.code).toBe(ErrorCode.CONFIG_VALIDATION_ERROR);
      expect(problem.context?.issues).toMatchObject([{ path: ['processLimit'] }]);
    });

    it('getAll returns a copy', () => {
      const config = createService();
      const all = config.getAll();
      all.theme = 'mono';
      expect(config.get('theme')).toBe('default');
    });
  });

  describe('defaultConfigPath', () => {
    const saved = process.env.XDG_CONFIG_HOME;

    afterEach(() => {
      if (saved === undefined) {
        delete process.env.XDG_CONFIG_HOME;
      } else {
        process.env.XDG_CONFIG_HOME = saved;
      }
    });

    it('lives under XDG_CONFIG_HOME when set', () => {
      process.env.XDG_CONFIG_HOME = '/xdg';
      expect(defaultConfigPath()).toBe(path.join('/xdg', 'termdash', 'config.json'));
    });

    it('falls back to ~/.config', () => {
      delete process.env.XDG_CONFIG_HOME;
      expect(defaultConfigPath()).toMatch(/[\\/]\.config[\\/]termdash[\\/]config\.json$/);
    });
  });
});
