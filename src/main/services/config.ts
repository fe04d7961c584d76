/**
 * ConfigService — typed, validated, read-only configuration.
 *
 * - Zod schema validation on load (corrupted JSON → safe defaults)
 * - Partial recovery: fields that validate on their own survive a bad file
 * - Typed get<K> with full TypeScript inference
 *
 * Nothing is ever written back; settings changed at runtime (theme cycling)
 * last for the session only.
 *
 * @module main/services/config
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createLogger } from './logger';
import { ErrorCode, MonitorError } from '../../shared/types/errors';

import { TermdashConfigSchema } from '../../shared/schemas/config-schema';
import type { TermdashConfig } from '../../shared/schemas/config-schema';

export type { TermdashConfig } from '../../shared/schemas/config-schema';

const log = createLogger('Config');

/** `$XDG_CONFIG_HOME/termdash/config.json`, falling back to `~/.config`. */
export function defaultConfigPath(): string {
  const base = process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(base, 'termdash', 'config.json');
}

export class ConfigService {
  readonly configPath: string;
  /** What went wrong while loading; the service still holds a usable config */
  readonly problems: MonitorError[] = [];
  private readonly config: TermdashConfig;

  constructor(configPath: string = defaultConfigPath()) {
    this.configPath = configPath;
    this.config = this.loadConfig();
  }

  // ────────────── Load ──────────────

  private loadConfig(): TermdashConfig {
    let raw: unknown = {};

    try {
      if (fs.existsSync(this.configPath)) {
        const data = fs.readFileSync(this.configPath, 'utf8');
        raw = JSON.parse(data);
      }
    } catch (error) {
      this.report(
        new MonitorError('Failed to read config file, using defaults', ErrorCode.CONFIG_LOAD_ERROR, {
          cause: error,
          context: { path: this.configPath },
        }),
      );
    }

    const result = TermdashConfigSchema.safeParse(raw);
    if (result.success) {
      return result.data;
    }

    this.report(
      new MonitorError('Config validation failed, applying defaults', ErrorCode.CONFIG_VALIDATION_ERROR, {
        context: { path: this.configPath, issues: result.error.issues },
      }),
    );
    return TermdashConfigSchema.parse(this.pickValidFields(raw));
  }

  private report(problem: MonitorError): void {
    this.problems.push(problem);
    if (problem.code === ErrorCode.CONFIG_LOAD_ERROR) {
      log.error(problem.describe());
    } else {
      log.warn(problem.describe(), problem.context?.issues);
    }
  }

  /**
   * Pick fields from raw config that individually pass validation.
   * Used for partial recovery when overall validation fails.
   */
  private pickValidFields(raw: unknown): Record<string, unknown> {
    const recovered: Record<string, unknown> = {};
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      return recovered;
    }

    for (const [key, value] of Object.entries(raw)) {
      const partial = TermdashConfigSchema.safeParse({ [key]: value });
      if (partial.success && key in partial.data) {
        recovered[key] = value;
      }
    }
    return recovered;
  }

  // ────────────── Typed accessors ──────────────

  get<K extends keyof TermdashConfig>(key: K): TermdashConfig[K] {
    return this.config[key];
  }

  /** Shallow copy of the full config */
  getAll(): TermdashConfig {
    return { ...this.config };
  }
}
