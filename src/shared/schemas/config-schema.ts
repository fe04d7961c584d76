/**
 * Zod schema for termdash configuration.
 *
 * Single source of truth for config shape, defaults, and validation.
 * The TermdashConfig type is derived from this schema via z.infer<>.
 *
 * @module shared/schemas/config-schema
 */

import { z } from 'zod';
import { DEFAULT_PROCESS_LIMIT, MAX_PROCESS_LIMIT, THEME_PRESETS } from '../constants';

export const TermdashConfigSchema = z.object({
  // ── UI ──
  /** Preset active at startup; cycling with `t` is not saved */
  theme: z.enum(THEME_PRESETS).default(THEME_PRESETS[0]),
  processLimit: z.number().int().min(1).max(MAX_PROCESS_LIMIT).default(DEFAULT_PROCESS_LIMIT),

  // ── Logging ──
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  /** Log output while the dashboard owns the screen; discarded when unset */
  logFile: z.string().min(1).optional(),
});

// ─── Derived types ───

/** Full config after parsing (defaults applied) */
export type TermdashConfig = z.infer<typeof TermdashConfigSchema>;
