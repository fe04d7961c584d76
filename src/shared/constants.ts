/**
 * Shared constants: sampling cadence, buffer sizes and presets.
 */

/** Name shown in the dashboard header */
export const APP_TITLE = 'TERM-DASH';

/** Fixed sampling interval (1 second) */
export const TICK_RATE_MS = 1000;

/** Samples kept per history series */
export const HISTORY_LENGTH = 100;

/** Rows shown in the unfiltered process view */
export const DEFAULT_PROCESS_LIMIT = 20;

/** Upper bound accepted for the processLimit setting */
export const MAX_PROCESS_LIMIT = 500;

/** CPU gauge switches to the alert color above this percentage */
export const CPU_ALERT_PERCENT = 80;

/** Theme cycle order; the first entry is the default */
export const THEME_PRESETS = ['default', 'ocean', 'forest', 'mono'] as const;

/** Signal sent by the kill action */
export const TERMINATE_SIGNAL = 'SIGTERM' as const;
