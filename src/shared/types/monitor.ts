/**
 * Shared monitor types: snapshot data from the metrics provider, the derived
 * process view, and the interaction state the dashboard paints.
 */

import type { THEME_PRESETS } from '../constants';

// ─── Snapshot ───

export interface ProcessInfo {
  pid: number;
  name: string;
  cpuPercent: number;
  /** Resident set size in bytes */
  memoryBytes: number;
}

export interface DiskInfo {
  mount: string;
  totalBytes: number;
  usedBytes: number;
  usagePercent: number;
}

export interface NetInfo {
  name: string;
  /** Cumulative bytes received since the interface came up */
  rxBytes: number;
  /** Cumulative bytes transmitted since the interface came up */
  txBytes: number;
}

export interface Snapshot {
  readonly timestamp: number;
  readonly hostname: string;
  readonly cpuPercent: number;
  readonly memUsed: number;
  readonly memTotal: number;
  readonly disks: readonly Readonly<DiskInfo>[];
  readonly interfaces: readonly Readonly<NetInfo>[];
  readonly processes: ReadonlyMap<number, Readonly<ProcessInfo>>;
}

/** Extended fields, fetched only while a process is being inspected. */
export interface ProcessDetail {
  pid: number;
  name: string;
  status: string;
  cpuPercent: number;
  memoryBytes: number;
  virtualMemoryBytes: number;
  startedAt: string;
  command: string;
  /** null where the platform does not expose per-process I/O counters */
  diskReadBytes: number | null;
  diskWrittenBytes: number | null;
}

// ─── Process view ───

export type ProcessRow = Readonly<ProcessInfo>;

export type ProcessView = readonly ProcessRow[];

/** Index into the current ProcessView; null only while the view is empty. */
export type Cursor = number | null;

// ─── Input ───

export type ThemePreset = (typeof THEME_PRESETS)[number];

export type InputMode =
  | { kind: 'normal' }
  | { kind: 'search-edit' }
  | { kind: 'detail-inspect'; inspectedPid: number | null };

export type KeyCode =
  | { type: 'char'; char: string }
  | { type: 'up' }
  | { type: 'down' }
  | { type: 'enter' }
  | { type: 'escape' }
  | { type: 'backspace' }
  | { type: 'delete' }
  | { type: 'other'; name: string };

export type KeyEventKind = 'press' | 'release' | 'repeat';

export interface KeyEvent {
  code: KeyCode;
  kind: KeyEventKind;
}

/** Side effect requested by a key transition, run by the event loop. */
export type MonitorCommand = { type: 'quit' } | { type: 'terminate'; pid: number } | { type: 'inspect'; pid: number };

// ─── Frame ───

export interface HistoryFrame {
  cpu: readonly number[];
  memory: readonly number[];
  rx: readonly number[];
  tx: readonly number[];
}

/** Read-only picture of the monitor state handed to the renderer once per loop iteration. */
export interface MonitorFrame {
  readonly snapshot: Snapshot | null;
  readonly history: Readonly<HistoryFrame>;
  readonly view: ProcessView;
  readonly cursor: Cursor;
  readonly mode: Readonly<InputMode>;
  readonly query: string;
  readonly detail: Readonly<ProcessDetail> | null;
  readonly theme: ThemePreset;
  readonly notice: string | null;
}
