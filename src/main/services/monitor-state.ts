/**
 * Monitor state — the single object the event loop owns.
 *
 * Two transitions touch it: `applySnapshot` on every tick and `reduceKey`
 * (input-mode.ts) on every key press. Both run in tests without a terminal
 * or a timer. `reduceKey` is pure; `applySnapshot` returns a new state but
 * pushes into the history buffers it shares with the old one, so an old
 * state's history moves on too. The zustand store wraps both for the loop
 * and exposes `getFrame()` for the renderer.
 *
 * @module main/services/monitor-state
 */

import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import { DEFAULT_PROCESS_LIMIT, HISTORY_LENGTH, THEME_PRESETS } from '../../shared/constants';
import type {
  KeyEvent,
  MonitorCommand,
  MonitorFrame,
  NetInfo,
  ProcessDetail,
  Snapshot,
  ThemePreset,
} from '../../shared/types/monitor';
import { HistoryBuffer } from './history-buffer';
import { reduceKey } from './input-mode';
import type { InteractionState } from './input-mode';
import { buildProcessView } from './process-view';
import { reconcileCursor } from './selection';

export interface MonitorHistory {
  cpu: HistoryBuffer;
  memory: HistoryBuffer;
  /** Bytes received per second, summed over interfaces */
  rx: HistoryBuffer;
  /** Bytes transmitted per second, summed over interfaces */
  tx: HistoryBuffer;
}

export interface MonitorState extends InteractionState {
  readonly history: MonitorHistory;
  /** Extended record of the inspected process; null outside DetailInspect or once it exits */
  readonly detail: ProcessDetail | null;
  /** One-line status message, cleared by the next key press */
  readonly notice: string | null;
  readonly quitRequested: boolean;
}

export interface MonitorStateOptions {
  theme?: ThemePreset;
  processLimit?: number;
  historyLength?: number;
}

export function createInitialState(options: MonitorStateOptions = {}): MonitorState {
  const historyLength = options.historyLength ?? HISTORY_LENGTH;
  return {
    mode: { kind: 'normal' },
    query: '',
    cursor: null,
    view: [],
    theme: options.theme ?? THEME_PRESETS[0],
    snapshot: null,
    processLimit: options.processLimit ?? DEFAULT_PROCESS_LIMIT,
    history: {
      cpu: new HistoryBuffer(historyLength),
      memory: new HistoryBuffer(historyLength),
      rx: new HistoryBuffer(historyLength),
      tx: new HistoryBuffer(historyLength),
    },
    detail: null,
    notice: null,
    quitRequested: false,
  };
}

// ─── Tick ───

const clampPercent = (value: number): number => (Number.isFinite(value) ? Math.min(100, Math.max(0, value)) : 0);

/**
 * Traffic since the previous snapshot, summed over interfaces present in
 * both. New interfaces and counter resets contribute nothing.
 */
export function networkDelta(
  previous: readonly Readonly<NetInfo>[] | null,
  current: readonly Readonly<NetInfo>[],
): { rx: number; tx: number } {
  if (!previous) return { rx: 0, tx: 0 };

  const before = new Map(previous.map((iface) => [iface.name, iface]));
  let rx = 0;
  let tx = 0;
  for (const iface of current) {
    const prev = before.get(iface.name);
    if (!prev) continue;
    rx += Math.max(0, iface.rxBytes - prev.rxBytes);
    tx += Math.max(0, iface.txBytes - prev.txBytes);
  }
  return { rx, tx };
}

/**
 * Traffic per second between two snapshots. Without a usable time gap
 * (same or earlier timestamp) the raw delta is returned.
 */
export function networkRate(
  previous: Readonly<Snapshot> | null,
  current: Readonly<Snapshot>,
): { rx: number; tx: number } {
  const delta = networkDelta(previous?.interfaces ?? null, current.interfaces);
  const seconds = previous ? (current.timestamp - previous.timestamp) / 1000 : 0;
  if (!(seconds > 0)) return delta;
  return { rx: delta.rx / seconds, tx: delta.tx / seconds };
}

/**
 * Fold a fresh snapshot into the state: push one sample into every history
 * series, rebuild the process view, and re-clamp the cursor.
 *
 * The returned state shares `history` with `state`; the buffers are updated
 * in place.
 */
export function applySnapshot<S extends MonitorState>(state: S, snapshot: Snapshot): S {
  const { history } = state;
  const memPercent = snapshot.memTotal > 0 ? (snapshot.memUsed / snapshot.memTotal) * 100 : 0;
  const traffic = networkRate(state.snapshot, snapshot);

  history.cpu.push(clampPercent(snapshot.cpuPercent));
  history.memory.push(clampPercent(memPercent));
  history.rx.push(traffic.rx);
  history.tx.push(traffic.tx);

  const view = buildProcessView(snapshot.processes, state.query, state.processLimit);
  return { ...state, snapshot, view, cursor: reconcileCursor(state.cursor, view.length) };
}

export function toFrame(state: MonitorState): MonitorFrame {
  return {
    snapshot: state.snapshot,
    history: {
      cpu: state.history.cpu.values(),
      memory: state.history.memory.values(),
      rx: state.history.rx.values(),
      tx: state.history.tx.values(),
    },
    view: state.view,
    cursor: state.cursor,
    mode: state.mode,
    query: state.query,
    detail: state.detail,
    theme: state.theme,
    notice: state.notice,
  };
}

/** pid under inspection, or null outside DetailInspect. */
export function inspectedPid(state: MonitorState): number | null {
  return state.mode.kind === 'detail-inspect' ? state.mode.inspectedPid : null;
}

// ─── Store ───

export interface MonitorActions {
  /** Run one key through the state machine; returns the command to execute, if any. */
  handleKey: (event: KeyEvent) => MonitorCommand | null;
  handleTick: (snapshot: Snapshot) => void;
  /** Store an inspect result, unless the user already left that process. */
  setDetail: (pid: number, detail: ProcessDetail | null) => void;
  setNotice: (notice: string | null) => void;
  requestQuit: () => void;
  getFrame: () => MonitorFrame;
}

export type MonitorStore = MonitorState & MonitorActions;

export function createMonitorStore(options: MonitorStateOptions = {}): StoreApi<MonitorStore> {
  return createStore<MonitorStore>()((set, get) => ({
    ...createInitialState(options),

    handleKey: (event) => {
      if (event.kind !== 'press') return null;

      const { state, command } = reduceKey(get(), event);
      const stillInspecting = state.mode.kind === 'detail-inspect';
      set({
        mode: state.mode,
        query: state.query,
        view: state.view,
        cursor: state.cursor,
        theme: state.theme,
        detail: stillInspecting ? state.detail : null,
        notice: null,
        quitRequested: state.quitRequested || command?.type === 'quit',
      });
      return command;
    },

    handleTick: (snapshot) => {
      const next = applySnapshot(get(), snapshot);
      set({ snapshot: next.snapshot, view: next.view, cursor: next.cursor });
    },

    setDetail: (pid, detail) => {
      if (inspectedPid(get()) !== pid) return;
      set({ detail });
    },

    setNotice: (notice) => set({ notice }),

    requestQuit: () => set({ quitRequested: true }),

    getFrame: () => toFrame(get()),
  }));
}
