/**
 * Input mode state machine — decides what a key press means in the current
 * mode and which side effect, if any, it asks for.
 *
 *   Normal        q/Esc quit · ↓/j ↑/k move · x/Del kill · / filter · Enter inspect · t theme
 *   SearchEdit    chars edit the query · Backspace · Enter keep · Esc clear
 *   DetailInspect Esc/Enter/Backspace back to Normal
 *
 * Transitions are pure: `reduceKey` returns the next state and a command for
 * the event loop to run. Keys a mode does not list are ignored.
 *
 * @module main/services/input-mode
 */

import { THEME_PRESETS } from '../../shared/constants';
import type {
  Cursor,
  InputMode,
  KeyCode,
  KeyEvent,
  MonitorCommand,
  ProcessView,
  Snapshot,
  ThemePreset,
} from '../../shared/types/monitor';
import { buildProcessView } from './process-view';
import { nextIndex, previousIndex, reconcileCursor, selectedRow } from './selection';

// ─── Bindings ───

export const KEY_BINDINGS = {
  quit: ['q'],
  down: ['j'],
  up: ['k'],
  kill: ['x'],
  filter: ['/'],
  theme: ['t'],
} as const satisfies Record<string, readonly string[]>;

/** The slice of monitor state the key handler reads and writes. */
export interface InteractionState {
  readonly mode: InputMode;
  readonly query: string;
  readonly cursor: Cursor;
  readonly view: ProcessView;
  readonly theme: ThemePreset;
  /** Latest snapshot, used to rebuild the view when the query changes */
  readonly snapshot: Snapshot | null;
  readonly processLimit: number;
}

export interface KeyOutcome<S extends InteractionState> {
  state: S;
  command: MonitorCommand | null;
}

export function nextTheme(theme: ThemePreset): ThemePreset {
  const index = THEME_PRESETS.indexOf(theme);
  return THEME_PRESETS[(index + 1) % THEME_PRESETS.length];
}

const isChar = (code: KeyCode, chars: readonly string[]): boolean =>
  code.type === 'char' && chars.includes(code.char);

function withQuery<S extends InteractionState>(state: S, query: string): S {
  const view = state.snapshot ? buildProcessView(state.snapshot.processes, query, state.processLimit) : state.view;
  return { ...state, query, view, cursor: reconcileCursor(state.cursor, view.length) };
}

// ─── Per-mode handlers ───

function reduceNormal<S extends InteractionState>(state: S, code: KeyCode): KeyOutcome<S> {
  if (code.type === 'escape' || isChar(code, KEY_BINDINGS.quit)) {
    return { state, command: { type: 'quit' } };
  }
  if (code.type === 'down' || isChar(code, KEY_BINDINGS.down)) {
    return { state: { ...state, cursor: nextIndex(state.cursor, state.view.length) }, command: null };
  }
  if (code.type === 'up' || isChar(code, KEY_BINDINGS.up)) {
    return { state: { ...state, cursor: previousIndex(state.cursor, state.view.length) }, command: null };
  }
  if (code.type === 'delete' || isChar(code, KEY_BINDINGS.kill)) {
    const row = selectedRow(state.view, state.cursor);
    return { state, command: row ? { type: 'terminate', pid: row.pid } : null };
  }
  if (isChar(code, KEY_BINDINGS.filter)) {
    return {
      state: { ...state, mode: { kind: 'search-edit' }, cursor: reconcileCursor(0, state.view.length) },
      command: null,
    };
  }
  if (code.type === 'enter') {
    const row = selectedRow(state.view, state.cursor);
    if (!row) return { state, command: null };
    return {
      state: { ...state, mode: { kind: 'detail-inspect', inspectedPid: row.pid } },
      command: { type: 'inspect', pid: row.pid },
    };
  }
  if (isChar(code, KEY_BINDINGS.theme)) {
    return { state: { ...state, theme: nextTheme(state.theme) }, command: null };
  }
  return { state, command: null };
}

function reduceSearchEdit<S extends InteractionState>(state: S, code: KeyCode): KeyOutcome<S> {
  switch (code.type) {
    case 'char':
      return { state: withQuery(state, state.query + code.char), command: null };
    case 'backspace':
      // Drop one code point, not one UTF-16 unit
      return { state: withQuery(state, Array.from(state.query).slice(0, -1).join('')), command: null };
    case 'enter':
      return { state: { ...state, mode: { kind: 'normal' } }, command: null };
    case 'escape':
      return { state: { ...withQuery(state, ''), mode: { kind: 'normal' } }, command: null };
    default:
      return { state, command: null };
  }
}

function reduceDetailInspect<S extends InteractionState>(state: S, code: KeyCode): KeyOutcome<S> {
  if (code.type === 'escape' || code.type === 'enter' || code.type === 'backspace') {
    return { state: { ...state, mode: { kind: 'normal' } }, command: null };
  }
  return { state, command: null };
}

// ─── Dispatch ───

/** Route one key event to the handler of the current mode. Only presses act. */
export function reduceKey<S extends InteractionState>(state: S, event: KeyEvent): KeyOutcome<S> {
  if (event.kind !== 'press') {
    return { state, command: null };
  }

  const mode: InputMode = state.mode;
  switch (mode.kind) {
    case 'normal':
      return reduceNormal(state, event.code);
    case 'search-edit':
      return reduceSearchEdit(state, event.code);
    case 'detail-inspect':
      return reduceDetailInspect(state, event.code);
  }
}
