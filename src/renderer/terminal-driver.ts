/**
 * TerminalDriver — the blessed screen and its lifecycle.
 *
 * `open()` takes over the terminal (alternate screen, raw input, hidden
 * cursor); `close()` hands it back and is safe to call any number of
 * times, so every exit path in main.ts can call it unconditionally.
 *
 * @module renderer/terminal-driver
 */

import * as blessed from 'blessed';
import type { Widgets } from 'blessed';
import type { Duplex } from 'stream';
import { APP_TITLE } from '../shared/constants';
import { ErrorCode, MonitorError } from '../shared/types/errors';
import type { KeyEvent, MonitorFrame } from '../shared/types/monitor';
import type { FrameRenderer } from '../main/services/event-loop';
import { createLogger } from '../main/services/logger';
import { Dashboard } from './dashboard';

const log = createLogger('TerminalDriver');

const INTERRUPT_KEYS = new Set(['C-c']);

/** process.stdin / process.stdout, or any socket standing in for a TTY */
export type TerminalStream = Duplex & { isTTY?: boolean };

/**
 * Translate a blessed keypress into a KeyEvent. blessed only reports
 * presses. Returns null for keys the driver handles itself (Ctrl+C) and
 * for the `return` keypress blessed sends after the `enter` copy it makes
 * of every carriage return, so one Enter is one event.
 */
export function toKeyEvent(ch: string | undefined, key: Widgets.Events.IKeyEventArg | undefined): KeyEvent | null {
  if (key && INTERRUPT_KEYS.has(key.full)) return null;

  switch (key?.name) {
    case 'up':
      return { code: { type: 'up' }, kind: 'press' };
    case 'down':
      return { code: { type: 'down' }, kind: 'press' };
    case 'enter':
      return { code: { type: 'enter' }, kind: 'press' };
    case 'return':
      if (key?.sequence === '\r') return null;
      return { code: { type: 'enter' }, kind: 'press' };
    case 'escape':
      return { code: { type: 'escape' }, kind: 'press' };
    case 'backspace':
      return { code: { type: 'backspace' }, kind: 'press' };
    case 'delete':
      return { code: { type: 'delete' }, kind: 'press' };
  }

  if (ch && !key?.ctrl && !key?.meta && Array.from(ch).length === 1 && ch >= ' ' && ch !== '\x7f') {
    return { code: { type: 'char', char: ch }, kind: 'press' };
  }
  return { code: { type: 'other', name: key?.full ?? ch ?? '' }, kind: 'press' };
}

export class TerminalDriver implements FrameRenderer {
  private screen: Widgets.Screen | null = null;
  private dashboard: Dashboard | null = null;
  private readonly keyListeners = new Set<(event: KeyEvent) => void>();
  private readonly interruptListeners = new Set<() => void>();
  private readonly inputErrorListeners = new Set<(error: Error) => void>();

  constructor(
    private readonly input: TerminalStream = process.stdin,
    private readonly output: TerminalStream = process.stdout,
  ) {}

  open(): void {
    if (this.screen) return;
    if (!this.input.isTTY || !this.output.isTTY) {
      throw new MonitorError('termdash needs an interactive terminal', ErrorCode.TERMINAL_INIT_ERROR, {
        fatal: true,
      });
    }

    try {
      const screen = blessed.screen({
        smartCSR: true,
        fullUnicode: true,
        title: APP_TITLE,
        input: this.input,
        output: this.output,
      });
      this.screen = screen;
      screen.on('keypress', (ch: string | undefined, key: Widgets.Events.IKeyEventArg | undefined) =>
        this.onKeypress(ch, key),
      );
      this.input.on('error', this.handleInputError);
      this.input.on('end', this.handleInputEnd);
      this.dashboard = new Dashboard(screen);
      log.debug('Terminal opened');
    } catch (error) {
      this.close();
      throw new MonitorError('Could not take over the terminal', ErrorCode.TERMINAL_INIT_ERROR, {
        fatal: true,
        cause: error,
      });
    }
  }

  onKey(listener: (event: KeyEvent) => void): () => void {
    this.keyListeners.add(listener);
    return () => {
      this.keyListeners.delete(listener);
    };
  }

  /** Ctrl+C arrives as a key in raw mode; listeners treat it as a quit request. */
  onInterrupt(listener: () => void): () => void {
    this.interruptListeners.add(listener);
    return () => {
      this.interruptListeners.delete(listener);
    };
  }

  /** The input stream failed or closed; no more keys will arrive. */
  onInputError(listener: (error: Error) => void): () => void {
    this.inputErrorListeners.add(listener);
    return () => {
      this.inputErrorListeners.delete(listener);
    };
  }

  draw(frame: MonitorFrame): void {
    if (!this.screen || !this.dashboard) {
      throw new MonitorError('Terminal is not open', ErrorCode.INVALID_STATE);
    }
    this.dashboard.update(frame);
    this.screen.render();
  }

  /** Leave the alternate screen and restore the terminal's modes. */
  close(): void {
    const screen = this.screen;
    this.screen = null;
    this.dashboard = null;
    if (!screen) return;
    this.input.off('error', this.handleInputError);
    this.input.off('end', this.handleInputEnd);
    screen.destroy();
    log.debug('Terminal restored');
  }

  private readonly handleInputError = (error: Error): void => {
    for (const listener of this.inputErrorListeners) listener(error);
  };

  private readonly handleInputEnd = (): void => {
    this.handleInputError(new Error('Terminal input closed'));
  };

  private onKeypress(ch: string | undefined, key: Widgets.Events.IKeyEventArg | undefined): void {
    if (key && INTERRUPT_KEYS.has(key.full)) {
      for (const listener of this.interruptListeners) listener();
      return;
    }
    const event = toKeyEvent(ch, key);
    if (!event) return;
    for (const listener of this.keyListeners) listener(event);
  }
}
