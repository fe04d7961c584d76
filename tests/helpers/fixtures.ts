/**
 * Builders shared by the monitor tests.
 */

import type { KeyCode, KeyEvent, NetInfo, ProcessInfo, Snapshot } from '../../src/shared/types/monitor';

export function proc(pid: number, name: string, cpuPercent: number, memoryBytes = 1024 * 1024): ProcessInfo {
  return { pid, name, cpuPercent, memoryBytes };
}

export function processTable(...procs: ProcessInfo[]): Map<number, ProcessInfo> {
  return new Map(procs.map((p) => [p.pid, p]));
}

export function snapshot(overrides: Partial<Snapshot> = {}): Snapshot {
  return {
    timestamp: 0,
    hostname: 'test-host',
    cpuPercent: 0,
    memUsed: 0,
    memTotal: 0,
    disks: [],
    interfaces: [],
    processes: new Map(),
    ...overrides,
  };
}

export function iface(name: string, rxBytes: number, txBytes: number): NetInfo {
  return { name, rxBytes, txBytes };
}

export function press(code: KeyCode): KeyEvent {
  return { code, kind: 'press' };
}

export function char(c: string): KeyEvent {
  return press({ type: 'char', char: c });
}

export const keys = {
  up: press({ type: 'up' }),
  down: press({ type: 'down' }),
  enter: press({ type: 'enter' }),
  escape: press({ type: 'escape' }),
  backspace: press({ type: 'backspace' }),
  delete: press({ type: 'delete' }),
};

/** Type each character of `text` as a separate press. */
export function typed(text: string): KeyEvent[] {
  return Array.from(text).map(char);
}
