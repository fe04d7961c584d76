/**
 * Panel contents: pure functions from a frame to the tagged text each
 * dashboard box shows. Kept apart from the widgets so they test without a
 * terminal.
 */

import { APP_TITLE } from '../shared/constants';
import type { DiskInfo, MonitorFrame, NetInfo, ProcessView } from '../shared/types/monitor';
import { fitCell, formatBytes, formatGB, formatMB, formatPercent, visibleWindow } from './format';
import type { Palette } from './themes';

const PID_WIDTH = 7;
const CPU_WIDTH = 8;
const MEM_WIDTH = 11;
const MIN_NAME_WIDTH = 4;

/** blessed reads `{...}` as markup; literal braces become `{open}` / `{close}` */
const escapeTags = (text: string): string => text.replace(/[{}]/g, (ch) => (ch === '{' ? '{open}' : '{close}'));

// ─── Header ───

export const KEY_HINTS = '[Q] Quit [/] Filter [Up/Down] Select [X] Kill [Enter] Inspect [T] Theme';

export function headerText(frame: MonitorFrame, palette: Palette): string {
  const host = escapeTags(frame.snapshot?.hostname ?? 'Unknown');
  const title = `{bold}{${palette.headerFg}-fg}{${palette.headerBg}-bg} ${APP_TITLE} {/}`;
  const tail = frame.notice
    ? `{bold}${escapeTags(frame.notice)}{/bold}`
    : `{${palette.hint}-fg}${KEY_HINTS} (${frame.theme}){/}`;
  return `${title} | Host: ${host} | ${tail}`;
}

// ─── Processes ───

export function processTableLabel(query: string): string {
  return query === '' ? ' Top Processes (CPU) ' : ` Search: '${escapeTags(query)}' `;
}

function processColumns(width: number): number[] {
  const name = Math.max(MIN_NAME_WIDTH, width - PID_WIDTH - CPU_WIDTH - MEM_WIDTH - 3);
  return [PID_WIDTH, name, CPU_WIDTH, MEM_WIDTH];
}

function row(cells: string[], widths: number[]): string {
  return cells.map((cell, i) => fitCell(cell, widths[i] ?? 0)).join(' ');
}

/**
 * Column header plus as many rows as fit in `rows` lines, scrolled so the
 * cursor row stays visible and highlighted.
 */
export function processTableLines(
  view: ProcessView,
  cursor: number | null,
  palette: Palette,
  width: number,
  rows: number,
): string[] {
  const widths = processColumns(width);
  const lines = [`{${palette.columnHeader}-fg}${row(['PID', 'Name', 'CPU', 'MEM'], widths)}{/}`];

  const bodyRows = Math.max(0, rows - 1);
  const start = visibleWindow(cursor, view.length, bodyRows);
  view.slice(start, start + bodyRows).forEach((proc, offset) => {
    const text = escapeTags(
      row([String(proc.pid), proc.name, formatPercent(proc.cpuPercent), formatMB(proc.memoryBytes)], widths),
    );
    lines.push(
      start + offset === cursor
        ? `{bold}{${palette.selectionFg}-fg}{${palette.selectionBg}-bg}${text}{/}`
        : text,
    );
  });
  return lines;
}

export function filterBarText(frame: MonitorFrame): string {
  const query = escapeTags(frame.query);
  return frame.mode.kind === 'search-edit' ? `Search: ${query}_` : `Search: ${query} (Press '/')`;
}

// ─── Disks / network ───

export function diskLines(disks: readonly Readonly<DiskInfo>[], width: number): string[] {
  const widths = [Math.max(MIN_NAME_WIDTH, width - 24), 12, 10];
  return disks.map((disk) =>
    escapeTags(row([disk.mount, formatGB(disk.totalBytes), `${Math.trunc(disk.usagePercent)}%`], widths)),
  );
}

/** Interfaces that have moved any traffic, with cumulative totals. */
export function networkLines(interfaces: readonly Readonly<NetInfo>[], width: number): string[] {
  const widths = [Math.max(MIN_NAME_WIDTH, width - 26), 12, 12];
  return interfaces
    .filter((iface) => iface.rxBytes > 0 || iface.txBytes > 0)
    .map((iface) =>
      escapeTags(row([iface.name, `↓ ${formatBytes(iface.rxBytes)}`, `↑ ${formatBytes(iface.txBytes)}`], widths)),
    );
}

// ─── Detail inspector ───

export function detailLines(frame: MonitorFrame): string[] {
  const pid = frame.mode.kind === 'detail-inspect' ? frame.mode.inspectedPid : null;
  const footer = '{gray-fg}[Esc/Enter/Backspace] Back{/}';
  const { detail } = frame;

  if (!detail) {
    return [`Process ${pid ?? '?'} is no longer running`, '', footer];
  }

  const io =
    detail.diskReadBytes === null || detail.diskWrittenBytes === null
      ? 'n/a'
      : `read ${formatBytes(detail.diskReadBytes)} · written ${formatBytes(detail.diskWrittenBytes)}`;

  return [
    `{bold}PID:{/bold}      ${detail.pid}`,
    `{bold}Name:{/bold}     ${escapeTags(detail.name)}`,
    `{bold}Status:{/bold}   ${escapeTags(detail.status)}`,
    `{bold}CPU:{/bold}      ${formatPercent(detail.cpuPercent)}`,
    `{bold}Memory:{/bold}   ${formatMB(detail.memoryBytes)} (virtual ${formatMB(detail.virtualMemoryBytes)})`,
    `{bold}Started:{/bold}  ${escapeTags(detail.startedAt)}`,
    `{bold}Disk I/O:{/bold} ${io}`,
    `{bold}Command:{/bold}  ${escapeTags(detail.command)}`,
    '',
    footer,
  ];
}
