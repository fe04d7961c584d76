/**
 * Text helpers shared by the dashboard panels.
 */

const SPARK_LEVELS = ['▁', '▂', '▃', '▄', '▅', '▆', '▇', '█'];

const KB = 1024;
const MB = 1024 ** 2;
const GB = 1024 ** 3;

export function formatKB(bytes: number): string {
  return `${(bytes / KB).toFixed(1)} KB`;
}

export function formatMB(bytes: number): string {
  return `${(bytes / MB).toFixed(1)} MB`;
}

export function formatGB(bytes: number): string {
  return `${(bytes / GB).toFixed(1)} GB`;
}

/** Largest unit that keeps the value at or above 1 */
export function formatBytes(bytes: number): string {
  if (bytes >= GB) return formatGB(bytes);
  if (bytes >= MB) return formatMB(bytes);
  if (bytes >= KB) return formatKB(bytes);
  return `${Math.max(0, Math.round(bytes))} B`;
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

/**
 * One character per sample for the newest `width` samples. Zero renders as
 * a blank; `max` defaults to the largest sample shown.
 */
export function sparkline(values: readonly number[], width: number, max?: number): string {
  if (width <= 0) return '';
  const shown = values.slice(-width);
  const ceiling = max ?? Math.max(0, ...shown);

  return shown
    .map((value) => {
      if (ceiling <= 0 || value <= 0) return ' ';
      const level = Math.ceil((Math.min(value, ceiling) / ceiling) * SPARK_LEVELS.length) - 1;
      return SPARK_LEVELS[Math.max(0, level)];
    })
    .join('');
}

/** Pad or cut `text` to exactly `width` columns. */
export function fitCell(text: string, width: number): string {
  if (width <= 0) return '';
  const chars = Array.from(text);
  if (chars.length > width) {
    return width === 1 ? '…' : `${chars.slice(0, width - 1).join('')}…`;
  }
  return text + ' '.repeat(width - chars.length);
}

/**
 * First row index to show so that `cursor` stays inside a window of `rows`
 * lines over `total` entries.
 */
export function visibleWindow(cursor: number | null, total: number, rows: number): number {
  if (rows <= 0 || total <= rows || cursor === null) return 0;
  const start = cursor >= rows ? cursor - rows + 1 : 0;
  return Math.min(start, total - rows);
}
