import { DEFAULT_PROCESS_LIMIT } from '../../shared/constants';
import type { ProcessInfo, ProcessView } from '../../shared/types/monitor';

const cpuOf = (proc: Readonly<ProcessInfo>): number => (Number.isFinite(proc.cpuPercent) ? proc.cpuPercent : 0);

/**
 * Derive the displayed process list from a snapshot's process table.
 *
 * Empty query: every process, busiest first, cut to `limit` rows.
 * Otherwise: processes whose name contains the query (case-insensitive),
 * busiest first, with no cap. The sort is stable and has no secondary key.
 */
export function buildProcessView(
  processes: ReadonlyMap<number, Readonly<ProcessInfo>>,
  query: string,
  limit: number = DEFAULT_PROCESS_LIMIT,
): ProcessView {
  const needle = query.toLowerCase();
  const matches = [...processes.values()].filter((p) => needle === '' || p.name.toLowerCase().includes(needle));

  matches.sort((a, b) => cpuOf(b) - cpuOf(a));

  const rows = needle === '' ? matches.slice(0, Math.max(0, limit)) : matches;
  return rows.map((p) => ({
    pid: p.pid,
    name: p.name,
    cpuPercent: p.cpuPercent,
    memoryBytes: p.memoryBytes,
  }));
}
