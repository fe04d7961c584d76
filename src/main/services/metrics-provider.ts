import * as os from 'os';
import * as fsp from 'fs/promises';
import * as si from 'systeminformation';
import { TERMINATE_SIGNAL } from '../../shared/constants';
import { ErrorCode, MonitorError } from '../../shared/types/errors';
import type { DiskInfo, NetInfo, ProcessDetail, ProcessInfo, Snapshot } from '../../shared/types/monitor';
import { createLogger } from './logger';

/**
 * MetricsProvider — the monitor's only window onto the host.
 *
 * `sample()` is called once per tick. Resources that cannot be enumerated
 * on a given tick (a disk unmounted mid-read, a network query timing out)
 * come back empty rather than failing the whole snapshot. Only the CPU and
 * memory readings are required.
 */
export interface MetricsProvider {
  sample(): Promise<Snapshot>;
  /** Ask the process to exit. Resolves false if the signal could not be sent. */
  terminate(pid: number): Promise<boolean>;
  /** Extended fields for one process, or null once it has exited. */
  inspect(pid: number): Promise<ProcessDetail | null>;
}

const log = createLogger('MetricsProvider');

/** systeminformation reports process memory in KiB */
const KIB = 1024;

export class SystemMetricsProvider implements MetricsProvider {
  async sample(): Promise<Snapshot> {
    const [cpuPercent, memory, disks, interfaces, processes] = await Promise.all([
      this.readCpu(),
      this.readMemory(),
      this.readDisks(),
      this.readNetwork(),
      this.readProcesses(),
    ]);

    return {
      timestamp: Date.now(),
      hostname: os.hostname(),
      cpuPercent,
      memUsed: memory.used,
      memTotal: memory.total,
      disks,
      interfaces,
      processes,
    };
  }

  // ─── CPU ───

  private async readCpu(): Promise<number> {
    try {
      const load = await si.currentLoad();
      return load.currentLoad;
    } catch (error) {
      throw new MonitorError('Failed to read CPU load', ErrorCode.SAMPLE_ERROR, {
        cause: error,
      });
    }
  }

  // ─── Memory ───

  private async readMemory(): Promise<{ used: number; total: number }> {
    try {
      const mem = await si.mem();
      // "available" excludes reclaimable cache, matching what top reports as used
      return { used: Math.max(0, mem.total - mem.available), total: mem.total };
    } catch (error) {
      throw new MonitorError('Failed to read memory usage', ErrorCode.SAMPLE_ERROR, {
        cause: error,
      });
    }
  }

  // ─── Disk ───

  private async readDisks(): Promise<DiskInfo[]> {
    try {
      const volumes = await si.fsSize();
      return volumes
        .filter((v) => v.size > 0)
        .map((v) => ({
          mount: v.mount || v.fs,
          totalBytes: v.size,
          usedBytes: v.used,
          usagePercent: (v.used / v.size) * 100,
        }));
    } catch (error) {
      log.debug('Disk enumeration failed, omitting disks this tick:', error);
      return [];
    }
  }

  // ─── Network ───

  private async readNetwork(): Promise<NetInfo[]> {
    try {
      const stats = await si.networkStats('*');
      return stats.map((s) => ({ name: s.iface, rxBytes: s.rx_bytes, txBytes: s.tx_bytes }));
    } catch (error) {
      log.debug('Network stats failed, omitting interfaces this tick:', error);
      return [];
    }
  }

  // ─── Processes ───

  private async readProcesses(): Promise<Map<number, ProcessInfo>> {
    const table = new Map<number, ProcessInfo>();
    try {
      const data = await si.processes();
      for (const proc of data.list) {
        table.set(proc.pid, {
          pid: proc.pid,
          name: proc.name,
          cpuPercent: proc.cpu,
          memoryBytes: proc.memRss * KIB,
        });
      }
    } catch (error) {
      log.debug('Process enumeration failed, omitting processes this tick:', error);
    }
    return table;
  }

  async terminate(pid: number): Promise<boolean> {
    try {
      process.kill(pid, TERMINATE_SIGNAL);
      log.info(`Sent ${TERMINATE_SIGNAL} to ${pid}`);
      return true;
    } catch (error) {
      // ESRCH (already gone) or EPERM; the next tick shows which
      log.debug(`Could not signal ${pid}:`, error);
      return false;
    }
  }

  async inspect(pid: number): Promise<ProcessDetail | null> {
    const data = await si.processes();
    const proc = data.list.find((p) => p.pid === pid);
    if (!proc) return null;

    const io = await this.readProcessIo(pid);
    return {
      pid: proc.pid,
      name: proc.name,
      status: proc.state || 'unknown',
      cpuPercent: proc.cpu,
      memoryBytes: proc.memRss * KIB,
      virtualMemoryBytes: proc.memVsz * KIB,
      startedAt: proc.started,
      command: [proc.command, proc.params].filter((part) => part).join(' ') || proc.name,
      diskReadBytes: io?.read ?? null,
      diskWrittenBytes: io?.written ?? null,
    };
  }

  /** Cumulative storage I/O from /proc; Linux only, and only for readable processes. */
  private async readProcessIo(pid: number): Promise<{ read: number; written: number } | null> {
    if (process.platform !== 'linux') return null;
    try {
      const text = await fsp.readFile(`/proc/${pid}/io`, 'utf8');
      return parseProcIo(text);
    } catch (error) {
      log.debug(`No I/O counters for ${pid}:`, error);
      return null;
    }
  }
}

/** Parse the `read_bytes` / `write_bytes` lines of /proc/<pid>/io. */
export function parseProcIo(text: string): { read: number; written: number } | null {
  const field = (name: string): number | null => {
    const match = text.match(new RegExp(`^${name}:\\s*(\\d+)`, 'm'));
    return match ? parseInt(match[1], 10) : null;
  };

  const read = field('read_bytes');
  const written = field('write_bytes');
  if (read === null || written === null) return null;
  return { read, written };
}
