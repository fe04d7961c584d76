import type { ProcessDetail } from '../../shared/types/monitor';
import { createLogger } from './logger';
import type { MetricsProvider } from './metrics-provider';

const log = createLogger('ActionExecutor');

/**
 * Runs the two side effects reachable from the keyboard.
 *
 * Neither ever fails the loop. A process that is gone or off-limits simply
 * shows up (or not) in the next tick's view; an inspect that finds nothing
 * yields null and the inspector says so.
 */
export class ActionExecutor {
  constructor(private readonly provider: MetricsProvider) {}

  async terminate(pid: number): Promise<boolean> {
    try {
      return await this.provider.terminate(pid);
    } catch (error) {
      log.debug(`Terminate ${pid} failed:`, error);
      return false;
    }
  }

  async inspect(pid: number): Promise<ProcessDetail | null> {
    try {
      return await this.provider.inspect(pid);
    } catch (error) {
      log.debug(`Inspect ${pid} failed:`, error);
      return null;
    }
  }
}
