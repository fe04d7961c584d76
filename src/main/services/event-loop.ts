/**
 * EventLoop — the single-threaded tick/key scheduler.
 *
 * Each iteration draws one frame, waits for a key no longer than the time
 * left until the next tick, handles that key, and samples once the tick
 * interval has fully elapsed. The wait saturates at zero, so an overrun
 * makes the next tick fire immediately instead of stacking delay. A quit
 * request is seen at the top of the next iteration; a sample in flight is
 * never interrupted.
 *
 * @module main/services/event-loop
 */

import type { StoreApi } from 'zustand/vanilla';
import { TERMINATE_SIGNAL, TICK_RATE_MS } from '../../shared/constants';
import { ErrorCode, MonitorError } from '../../shared/types/errors';
import type { KeyEvent, MonitorFrame, Snapshot } from '../../shared/types/monitor';
import { ActionExecutor } from './action-executor';
import type { KeySource } from './key-queue';
import { createLogger } from './logger';
import type { MetricsProvider } from './metrics-provider';
import { inspectedPid } from './monitor-state';
import type { MonitorStore } from './monitor-state';

const log = createLogger('EventLoop');

export interface FrameRenderer {
  draw(frame: MonitorFrame): void;
}

export interface Clock {
  /** Milliseconds on a monotonic scale */
  now(): number;
}

export const systemClock: Clock = {
  now: () => performance.now(),
};

export interface EventLoopOptions {
  store: StoreApi<MonitorStore>;
  provider: MetricsProvider;
  keys: KeySource;
  renderer: FrameRenderer;
  executor?: ActionExecutor;
  tickRateMs?: number;
  clock?: Clock;
}

export class EventLoop {
  private readonly store: StoreApi<MonitorStore>;
  private readonly provider: MetricsProvider;
  private readonly keys: KeySource;
  private readonly renderer: FrameRenderer;
  private readonly executor: ActionExecutor;
  private readonly tickRateMs: number;
  private readonly clock: Clock;

  constructor(options: EventLoopOptions) {
    this.store = options.store;
    this.provider = options.provider;
    this.keys = options.keys;
    this.renderer = options.renderer;
    this.executor = options.executor ?? new ActionExecutor(options.provider);
    this.tickRateMs = options.tickRateMs ?? TICK_RATE_MS;
    this.clock = options.clock ?? systemClock;
  }

  /** Run until quit is requested. Render, input and fatal sampling failures reject. */
  async run(): Promise<void> {
    // Sample once up front so the first frame has data
    await this.tick();
    let lastTick = this.clock.now();

    while (!this.store.getState().quitRequested) {
      this.draw();

      const timeout = Math.max(0, this.tickRateMs - (this.clock.now() - lastTick));
      const event = await this.readKey(timeout);
      if (event) {
        await this.handleKey(event);
      }

      if (this.clock.now() - lastTick >= this.tickRateMs) {
        await this.tick();
        lastTick = this.clock.now();
      }
    }

    log.info('Quit requested, leaving event loop');
  }

  // ─── Tick ───

  private async tick(): Promise<void> {
    let snapshot: Snapshot;
    try {
      snapshot = await this.provider.sample();
    } catch (error) {
      if (error instanceof MonitorError && error.fatal) throw error;
      log.warn('Sampling failed, skipping this tick:', error);
      return;
    }

    this.store.getState().handleTick(snapshot);

    const pid = inspectedPid(this.store.getState());
    if (pid !== null) {
      await this.refreshDetail(pid);
    }
  }

  private async refreshDetail(pid: number): Promise<void> {
    const detail = await this.executor.inspect(pid);
    this.store.getState().setDetail(pid, detail);
  }

  // ─── Keys ───

  private async readKey(timeoutMs: number): Promise<KeyEvent | null> {
    try {
      return await this.keys.next(timeoutMs);
    } catch (error) {
      throw new MonitorError('Failed to read keyboard input', ErrorCode.INPUT_ERROR, {
        fatal: true,
        cause: error,
      });
    }
  }

  private async handleKey(event: KeyEvent): Promise<void> {
    const command = this.store.getState().handleKey(event);
    if (!command) return;

    switch (command.type) {
      case 'quit':
        return;
      case 'terminate': {
        const sent = await this.executor.terminate(command.pid);
        this.store
          .getState()
          .setNotice(sent ? `Sent ${TERMINATE_SIGNAL} to ${command.pid}` : `Could not terminate ${command.pid}`);
        return;
      }
      case 'inspect':
        await this.refreshDetail(command.pid);
        return;
    }
  }

  // ─── Draw ───

  private draw(): void {
    try {
      this.renderer.draw(this.store.getState().getFrame());
    } catch (error) {
      throw new MonitorError('Failed to draw frame', ErrorCode.RENDER_ERROR, {
        fatal: true,
        cause: error,
      });
    }
  }
}
