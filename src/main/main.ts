#!/usr/bin/env node
import { ErrorCode, MonitorError } from '../shared/types/errors';
import { TerminalDriver } from '../renderer/terminal-driver';
import { USAGE, parseCliArgs } from './cli';
import type { CliOptions } from './cli';
import { ConfigService } from './services/config';
import { EventLoop } from './services/event-loop';
import { KeyQueue } from './services/key-queue';
import { createFileSink, createLogger, setLogLevel, setLogSink, silentSink } from './services/logger';
import { SystemMetricsProvider } from './services/metrics-provider';
import { createMonitorStore } from './services/monitor-state';

const log = createLogger('Main');

/** Terminal currently on screen; restored by the crash handlers below. */
let activeDriver: TerminalDriver | null = null;

function crash(label: string, reason: unknown): never {
  activeDriver?.close();
  setLogSink(null);
  log.error(label, reason);
  process.exit(1);
}

/**
 * Run the dashboard until the user quits. Resolves with the process exit
 * code: 0 on a clean quit, 1 when the terminal could not be opened or the
 * loop failed. The terminal is restored before this returns.
 */
export async function main(argv: string[]): Promise<number> {
  let cli: CliOptions;
  try {
    cli = parseCliArgs(argv);
  } catch (error) {
    log.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return 1;
  }
  if (cli.help) {
    console.log(USAGE);
    return 0;
  }

  const config = new ConfigService(cli.configPath);
  setLogLevel(config.get('logLevel'));

  const driver = new TerminalDriver();
  try {
    driver.open();
  } catch (error) {
    log.error('Cannot start:', MonitorError.from(error, ErrorCode.TERMINAL_INIT_ERROR).message);
    return 1;
  }
  activeDriver = driver;

  // The screen belongs to the dashboard from here on
  const logFile = config.get('logFile');
  setLogSink(logFile ? createFileSink(logFile) : silentSink);

  let failure: MonitorError | null = null;
  try {
    const store = createMonitorStore({
      theme: config.get('theme'),
      processLimit: config.get('processLimit'),
    });
    const keys = new KeyQueue();
    driver.onKey((event) => keys.push(event));
    driver.onInputError((error) => keys.fail(error));
    driver.onInterrupt(() => {
      store.getState().requestQuit();
      keys.close();
    });

    const loop = new EventLoop({
      store,
      provider: new SystemMetricsProvider(),
      keys,
      renderer: driver,
    });
    await loop.run();
  } catch (error) {
    failure = MonitorError.from(error);
  } finally {
    driver.close();
    activeDriver = null;
    setLogSink(null);
  }

  if (failure) {
    log.error(failure.describe());
    log.debug('Failure context:', failure.context ?? {});
    return 1;
  }
  return 0;
}

if (require.main === module) {
  process.on('uncaughtException', (error) => crash('Uncaught exception:', error));
  process.on('unhandledRejection', (reason) => crash('Unhandled promise rejection:', reason));

  main(process.argv.slice(2)).then(
    (code) => process.exit(code),
    (error: unknown) => crash('Fatal error:', error),
  );
}
