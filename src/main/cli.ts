/**
 * Command-line flags. Everything else comes from the config file.
 */

import { parseArgs } from 'util';
import { ErrorCode, MonitorError } from '../shared/types/errors';

export const USAGE = `Usage: termdash [options]

Live CPU, memory, disk, network and process monitor.

Options:
  -c, --config <path>  Read settings from <path> instead of ~/.config/termdash/config.json
  -h, --help           Show this help

Keys: q/Esc quit · ↑↓/j k select · x/Del kill · / filter · Enter inspect · t theme`;

export interface CliOptions {
  configPath?: string;
  help: boolean;
}

export function parseCliArgs(argv: string[]): CliOptions {
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        config: { type: 'string', short: 'c' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    });
    return { configPath: values.config, help: values.help ?? false };
  } catch (error) {
    throw MonitorError.from(error, ErrorCode.INVALID_ARGUMENT);
  }
}
