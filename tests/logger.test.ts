/**
 * Tests for the tagged logger: level filtering, sink routing, file sink.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';

const { appendFileSyncMock } = vi.hoisted(() => ({ appendFileSyncMock: vi.fn() }));

vi.mock('fs', () => ({
  appendFileSync: appendFileSyncMock,
}));

import { createFileSink, createLogger, getLogLevel, setLogLevel, setLogSink } from '../src/main/services/logger';
import type { LogSink } from '../src/main/services/logger';

describe('logger', () => {
  afterEach(() => {
    setLogLevel('info');
    setLogSink(null);
    vi.restoreAllMocks();
    appendFileSyncMock.mockReset();
  });

  it('prefixes messages with the tag', () => {
    const sink = vi.fn<LogSink>();
    setLogSink(sink);
    createLogger('EventLoop').info('started', 42);
    expect(sink).toHaveBeenCalledWith('info', '[EventLoop]', 'started', [42]);
  });

  it('drops messages below the global level', () => {
    const sink = vi.fn<LogSink>();
    setLogSink(sink);
    setLogLevel('warn');
    const log = createLogger('Test');
    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');
    log.error('shown');
    expect(sink.mock.calls.map(([level]) => level)).toEqual(['warn', 'error']);
    expect(getLogLevel()).toBe('warn');
  });

  it('applies level changes to existing loggers', () => {
    const sink = vi.fn<LogSink>();
    setLogSink(sink);
    const log = createLogger('Test');
    log.debug('hidden');
    setLogLevel('debug');
    log.debug('shown');
    expect(sink).toHaveBeenCalledTimes(1);
  });

  it('writes to the console once the sink is reset', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    setLogSink(null);
    createLogger('Main').error('boom');
    expect(errorSpy).toHaveBeenCalledWith('[Main]', 'boom');
  });

  describe('createFileSink', () => {
    it('appends one formatted line per entry', () => {
      const sink = createFileSink('/tmp/termdash.log');
      sink('warn', '[Test]', 'count=%d', [3]);

      expect(appendFileSyncMock).toHaveBeenCalledTimes(1);
      const [file, line] = appendFileSyncMock.mock.calls[0];
      expect(file).toBe('/tmp/termdash.log');
      expect(line).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z WARN \[Test\] count=3\n$/);
    });

    it('stops writing after the first failure', () => {
      appendFileSyncMock.mockImplementationOnce(() => {
        throw new Error('EROFS');
      });
      const sink = createFileSink('/read-only/termdash.log');
      sink('info', '[Test]', 'first', []);
      sink('info', '[Test]', 'second', []);
      expect(appendFileSyncMock).toHaveBeenCalledTimes(1);
    });
  });
});
