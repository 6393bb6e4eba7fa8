import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { clearLog, createLogger, errorMessage, getLogBuffer, getLogLevel, setLogLevel } from './logger';

describe('logger', () => {
  beforeEach(() => {
    clearLog();
    setLogLevel('info');
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('formats entries with level and scope', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    createLogger('Bridge').info('ready');

    const [entry] = getLogBuffer();
    expect(entry).toMatch(/^\[\d{2}:\d{2}:\d{2}\] INFO \[Bridge\] ready$/);
  });

  it('buffers entries below the console threshold without printing them', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    setLogLevel('warn');
    expect(getLogLevel()).toBe('warn');

    const log = createLogger('Test');
    log.debug('quiet');
    log.warn('loud');

    expect(getLogBuffer()).toHaveLength(2);
    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('keeps the newest 500 entries', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const log = createLogger('Test');
    for (let i = 0; i < 502; i++) {
      log.error(`entry ${i}`);
    }

    const buffer = getLogBuffer();
    expect(buffer).toHaveLength(500);
    expect(buffer[0].endsWith('entry 2')).toBe(true);
  });

  it('reads messages from errors and other thrown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});
