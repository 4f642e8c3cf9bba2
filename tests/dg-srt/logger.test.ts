import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, formatLogLine, resolveLoggerOptions } from '../../scripts/dg-srt/logger';

const at = new Date('2026-01-02T03:04:05.000Z');

describe('dg-srt logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('formats a line with timestamp, padded level and pretty meta', () => {
    expect(formatLogLine('info', 'SRT file written', { output: 'talk.srt' }, at)).toBe(
      '[2026-01-02T03:04:05.000Z] INFO  SRT file written {\n  "output": "talk.srt"\n}',
    );
    expect(formatLogLine('error', 'Batch aborted', {}, at)).toBe('[2026-01-02T03:04:05.000Z] ERROR Batch aborted');
  });

  it('keeps errors when silent and hides debug unless enabled', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    const silent = createLogger({ silent: true, debug: true, now: () => at });
    silent.info('hidden');
    silent.debug('hidden');
    silent.error('shown');
    expect(log).not.toHaveBeenCalled();
    expect(debug).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[2026-01-02T03:04:05.000Z] ERROR shown');

    const quiet = createLogger({ silent: false, debug: false, now: () => at });
    quiet.debug('hidden');
    quiet.info('shown');
    expect(debug).not.toHaveBeenCalled();
    expect(log).toHaveBeenCalledWith('[2026-01-02T03:04:05.000Z] INFO  shown');
  });

  it('reads silence and debug switches from the environment', () => {
    expect(resolveLoggerOptions({ NODE_ENV: 'test' })).toEqual({ silent: true, debug: false });
    expect(resolveLoggerOptions({ NODE_ENV: 'test', DG_SRT_LOGS_VERBOSE: '1', DEBUG: 'true' })).toEqual({ silent: false, debug: true });
    expect(resolveLoggerOptions({ DG_SRT_LOGS_SILENT: '1' })).toEqual({ silent: true, debug: false });
    expect(resolveLoggerOptions({ NODE_ENV: 'test', DG_SRT_LOGS_SILENT: '0' })).toEqual({ silent: false, debug: false });
  });
});
