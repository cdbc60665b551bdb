import { describe, it, expect, vi, afterEach } from 'vitest';
import { stripVTControlCharacters } from 'node:util';

import { createConsoleLogger, formatLogLine, silentLogger } from '../logger.js';

describe('formatLogLine', () => {
  const at = new Date(2026, 9, 19, 14, 25, 1);

  it('renders time, padded level and message', () => {
    expect(stripVTControlCharacters(formatLogLine('INFO', 'Indexed 2 document(s)', at))).toBe(
      '14:25:01 | INFO  | Indexed 2 document(s)'
    );
    expect(stripVTControlCharacters(formatLogLine('DEBUG', 'Loaded index', at))).toBe(
      '14:25:01 | DEBUG | Loaded index'
    );
  });
});

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes to stderr', () => {
    const writeSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    createConsoleLogger().warn('Replacing unreadable index manifest');

    expect(writeSpy).toHaveBeenCalledTimes(1);
    expect(stripVTControlCharacters(String(writeSpy.mock.calls[0]?.[0]))).toMatch(
      /^\d{2}:\d{2}:\d{2} \| WARN  \| Replacing unreadable index manifest\n$/
    );
  });

  it('has debug output only when enabled', () => {
    expect(createConsoleLogger().debug).toBeUndefined();
    expect(createConsoleLogger({ debug: true }).debug).toBeTypeOf('function');
  });
});

describe('silentLogger', () => {
  it('writes nothing', () => {
    const writeSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    silentLogger.info('ignored');
    silentLogger.warn('ignored');
    silentLogger.debug?.('ignored');

    expect(writeSpy).not.toHaveBeenCalled();
    writeSpy.mockRestore();
  });
});
