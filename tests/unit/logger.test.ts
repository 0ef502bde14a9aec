import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, paint, silentLogger } from '../../src/logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function collect() {
    const lines: string[] = [];
    return { lines, write: (line: string) => { lines.push(line); } };
  }

  it('should print info and above by default', () => {
    const sink = collect();
    const logger = createLogger({ colors: false, write: sink.write });

    logger.error('broken');
    logger.warn('careful');
    logger.info('hello');
    logger.debug('details');

    expect(logger.level).toBe('info');
    expect(sink.lines).toEqual(['✗ broken', '⚠ careful', 'ℹ hello']);
  });

  it('should include debug output at debug level', () => {
    const sink = collect();
    const logger = createLogger({ level: 'debug', colors: false, write: sink.write });

    logger.debug('details');

    expect(sink.lines).toEqual(['· details']);
  });

  it('should print only errors at error level', () => {
    const sink = collect();
    const logger = createLogger({ level: 'error', colors: false, write: sink.write });

    logger.warn('careful');
    logger.error('broken');

    expect(sink.lines).toEqual(['✗ broken']);
  });

  it('should color the prefix', () => {
    const sink = collect();
    const logger = createLogger({ write: sink.write });

    logger.warn('careful');

    expect(sink.lines).toEqual(['\x1b[33m⚠\x1b[0m careful']);
  });

  it('should write to stderr through console.error', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    createLogger({ colors: false }).info('hello');

    expect(errorSpy).toHaveBeenCalledWith('ℹ hello');
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should drop everything when silent', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    silentLogger.error('broken');

    expect(silentLogger.level).toBe('silent');
    expect(errorSpy).not.toHaveBeenCalled();
  });

  describe('paint', () => {
    it('should wrap text only when enabled', () => {
      expect(paint('ok', 'green', true)).toBe('\x1b[32mok\x1b[0m');
      expect(paint('ok', 'green', false)).toBe('ok');
    });
  });
});
