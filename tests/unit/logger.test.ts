import { describe, it, expect } from 'vitest';
import { createLogger, isLogLevel, Logger, LogLevel } from '../../src/logger';

function capture(level: LogLevel): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = createLogger({ level, prefix: 'test', sink: line => lines.push(line) });
  return { logger, lines };
}

describe('Logger', () => {
  it('should drop messages below the configured level', () => {
    const { logger, lines } = capture('warn');

    logger.error('e');
    logger.warn('w');
    logger.info('i');
    logger.debug('d');

    expect(lines).toEqual(['[test] ERROR: e\n', '[test] WARN: w\n']);
  });

  it('should append metadata as JSON', () => {
    const { logger, lines } = capture('info');

    logger.info('worker stopped', { reason: 'input-closed', forwarded: 3 });

    expect(lines).toEqual(['[test] INFO: worker stopped {"reason":"input-closed","forwarded":3}\n']);
  });

  it('should change level at runtime', () => {
    const { logger, lines } = capture('error');

    logger.debug('hidden');
    logger.setLevel('debug');
    logger.debug('shown');

    expect(logger.getLevel()).toBe('debug');
    expect(lines).toEqual(['[test] DEBUG: shown\n']);
  });

  it('should recognise level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
