import { describe, it, expect } from 'vitest';
import { createLogger, resolveLogLevel, isLogLevel } from '@bankstmt/types';

function capture(): { lines: string[]; sink: (line: string) => void } {
  const lines: string[] = [];
  return { lines, sink: (line) => lines.push(line) };
}

describe('createLogger', () => {
  it('should prefix lines with level and scope', () => {
    const { lines, sink } = capture();
    const logger = createLogger('pdf-extract', { level: 'debug', sink });

    logger.info('Opened document');

    expect(lines).toEqual(['[INFO] [pdf-extract] Opened document']);
  });

  it('should append structured context as JSON', () => {
    const { lines, sink } = capture();
    const logger = createLogger('batch', { level: 'info', sink });

    logger.warn('Skipping file', { file: 'a.pdf', attempt: 2 });

    expect(lines).toEqual(['[WARN] [batch] Skipping file {"file":"a.pdf","attempt":2}']);
  });

  it('should drop messages below the configured level', () => {
    const { lines, sink } = capture();
    const logger = createLogger('cli', { level: 'warn', sink });

    logger.debug('noise');
    logger.info('still noise');
    logger.warn('kept');

    expect(lines).toEqual(['[WARN] [cli] kept']);
  });

  it('should add the error message to the context', () => {
    const { lines, sink } = capture();
    const logger = createLogger('dispatcher', { level: 'info', sink });

    logger.error('Bank parser failed', new Error('table not found'), { path: 'x.pdf' });

    expect(lines).toEqual(['[ERROR] [dispatcher] Bank parser failed {"path":"x.pdf","error":"table not found"}']);
  });

  it('should nest child scopes and share the sink', () => {
    const { lines, sink } = capture();
    const logger = createLogger('pipeline', { level: 'info', sink }).child('dispatcher');

    logger.info('Parsed');

    expect(logger.scope).toBe('pipeline:dispatcher');
    expect(lines).toEqual(['[INFO] [pipeline:dispatcher] Parsed']);
  });

  it('should print nothing at silent level', () => {
    const { lines, sink } = capture();
    const logger = createLogger('quiet', { level: 'silent', sink });

    logger.error('boom', new Error('x'));

    expect(lines).toEqual([]);
  });
});

describe('resolveLogLevel', () => {
  it('should default to info', () => {
    expect(resolveLogLevel('')).toBe('info');
    expect(resolveLogLevel('chatty')).toBe('info');
  });

  it('should accept known levels in any case', () => {
    expect(resolveLogLevel('DEBUG')).toBe('debug');
    expect(resolveLogLevel('silent')).toBe('silent');
  });

  it('should recognize level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});
