import { describe, it, expect } from 'vitest';
import { createLogger, type LogLevel } from '../../src/logging/logger.js';

function capture() {
  const lines: Array<{ level: LogLevel; line: string }> = [];
  return { lines, sink: (level: LogLevel, line: string) => lines.push({ level, line }) };
}

describe('Logger', () => {
  it('formats level, name, message and data', () => {
    const { lines, sink } = capture();
    const logger = createLogger('probe', { sink, color: false });
    logger.info('Connected', { host: 'localhost', port: 1993, note: 'two words', missing: undefined });
    expect(lines).toEqual([
      { level: 'info', line: '[INFO] [probe] Connected host=localhost port=1993 note="two words"' }
    ]);
  });

  it('drops messages below the minimum level', () => {
    const { lines, sink } = capture();
    const logger = createLogger('probe', { sink, color: false, minLevel: 'warn' });
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');
    expect(lines.map(entry => entry.level)).toEqual(['warn', 'error']);
    expect(logger.isEnabled('info')).toBe(false);

    logger.setMinLevel('debug');
    expect(logger.isEnabled('debug')).toBe(true);
  });

  it('prints errors as name and message', () => {
    const { lines, sink } = capture();
    createLogger('probe', { sink, color: false }).error('Failed', { error: new TypeError('boom') });
    expect(lines[0].line).toBe('[ERROR] [probe] Failed error=TypeError: boom');
  });

  it('gives children a combined name and the same sink', () => {
    const { lines, sink } = capture();
    createLogger('probe', { sink, color: false }).child('imap-smoke').info('Running');
    expect(lines[0].line).toBe('[INFO] [probe:imap-smoke] Running');
  });
});
