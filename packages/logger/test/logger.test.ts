import { describe, expect, it } from 'vitest';
import { createLogger, isEnvironment, isLogLevel } from '../src/index.js';
import type { LogEntry, LoggerConfig } from '../src/index.js';
import { createMockLogger } from '../src/mock.js';

function capture(config: LoggerConfig = {}) {
  const lines: string[] = [];
  const logger = createLogger({ ...config, write: (line) => lines.push(line) });
  const entries = (): LogEntry[] => lines.map((line): LogEntry => JSON.parse(line));
  return { logger, lines, entries };
}

describe('logger', () => {
  describe('log levels', () => {
    it('writes one JSON line per entry', () => {
      const { logger, lines, entries } = capture({ environment: 'test' });

      logger.info('info_event', { foo: 'bar' });

      expect(lines).toHaveLength(1);
      const [entry] = entries();
      expect(entry.level).toBe('info');
      expect(entry.event_type).toBe('info_event');
      expect(entry.metadata).toEqual({ foo: 'bar' });
    });

    it('tags each level', () => {
      const { logger, entries } = capture({ environment: 'test' });

      logger.debug('a');
      logger.info('b');
      logger.warn('c');
      logger.error('d');

      expect(entries().map((e) => e.level)).toEqual(['debug', 'info', 'warn', 'error']);
    });

    it('includes ISO timestamps', () => {
      const { logger, entries } = capture();

      logger.info('timed');

      const [entry] = entries();
      expect(new Date(entry.timestamp).toISOString()).toBe(entry.timestamp);
    });
  });

  describe('child loggers', () => {
    it('child inherits parent metadata', () => {
      const { logger, entries } = capture();

      logger.child({ file: 'main.ks' }).info('parsed', { items: 3 });

      expect(entries()[0].metadata).toEqual({ file: 'main.ks', items: 3 });
    });

    it('nested children merge metadata', () => {
      const { logger, entries } = capture();

      logger.child({ a: 1 }).child({ b: 2 }).info('nested');

      expect(entries()[0].metadata).toEqual({ a: 1, b: 2 });
    });

    it('child metadata overwrites parent when keys conflict', () => {
      const { logger, entries } = capture();

      logger.child({ file: 'a.ks' }).child({ file: 'b.ks' }).info('conflict');

      expect(entries()[0].metadata).toEqual({ file: 'b.ks' });
    });

    it('siblings have isolated metadata', () => {
      const { logger, entries } = capture();

      logger.child({ left: true }).info('one');
      logger.child({ right: true }).info('two');

      expect(entries().map((e) => e.metadata)).toEqual([{ left: true }, { right: true }]);
    });
  });

  describe('metadata', () => {
    it('handles empty metadata', () => {
      const { logger, entries } = capture();

      logger.info('bare');

      expect(entries()[0].metadata).toEqual({});
    });

    it('flattens errors with stack traces outside production', () => {
      const { logger, entries } = capture({ environment: 'development' });

      logger.error('failed', { error: new TypeError('bad input') });

      const error = entries()[0].metadata.error;
      expect(error).toMatchObject({ name: 'TypeError', message: 'bad input' });
      expect(error).toHaveProperty('stack');
    });

    it('omits stack traces in production', () => {
      const { logger, entries } = capture({ environment: 'production' });

      logger.error('failed', { error: new Error('boom') });

      expect(entries()[0].metadata.error).toEqual({ name: 'Error', message: 'boom' });
    });
  });

  describe('environment-aware logging', () => {
    it('test environment logs debug messages', () => {
      const { logger, lines } = capture({ environment: 'test' });

      logger.debug('debug_event');

      expect(lines).toHaveLength(1);
    });

    it('development environment skips debug messages', () => {
      const { logger, entries } = capture({ environment: 'development' });

      logger.debug('skipped');
      logger.info('kept');

      expect(entries().map((e) => e.event_type)).toEqual(['kept']);
    });

    it('production environment only logs warnings and errors', () => {
      const { logger, entries } = capture({ environment: 'production' });

      logger.debug('a');
      logger.info('b');
      logger.warn('c');
      logger.error('d');

      expect(entries().map((e) => e.event_type)).toEqual(['c', 'd']);
    });

    it('defaults to development environment', () => {
      const { logger, entries } = capture();

      logger.debug('skipped');
      logger.info('kept');

      expect(entries().map((e) => e.event_type)).toEqual(['kept']);
    });

    it('minLevel overrides the environment preset', () => {
      const { logger, entries } = capture({ environment: 'production', minLevel: 'debug' });

      logger.debug('verbose');

      expect(entries().map((e) => e.event_type)).toEqual(['verbose']);
    });

    it('children keep the parent level', () => {
      const { logger, lines } = capture({ minLevel: 'error' });

      logger.child({ scope: 'x' }).warn('dropped');

      expect(lines).toEqual([]);
    });
  });

  describe('guards', () => {
    it('recognizes log levels', () => {
      expect(isLogLevel('warn')).toBe(true);
      expect(isLogLevel('fatal')).toBe(false);
      expect(isLogLevel('toString')).toBe(false);
    });

    it('recognizes environments', () => {
      expect(isEnvironment('production')).toBe(true);
      expect(isEnvironment('staging')).toBe(false);
    });
  });
});

describe('createMockLogger', () => {
  it('records calls', () => {
    const logger = createMockLogger();

    logger.info('started', { id: 1 });

    expect(logger.info).toHaveBeenCalledWith('started', { id: 1 });
  });

  it('child returns a fresh mock', () => {
    const logger = createMockLogger();
    const child = logger.child({ scope: 'x' });

    child.warn('careful');

    expect(child.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).not.toHaveBeenCalled();
  });
});
