import { describe, it, expect } from 'vitest';
import { createLogger, silentLogger, errorMessage } from './logger.js';

describe('createLogger', () => {
  it('should prefix lines with the scope and level', () => {
    const lines: string[] = [];
    const logger = createLogger('fusekit', { level: 'debug', sink: (line) => lines.push(line) });

    logger.info('ready');

    expect(lines).toEqual(['[fusekit] info: ready']);
  });

  it('should append context as JSON', () => {
    const lines: string[] = [];
    const logger = createLogger('fusekit', { level: 'debug', sink: (line) => lines.push(line) });

    logger.warn('slow', { ms: 12 });

    expect(lines).toEqual(['[fusekit] warn: slow {"ms":12}']);
  });

  it('should drop messages below the configured level', () => {
    const lines: string[] = [];
    const logger = createLogger('fusekit', { level: 'warn', sink: (line) => lines.push(line) });

    logger.debug('hidden');
    logger.info('hidden');
    logger.error('shown');

    expect(lines).toEqual(['[fusekit] error: shown']);
  });

  it('should nest scopes for child loggers', () => {
    const lines: string[] = [];
    const logger = createLogger('fusekit', { level: 'debug', sink: (line) => lines.push(line) });

    logger.child('chunking').child('token').debug('fallback');

    expect(lines).toEqual(['[fusekit:chunking:token] debug: fallback']);
  });

  it('should tolerate unserializable context', () => {
    const lines: string[] = [];
    const logger = createLogger('fusekit', { level: 'debug', sink: (line) => lines.push(line) });
    const circular: Record<string, unknown> = {};
    circular['self'] = circular;

    logger.error('boom', circular);

    expect(lines).toEqual(['[fusekit] error: boom [unserializable context]']);
  });
});

describe('silentLogger', () => {
  it('should accept every call without output', () => {
    expect(() => {
      silentLogger.error('nothing');
      silentLogger.child('x').warn('nothing');
    }).not.toThrow();
  });
});

describe('errorMessage', () => {
  it('should read Error messages and label everything else', () => {
    expect(errorMessage(new Error('bad'))).toBe('bad');
    expect(errorMessage('bad')).toBe('Unknown error');
  });
});
