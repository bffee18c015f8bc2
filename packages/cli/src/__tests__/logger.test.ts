import { describe, it, expect } from 'vitest';

import { createLogger, isLogLevel } from '../logger.js';

function capture(level: Parameters<typeof createLogger>[0]) {
  const lines: string[] = [];
  const logger = createLogger(level, (text) => lines.push(text));
  return { logger, lines };
}

describe('createLogger', () => {
  it('prefixes lines with the tool name and level', () => {
    const { logger, lines } = capture('DEBUG');
    logger.debug('loading');
    logger.critical('gone');
    expect(lines).toEqual([
      '[shapecheck] debug: loading\n',
      '[shapecheck] critical: gone\n',
    ]);
  });

  it('drops messages below the threshold', () => {
    const { logger, lines } = capture('WARNING');
    logger.debug('a');
    logger.info('b');
    logger.warning('c');
    logger.error('d');
    expect(lines).toEqual(['[shapecheck] warning: c\n', '[shapecheck] error: d\n']);
    expect(logger.level).toBe('WARNING');
  });

  it('knows the level names', () => {
    expect(isLogLevel('ERROR')).toBe(true);
    expect(isLogLevel('error')).toBe(false);
  });
});
