import { afterEach, describe, expect, it } from 'vitest';

import { ZodError } from '../src/z.js';

import { createLogger } from '../src/logger.js';

const ORIGINAL_LEVEL = process.env.LOG_LEVEL;

function collectLines() {
  const lines: string[] = [];
  return {
    lines,
    destination: {
      write(line: string) {
        lines.push(line);
      }
    }
  };
}

describe('createLogger', () => {
  afterEach(() => {
    if (ORIGINAL_LEVEL === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = ORIGINAL_LEVEL;
    }
  });

  it('uses the service as logger name and writes to the given destination', () => {
    const { lines, destination } = collectLines();
    const logger = createLogger({ service: 'capture', level: 'debug' }, destination);

    logger.debug({ attempt: 2 }, 'starting');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      level: 20,
      name: 'capture',
      attempt: 2,
      msg: 'starting'
    });
  });

  it('keeps an explicit name over the service', () => {
    const { lines, destination } = collectLines();
    const logger = createLogger({ service: 'capture', name: 'explicit' }, destination);

    logger.info('hello');

    expect(JSON.parse(lines[0])).toMatchObject({ name: 'explicit', msg: 'hello' });
  });

  it('reads the level from LOG_LEVEL when none is given', () => {
    process.env.LOG_LEVEL = 'warn';

    expect(createLogger().level).toBe('warn');
  });

  it('rejects an unknown LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'loud';

    expect(() => createLogger()).toThrow(ZodError);
  });

  it('falls back to info when LOG_LEVEL is blank', () => {
    process.env.LOG_LEVEL = '  ';

    expect(createLogger().level).toBe('info');
  });
});
