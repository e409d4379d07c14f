import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createLogger, type Logger } from '@correlator/shared';

import { CaptureDestination, captureLoggerOptions } from '../src/destination.js';
import { CAPTURE_FIELDS } from '../src/event.js';
import { CorrelationContext } from '../src/scope.js';
import { EventCaptureStore } from '../src/store.js';

function createEcho() {
  const lines: string[] = [];
  return {
    lines,
    target: {
      write(line: string) {
        lines.push(line);
      }
    }
  };
}

describe('CaptureDestination', () => {
  let context: CorrelationContext;
  let store: EventCaptureStore;

  beforeEach(() => {
    context = new CorrelationContext();
    store = new EventCaptureStore({ context });
  });

  function loggerFor(destination: CaptureDestination): Logger {
    return createLogger(captureLoggerOptions, destination);
  }

  it('captures pino records with their message, level and properties', () => {
    const logger = loggerFor(new CaptureDestination(store));
    const scope = context.begin();

    logger.info({ orderId: 'order-1', amount: 50 }, 'order placed');
    scope.release();

    const [event] = store.query(scope.token).toArray();
    expect(event).toMatchObject({
      level: 'info',
      levelValue: 30,
      message: 'order placed',
      properties: { orderId: 'order-1', amount: 50 },
      token: scope.token
    });
    expect(Number.isNaN(Date.parse(event.timestamp))).toBe(false);
  });

  it('keeps child logger bindings as properties', () => {
    const logger = loggerFor(new CaptureDestination(store));

    logger.child({ component: 'billing' }).warn('invoice late');

    expect(store.untagged()).toHaveLength(1);
    expect(store.untagged()[0]).toMatchObject({
      level: 'warn',
      message: 'invoice late',
      properties: { component: 'billing' }
    });
  });

  it('captures every level', () => {
    const logger = loggerFor(new CaptureDestination(store));
    const scope = context.begin();

    logger.trace('t');
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');
    logger.fatal('f');
    scope.release();

    expect(store.query(scope.token).toArray().map((event) => event.level)).toEqual([
      'trace',
      'debug',
      'info',
      'warn',
      'error',
      'fatal'
    ]);
  });

  it('keeps payload fields named like pino fields as properties', async () => {
    const destination = new CaptureDestination(store);
    const logger = loggerFor(destination);

    const token = await context.run((scope) => {
      logger.info({ level: 'high' }, 'priority set');
      logger.info({ time: { elapsedMs: 5 } }, 'timed');
      logger.warn({ msg: 42 });
      logger.info('plain');
      return scope.token;
    });

    const events = store.query(token).toArray();
    expect(destination.droppedCount).toBe(0);
    expect(events.map(({ level, message, properties }) => ({ level, message, properties }))).toEqual([
      { level: 'info', message: 'priority set', properties: { level: 'high' } },
      { level: 'info', message: 'timed', properties: { time: { elapsedMs: 5 } } },
      { level: 'warn', message: '', properties: { msg: 42 } },
      { level: 'info', message: 'plain', properties: {} }
    ]);
    expect(Number.isNaN(Date.parse(events[1].timestamp))).toBe(false);
  });

  it('keeps records from loggers with pino default fields when payload keys collide', () => {
    const destination = new CaptureDestination(store);
    const logger = createLogger({ level: 'trace', base: null }, destination);

    logger.error({ orderId: 'order-2' }, 'payment failed');
    logger.info({ level: 'high' }, 'priority set');
    logger.info({ msg: 42 });

    expect(destination.droppedCount).toBe(0);
    expect(store.untagged().map(({ level, message, properties }) => ({ level, message, properties }))).toEqual([
      { level: 'error', message: 'payment failed', properties: { orderId: 'order-2' } },
      { level: 'info', message: 'priority set', properties: { level: 'high' } },
      { level: 'info', message: '', properties: { msg: 42 } }
    ]);
  });

  it('captures JSON records without a level at info', () => {
    const destination = new CaptureDestination(store);

    destination.write('{"msg":"missing level","time":"2024-05-01T10:00:00.000Z"}\n');

    expect(destination.droppedCount).toBe(0);
    expect(store.untagged()[0]).toMatchObject({
      level: 'info',
      levelValue: 30,
      message: 'missing level',
      timestamp: '2024-05-01T10:00:00.000Z',
      properties: {}
    });
  });

  it('drops lines that are not JSON objects', () => {
    const onMalformed = vi.fn();
    const destination = new CaptureDestination(store, { onMalformed });

    destination.write('not json\n');
    destination.write('[30,"array"]\n');

    expect(destination.droppedCount).toBe(2);
    expect(onMalformed).toHaveBeenNthCalledWith(1, 'not json\n');
    expect(onMalformed).toHaveBeenNthCalledWith(2, '[30,"array"]\n');
    expect(store.size).toBe(0);
  });

  it('does not echo by default', () => {
    const echo = createEcho();
    const logger = loggerFor(new CaptureDestination(store, { echo: echo.target }));

    logger.fatal('quiet');

    expect(echo.lines).toEqual([]);
    expect(store.size).toBe(1);
  });

  it('echoes lines at or above the echo level', () => {
    const echo = createEcho();
    const logger = loggerFor(new CaptureDestination(store, { echo: echo.target, echoLevel: 'warn' }));

    logger.info('below');
    logger.warn('at');
    logger.error('above');

    expect(echo.lines.map((line) => JSON.parse(line)[CAPTURE_FIELDS.message])).toEqual(['at', 'above']);
    expect(store.size).toBe(3);
  });

  it('echoes malformed lines whenever echoing is on', () => {
    const echo = createEcho();
    const destination = new CaptureDestination(store, { echo: echo.target, echoLevel: 'fatal' });

    destination.write('plain text\n');

    expect(echo.lines).toEqual(['plain text\n']);
  });

  it('can be reconfigured to echo elsewhere', () => {
    const first = createEcho();
    const second = createEcho();
    const destination = new CaptureDestination(store, { echo: first.target, echoLevel: 'info' });
    const logger = loggerFor(destination);

    logger.info('one');
    destination.configureEcho(second.target, 'error');
    logger.info('two');
    logger.error('three');
    destination.configureEcho(null, 'trace');
    logger.error('four');

    expect(first.lines.map((line) => JSON.parse(line)[CAPTURE_FIELDS.message])).toEqual(['one']);
    expect(second.lines.map((line) => JSON.parse(line)[CAPTURE_FIELDS.message])).toEqual(['three']);
  });
});
