/**
 * Logger Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { createLogger, isLogLevel } from '../src/utils/logger.js';

function createSink() {
  return { debug: vi.fn(), log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('createLogger', () => {
  it('should prefix messages with the component', () => {
    const sink = createSink();
    const logger = createLogger('Receiver', { sink });

    logger.info('Listening on 0.0.0.0:9876');

    expect(sink.log).toHaveBeenCalledWith('[Filewire:Receiver] Listening on 0.0.0.0:9876');
  });

  it('should default to info level', () => {
    const sink = createSink();
    const logger = createLogger('Test', { sink });

    logger.debug('hidden');
    logger.warn('shown', 42);

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledWith('[Filewire:Test] shown', 42);
  });

  it('should filter below the configured level', () => {
    const sink = createSink();
    const logger = createLogger('Test', { level: 'error', sink });

    logger.info('a');
    logger.warn('b');
    logger.error('c');

    expect(sink.log).not.toHaveBeenCalled();
    expect(sink.warn).not.toHaveBeenCalled();
    expect(sink.error).toHaveBeenCalledTimes(1);
  });

  it('should drop everything when silent', () => {
    const sink = createSink();
    const logger = createLogger('Test', { level: 'silent', sink });

    logger.error('nope');

    expect(sink.error).not.toHaveBeenCalled();
  });
});

describe('isLogLevel', () => {
  it('should recognise known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
