import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import { createLogger, debug, setOutputGuard, setVerboseMode, warn } from '../utils/logger.js';

describe('Logger', () => {
  let events: string[];

  beforeEach(() => {
    events = [];
    mock.method(console, 'log', (...args: unknown[]) => {
      events.push(`log ${args.map(String).join(' ')}`);
    });
    mock.method(console, 'warn', (...args: unknown[]) => {
      events.push(`stderr ${args.map(String).join(' ')}`);
    });
    mock.method(console, 'error', (...args: unknown[]) => {
      events.push(`stderr ${args.map(String).join(' ')}`);
    });
  });

  afterEach(() => {
    setOutputGuard(undefined);
    setVerboseMode(false);
    mock.restoreAll();
  });

  it('should write every level to stdout', () => {
    const log = createLogger('test');

    log.info('one');
    log.warn('two');
    log.error('three');

    assert.deepStrictEqual(events, ['log [test] one', 'log [test] two', 'log [test] three']);
  });

  it('should print debug lines only in verbose mode', () => {
    debug('hidden');
    setVerboseMode(true);
    debug('shown');

    assert.deepStrictEqual(events, ['log shown']);
  });

  it('should pause the output guard around each line', () => {
    setOutputGuard({
      pause: () => events.push('pause'),
      resume: () => events.push('resume'),
    });

    warn('careful');

    assert.deepStrictEqual(events, ['pause', 'log careful', 'resume']);
  });
});
