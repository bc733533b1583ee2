import { describe, expect, it } from 'vitest';

import { createLogger, withCorrelation } from '../../src/logging/logger.js';

describe('logger correlation', () => {
  it('binds trimmed correlation identifiers to the child logger', () => {
    const logger = createLogger({ serviceName: 'logger-test', level: 'silent' });

    const child = withCorrelation(logger, {
      traceId: ' trace_1 ',
      messageId: 'msg_1',
      eventId: '   ',
    });

    const bindings = child.bindings();
    expect(bindings.traceId).toBe('trace_1');
    expect(bindings.messageId).toBe('msg_1');
    expect(bindings).not.toHaveProperty('eventId');
  });

  it('creates a logger at the requested level', () => {
    const logger = createLogger({ serviceName: 'logger-test', level: 'warn' });

    expect(logger.level).toBe('warn');
    expect(logger.isLevelEnabled('info')).toBe(false);
  });
});
