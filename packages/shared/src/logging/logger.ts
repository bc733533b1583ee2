import pino from 'pino';

export interface CreateLoggerOptions {
  serviceName: string;
  level: string;
  pretty?: boolean;
}

export interface CorrelationFields {
  traceId?: string;
  messageId?: string;
  eventId?: string;
}

type CorrelationKey = keyof CorrelationFields;

const CORRELATION_KEYS: readonly CorrelationKey[] = ['traceId', 'messageId', 'eventId'];

function normalizeField(value: string | undefined): string | undefined {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function createLogger(opts: CreateLoggerOptions): pino.Logger {
  const baseOptions: pino.LoggerOptions = {
    name: opts.serviceName,
    level: opts.level,
    base: {
      service: opts.serviceName,
    },
  };

  if (opts.pretty) {
    return pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          singleLine: true,
        },
      },
    });
  }

  return pino(baseOptions);
}

/**
 * Binds the non-empty correlation identifiers to a child logger. Blank values
 * are dropped so log lines never carry empty `traceId: ""` fields.
 */
export function withCorrelation(logger: pino.Logger, fields: CorrelationFields): pino.Logger {
  const childBindings: CorrelationFields = {};

  for (const key of CORRELATION_KEYS) {
    const value = normalizeField(fields[key]);
    if (value) {
      childBindings[key] = value;
    }
  }

  return logger.child(childBindings);
}
