import pino from 'pino';

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  // Keep test output readable unless a level is asked for explicitly
  return process.env.VITEST ? 'silent' : 'info';
}

/**
 * Logger factory - creates structured logger instances.
 * `error` fields are serialized with message, type and stack.
 */
export function createLogger(serviceName: string, bindings?: Record<string, unknown>) {
  const logger = pino({
    name: serviceName,
    level: defaultLevel(),
    formatters: {
      level: (label) => {
        return { level: label };
      }
    },
    serializers: {
      error: pino.stdSerializers.err
    },
    timestamp: pino.stdTimeFunctions.isoTime
  });

  return bindings ? logger.child(bindings) : logger;
}

export type Logger = ReturnType<typeof createLogger>;
