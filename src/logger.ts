/**
 * Logger for messaging lifecycle events.
 * Provides a simple, framework-agnostic interface for leveled, structured logging.
 */

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(msg: string, data?: LogContext): void;
  info(msg: string, data?: LogContext): void;
  warn(msg: string, data?: LogContext): void;
  error(msg: string, err?: Error | LogContext): void;
  critical(msg: string, data?: LogContext): void;
}

export interface LoggerOptions {
  /** Channel name printed as the line prefix. Default: 'rabbitmq'. */
  channel?: string;
  /** Print debug lines regardless of the DEBUG environment variable. */
  debug?: boolean;
}

const encode = (data?: LogContext): string => {
  if (! data) return '';
  try {
    return JSON.stringify(data, (_key, value: unknown) =>
      value instanceof Error ? { name: value.name, message: value.message } : value
    );
  } catch {
    return '[unserializable context]';
  }
};

/**
 * Creates a logger that uses console for output.
 * Debug output is enabled by the `debug` option or a DEBUG environment variable mentioning the channel.
 *
 * @param options - Channel name and debug toggle
 * @returns Logger instance
 */
export const createLogger = (options: LoggerOptions = {}): Logger => {
  const channel = options.channel ?? 'rabbitmq';
  const prefix = `[${channel}]`;
  const debugEnabled = () => options.debug === true || (process.env.DEBUG?.includes(channel) ?? false);

  return {
    debug: (msg, data) => {
      if (debugEnabled()) {
        console.debug(`${prefix} ${msg}`, encode(data));
      }
    },
    info: (msg, data) => {
      console.log(`${prefix} ${msg}`, encode(data));
    },
    warn: (msg, data) => {
      console.warn(`${prefix} ${msg}`, encode(data));
    },
    error: (msg, err) => {
      if (err instanceof Error) {
        console.error(`${prefix} ${msg}:`, err.message);
      } else {
        console.error(`${prefix} ${msg}`, encode(err));
      }
    },
    critical: (msg, data) => {
      console.error(`${prefix} CRITICAL ${msg}`, encode(data));
    },
  };
};

/**
 * Logger that discards everything. Handy for embedding and tests.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  critical: () => undefined,
};
