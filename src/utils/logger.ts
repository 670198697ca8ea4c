export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const formatLine = (tag: string, message: string, context?: LogContext) =>
  context ? `${tag} ${message} ${JSON.stringify(context)}` : `${tag} ${message}`;

/**
 * Console logger tagged per component, e.g. `[INTAKE] Import committed {...}`.
 */
export const createLogger = (component: string, minLevel: LogLevel = 'info'): Logger => {
  const tag = `[${component.toUpperCase()}]`;
  const enabled = (level: LogLevel) => LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[minLevel];

  return {
    debug(message, context) {
      if (enabled('debug')) console.debug(formatLine(tag, message, context));
    },
    info(message, context) {
      if (enabled('info')) console.log(formatLine(tag, message, context));
    },
    warn(message, context) {
      if (enabled('warn')) console.warn(formatLine(tag, message, context));
    },
    error(message, context) {
      if (enabled('error')) console.error(formatLine(tag, message, context));
    },
  };
};
