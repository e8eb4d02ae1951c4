import winston from 'winston';

const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'verbose'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

const isLogLevel = (value: string | undefined): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

const resolveLevel = (): LogLevel => {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
};

const lineFormat = winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
  const scope = typeof component === 'string' ? ` [${component}]` : '';
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} ${level}${scope}: ${String(message)}${extra}`;
});

// stdout belongs to CLI output, so every level goes to stderr.
const rootLogger = winston.createLogger({
  level: resolveLevel(),
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(winston.format.timestamp(), winston.format.errors({ stack: true }), lineFormat),
  transports: [
    new winston.transports.Console({
      stderrLevels: [...LOG_LEVELS],
    }),
  ],
});

export type Logger = winston.Logger;

export function createLogger(component: string): Logger {
  return rootLogger.child({ component });
}

export function setLogLevel(level: string): void {
  if (isLogLevel(level)) {
    rootLogger.level = level;
  }
}
