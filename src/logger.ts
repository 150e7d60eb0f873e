export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_LABEL: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

export interface LoggerConfig {
  minLevel: LogLevel;
  timestamps: boolean;
}

export interface Logger {
  debug(message: string, ...data: unknown[]): void;
  info(message: string, ...data: unknown[]): void;
  warn(message: string, ...data: unknown[]): void;
  error(message: string, ...data: unknown[]): void;
}

const isLevelName = (s: string): s is LogLevelName => Object.hasOwn(LEVEL_BY_NAME, s);

export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (!name) return undefined;
  const key = name.trim().toLowerCase();
  return isLevelName(key) ? LEVEL_BY_NAME[key] : undefined;
}

export function defaultLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  return (
    parseLogLevel(env.LOG_LEVEL) ??
    (env.NODE_ENV === 'production' ? LogLevel.WARN : LogLevel.INFO)
  );
}

let config: LoggerConfig = {
  minLevel: defaultLogLevel(),
  timestamps: true,
};

export function configureLogger(next: Partial<LoggerConfig>): void {
  config = { ...config, ...next };
}

export function setLogLevel(level: LogLevel): void {
  config.minLevel = level;
}

export function getLogLevel(): LogLevel {
  return config.minLevel;
}

export function formatLogLine(level: LogLevel, module: string | undefined, message: string): string {
  const parts: string[] = [];
  if (config.timestamps) parts.push(`[${new Date().toISOString()}]`);
  parts.push(`[${LEVEL_LABEL[level]}]`);
  if (module) parts.push(`[${module}]`);
  parts.push(message);
  return parts.join(' ');
}

function write(level: LogLevel, module: string | undefined, message: string, data: unknown[]) {
  if (level < config.minLevel || level === LogLevel.SILENT) return;
  const line = formatLogLine(level, module, message);
  switch (level) {
    case LogLevel.DEBUG:
    case LogLevel.INFO:
      console.log(line, ...data);
      break;
    case LogLevel.WARN:
      console.warn(line, ...data);
      break;
    case LogLevel.ERROR:
      console.error(line, ...data);
      break;
  }
}

/** Scoped logger; every line carries the module tag. */
export function createLogger(module: string): Logger {
  return {
    debug: (message, ...data) => write(LogLevel.DEBUG, module, message, data),
    info: (message, ...data) => write(LogLevel.INFO, module, message, data),
    warn: (message, ...data) => write(LogLevel.WARN, module, message, data),
    error: (message, ...data) => write(LogLevel.ERROR, module, message, data),
  };
}
