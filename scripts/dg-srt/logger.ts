export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

export type Logger = Record<LogLevel, (message: string, meta?: LogMeta) => void>;

export type LoggerOptions = {
  /** Mutes everything below `error`. */
  silent: boolean;
  debug: boolean;
  now?: () => Date;
};

const LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

function formatMeta(meta?: LogMeta) {
  if (!meta || Object.keys(meta).length === 0) return '';
  return ` ${JSON.stringify(meta, null, 2)}`;
}

export function formatLogLine(level: LogLevel, message: string, meta: LogMeta | undefined, at: Date) {
  return `[${at.toISOString()}] ${LABELS[level]} ${message}${formatMeta(meta)}`;
}

export function createLogger(options: LoggerOptions): Logger {
  const now = options.now ?? (() => new Date());
  const enabled = (level: LogLevel) => {
    if (level === 'error') return true;
    if (options.silent) return false;
    return level !== 'debug' || options.debug;
  };
  const emit = (level: LogLevel, sink: (line: string) => void) => (message: string, meta?: LogMeta) => {
    if (!enabled(level)) return;
    sink(formatLogLine(level, message, meta, now()));
  };
  /* eslint-disable no-console */
  return {
    debug: emit('debug', (line) => console.debug(line)),
    info: emit('info', (line) => console.log(line)),
    warn: emit('warn', (line) => console.warn(line)),
    error: emit('error', (line) => console.error(line)),
  };
}

export function resolveLoggerOptions(env: NodeJS.ProcessEnv): LoggerOptions {
  const debug = env.DEBUG === '1' || env.DEBUG === 'true';
  if (env.DG_SRT_LOGS_VERBOSE === '1') return { silent: false, debug };
  if (env.DG_SRT_LOGS_SILENT === '1') return { silent: true, debug };
  if (env.DG_SRT_LOGS_SILENT === '0') return { silent: false, debug };
  return { silent: env.NODE_ENV === 'test', debug };
}

export const logger = createLogger(resolveLoggerOptions(process.env));
