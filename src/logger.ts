export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const BUFFER_SIZE = 200;
const buffer: string[] = [];

function parseLevel(value: string | undefined): LogThreshold {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return value;
    default:
      return 'info';
  }
}

let threshold = parseLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogThreshold): void {
  threshold = level;
}

// Most recent lines, oldest first (feeds the dashboard log panel)
export function recentLogs(n = 100): string[] {
  return n <= 0 ? [] : buffer.slice(-n);
}

function formatMeta(meta?: Record<string, unknown>): string {
  if (!meta || Object.keys(meta).length === 0) return '';
  return ' ' + JSON.stringify(meta);
}

export function createLogger(scope: string): Logger {
  function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

    const time = new Date().toTimeString().slice(0, 8);
    const line = `[${level.toUpperCase()}] [${scope}] ${message}${formatMeta(meta)}`;

    buffer.push(`${time} ${line}`);
    if (buffer.length > BUFFER_SIZE) buffer.shift();

    if (level === 'error' || level === 'warn') {
      process.stderr.write(line + '\n');
    } else {
      process.stdout.write(line + '\n');
    }
  }

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
  };
}
