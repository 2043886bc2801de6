import chalk from 'chalk';
import { env } from './env';

export type LogLevel = 'debug' | 'info' | 'success' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  data?: LogData;
}

const LEVEL_TAGS: Record<LogLevel, string> = {
  debug: chalk.gray('[DEBUG]'),
  info: chalk.cyan('[INFO]'),
  success: chalk.green('[✓]'),
  warn: chalk.yellow('[WARN]'),
  error: chalk.red('[ERROR]'),
};

const STDERR_LEVELS = new Set<LogLevel>(['warn', 'error']);

function formatTimestamp(date: Date): string {
  return chalk.gray(
    date.toLocaleString('en-US', {
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hour12: false,
    })
  );
}

function formatData(data: LogData): string {
  const replacer = (_key: string, value: unknown) => {
    if (typeof value === 'bigint') {
      return value.toString();
    }
    if (value instanceof Error) {
      return { name: value.name, message: value.message };
    }
    return value;
  };
  return '\n  ' + JSON.stringify(data, replacer, 2).split('\n').join('\n  ');
}

function write(entry: LogEntry): void {
  const message = entry.level === 'error' ? chalk.red(entry.message) : entry.message;
  let line = `${formatTimestamp(entry.timestamp)} ${LEVEL_TAGS[entry.level]} ${message}`;

  if (entry.data && Object.keys(entry.data).length > 0) {
    line += formatData(entry.data);
  }

  if (STDERR_LEVELS.has(entry.level)) {
    console.error(line);
  } else {
    console.log(line);
  }
}

function emit(level: LogLevel, message: string, data?: LogData): void {
  if (level === 'debug' && !env.DEBUG) {
    return;
  }
  write({ level, message, timestamp: new Date(), data });
}

export const logger = {
  debug: (message: string, data?: LogData) => emit('debug', message, data),
  info: (message: string, data?: LogData) => emit('info', message, data),
  success: (message: string, data?: LogData) => emit('success', message, data),
  warn: (message: string, data?: LogData) => emit('warn', message, data),
  error: (message: string, data?: LogData) => emit('error', message, data),
};
