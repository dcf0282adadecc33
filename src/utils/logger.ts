import fs from 'fs';
import path from 'path';
import { config } from '../config';
import { withoutProgressBar } from './progress';

const LOG_LEVELS = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
} as const;

type LogLevel = keyof typeof LOG_LEVELS;

// Session log file, only when LOG_DIR is set
function openLogFile(): fs.WriteStream | null {
  const logsDir = config.logDir;
  if (!logsDir) return null;

  fs.mkdirSync(logsDir, { recursive: true });
  const now = new Date();
  const pad = (n: number) => String(n).padStart(2, '0');
  const logFileName = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}_${pad(now.getHours())}-${pad(now.getMinutes())}-${pad(now.getSeconds())}.log`;
  return fs.createWriteStream(path.join(logsDir, logFileName), { flags: 'a' });
}

const logFile = openLogFile();

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] <= LOG_LEVELS[config.logLevel];
}

function getTimestamp() {
  return new Date().toLocaleString('en-GB');
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.cause instanceof Error
      ? `${arg.name}: ${arg.message} (caused by ${formatArg(arg.cause)})`
      : `${arg.name}: ${arg.message}`;
  }
  return typeof arg === 'string' ? arg : JSON.stringify(arg);
}

function log(level: LogLevel, color: string, ...args: unknown[]) {
  const timestamp = getTimestamp();
  const text = args.map(formatArg).join(' ');

  // stdout carries command output; errors go to stderr
  const stream = level === 'ERROR' ? process.stderr : process.stdout;
  stream.write(`[${timestamp}] \x1b[${color}m[${level}]\x1b[0m ${text}\n`);

  logFile?.write(`[${timestamp}] [${level}] ${text}\n`);
}

export const logger = {
  error(...args: unknown[]) {
    if (shouldLog('ERROR')) {
      withoutProgressBar(() => log('ERROR', '31', ...args));
    }
  },

  warn(...args: unknown[]) {
    if (shouldLog('WARN')) {
      withoutProgressBar(() => log('WARN', '33', ...args));
    }
  },

  info(...args: unknown[]) {
    if (shouldLog('INFO')) {
      withoutProgressBar(() => log('INFO', '36', ...args));
    }
  },

  debug(...args: unknown[]) {
    if (shouldLog('DEBUG')) {
      withoutProgressBar(() => log('DEBUG', '90', ...args));
    }
  },
};
