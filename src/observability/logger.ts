import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

type Level = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const rank: Record<Level, number> = { DEBUG: 10, INFO: 20, WARN: 30, ERROR: 40 };

const silent = process.env.NODE_ENV === 'test';
const consoleEnabled = !silent && process.env.DEBUG_CHAT !== '0';
const fileEnabled = !silent && process.env.LOG_TO_FILE !== '0';
const logFile = process.env.LOG_FILE ?? 'logs/chat.log';
const threshold = resolveThreshold(process.env.LOG_LEVEL);
let fileReady = false;

function resolveThreshold(raw: string | undefined): number {
  switch ((raw ?? '').toUpperCase()) {
    case 'DEBUG':
      return rank.DEBUG;
    case 'WARN':
      return rank.WARN;
    case 'ERROR':
      return rank.ERROR;
    default:
      return rank.INFO;
  }
}

function pad(num: number, size = 2) {
  return num.toString().padStart(size, '0');
}

function localTs() {
  const d = new Date();
  const yyyy = d.getFullYear();
  const MM = pad(d.getMonth() + 1);
  const dd = pad(d.getDate());
  const HH = pad(d.getHours());
  const mm = pad(d.getMinutes());
  const ss = pad(d.getSeconds());
  const ms = pad(d.getMilliseconds(), 3);
  return `${yyyy}-${MM}-${dd} ${HH}:${mm}:${ss}.${ms}`;
}

function tag(level: Level, colored: boolean) {
  if (!colored) return `[${level}]`;
  const reset = '\x1b[0m';
  const colors: Record<Level, string> = {
    DEBUG: '\x1b[95m', // bright magenta
    INFO: '\x1b[34m', // blue
    WARN: '\x1b[33m', // yellow
    ERROR: '\x1b[31m' // red
  };
  return `${colors[level]}[${level}]${reset}`;
}

function stringify(v: unknown): string {
  if (typeof v === 'string') return v;
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  try {
    return JSON.stringify(v);
  } catch {
    return String(v);
  }
}

function writeFileLog(line: string) {
  if (!fileReady) {
    mkdirSync(dirname(logFile), { recursive: true });
    fileReady = true;
  }
  appendFileSync(logFile, `${line}\n`, 'utf8');
}

export type Logger = {
  debug: (msg: string, fields?: Record<string, unknown>) => void;
  info: (msg: string, fields?: Record<string, unknown>) => void;
  warn: (msg: string, fields?: Record<string, unknown>) => void;
  error: (msg: string, fields?: Record<string, unknown>) => void;
};

export function createLogger(scope: string): Logger {
  const emit = (level: Level, msg: string, fields?: Record<string, unknown>) => {
    if (rank[level] < threshold) return;
    const head = `[${localTs()}]`;
    const body = fields ? `${msg} ${stringify(fields)}` : msg;
    if (consoleEnabled) {
      const write = level === 'ERROR' ? console.error : level === 'WARN' ? console.warn : console.log;
      write(`${head} ${tag(level, true)} (${scope}) ${body}`);
    }
    if (fileEnabled) writeFileLog(`${head} ${tag(level, false)} (${scope}) ${body}`);
  };

  return {
    debug: (msg, fields) => emit('DEBUG', msg, fields),
    info: (msg, fields) => emit('INFO', msg, fields),
    warn: (msg, fields) => emit('WARN', msg, fields),
    error: (msg, fields) => emit('ERROR', msg, fields)
  };
}

export const logger = createLogger('app');

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
