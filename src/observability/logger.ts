import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

type Level = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const RANK: Record<Level, number> = { DEBUG: 10, INFO: 20, WARN: 30, ERROR: 40 };

function resolveLevel(value: string | undefined): Level {
  switch (value?.toUpperCase()) {
    case 'INFO':
      return 'INFO';
    case 'WARN':
      return 'WARN';
    case 'ERROR':
      return 'ERROR';
    default:
      return 'DEBUG';
  }
}

// node --test marks its worker processes with NODE_TEST_CONTEXT
const quiet = process.env.NODE_ENV === 'test' || process.env.NODE_TEST_CONTEXT !== undefined;
const consoleEnabled = !quiet && process.env.DEBUG_COMPANION !== '0';
const fileEnabled = !quiet && process.env.LOG_TO_FILE !== '0';
const logFile = process.env.LOG_FILE ?? 'logs/companion.log';
const minLevel = resolveLevel(process.env.LOG_LEVEL);
let fileReady = false;

export type LogFn = (...args: unknown[]) => void;

export interface Logger {
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  debug: LogFn;
}

function pad(num: number, size = 2) {
  return num.toString().padStart(size, '0');
}

function localTs() {
  const d = new Date();
  const date = `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
  const time = `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}.${pad(d.getMilliseconds(), 3)}`;
  return `${date} ${time}`;
}

const COLORS: Record<Level, string> = {
  DEBUG: '\x1b[95m',
  INFO: '\x1b[34m',
  WARN: '\x1b[33m',
  ERROR: '\x1b[31m'
};

function serialize(v: unknown): string {
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

function emit(level: Level, scope: string | undefined, args: unknown[]) {
  if (RANK[level] < RANK[minLevel]) return;
  const ts = localTs();
  const prefix = scope ? [`(${scope})`] : [];
  if (consoleEnabled) {
    const out = level === 'ERROR' ? console.error : level === 'WARN' ? console.warn : console.log;
    out(`[${ts}] ${COLORS[level]}[${level}]\x1b[0m`, ...prefix, ...args);
  }
  // plain tag in the file, colours are for the terminal only
  if (fileEnabled) {
    writeFileLog(`[${ts}] [${level}] ${[...prefix, ...args].map(serialize).join(' ')}`);
  }
}

export function createLogger(scope?: string): Logger {
  return {
    debug: (...args: unknown[]) => emit('DEBUG', scope, args),
    info: (...args: unknown[]) => emit('INFO', scope, args),
    warn: (...args: unknown[]) => emit('WARN', scope, args),
    error: (...args: unknown[]) => emit('ERROR', scope, args)
  };
}

export const logger: Logger = createLogger();

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
