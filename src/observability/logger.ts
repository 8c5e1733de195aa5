import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

// node --test marks its child processes with NODE_TEST_CONTEXT
const underTest = process.env.NODE_ENV === 'test' || process.env.NODE_TEST_CONTEXT !== undefined;
const consoleEnabled = underTest ? false : process.env.DEBUG_BOT !== '0';
const fileEnabled = underTest ? false : process.env.LOG_TO_FILE !== '0';
const logFile = process.env.LOG_FILE ?? 'logs/bot.log';
let fileReady = false;

type Level = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG';

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

function color(level: Level) {
  const reset = '\x1b[0m';
  const colors: Record<Level, string> = {
    INFO: '\x1b[34m', // blue
    DEBUG: '\x1b[95m', // bright magenta
    WARN: '\x1b[33m', // yellow
    ERROR: '\x1b[31m' // red
  };
  return `${colors[level]}[${level}]${reset}`;
}

function fmt(level: Level, args: unknown[]) {
  return [`[${localTs()}] ${color(level)}`, ...args];
}

function serialize(v: unknown): string {
  if (typeof v === 'string') return v;
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  try {
    return JSON.stringify(v);
  } catch {
    return String(v);
  }
}

function writeFileLog(level: Level, args: unknown[]) {
  if (!fileEnabled) return;
  if (!fileReady) {
    mkdirSync(dirname(logFile), { recursive: true });
    fileReady = true;
  }
  const msg = args.map(serialize).join(' ');
  appendFileSync(logFile, `[${localTs()}] [${level}] ${msg}\n`, 'utf8');
}

/** Shortens long free text (user messages, tool payloads) for log lines. */
export function preview(text: string, max = 80): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export const logger = {
  info: (...args: unknown[]) => {
    if (consoleEnabled) console.log(...fmt('INFO', args));
    writeFileLog('INFO', args);
  },
  warn: (...args: unknown[]) => {
    if (consoleEnabled) console.warn(...fmt('WARN', args));
    writeFileLog('WARN', args);
  },
  error: (...args: unknown[]) => {
    if (consoleEnabled) console.error(...fmt('ERROR', args));
    writeFileLog('ERROR', args);
  },
  debug: (...args: unknown[]) => {
    if (consoleEnabled) console.log(...fmt('DEBUG', args));
    writeFileLog('DEBUG', args);
  }
};
