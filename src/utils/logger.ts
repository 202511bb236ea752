import { env } from '../config.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type Threshold = LogLevel | 'silent';
type Meta = Record<string, unknown>;

const LEVELS: Record<Threshold, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

function serialize(meta: Meta): Meta {
  const out: Meta = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = v instanceof Error ? { name: v.name, message: v.message } : v;
  }
  return out;
}

function log(level: LogLevel, scope: string | undefined, message: string, meta?: Meta): void {
  if (LEVELS[level] < LEVELS[env.LOG_LEVEL]) return;
  const ts = new Date().toISOString();
  const text = scope ? `${scope}: ${message}` : message;
  const out = env.LOG_FORMAT === 'json'
    ? JSON.stringify({ timestamp: ts, level, scope, message, ...(meta ? serialize(meta) : {}) })
    : meta ? `[${ts}] [${level.toUpperCase()}] ${text} ${JSON.stringify(serialize(meta))}`
           : `[${ts}] [${level.toUpperCase()}] ${text}`;
  if (level === 'error') process.stderr.write(out + '\n');
  else process.stdout.write(out + '\n');
}

export interface Logger {
  debug(msg: string, meta?: Meta): void;
  info(msg: string, meta?: Meta): void;
  warn(msg: string, meta?: Meta): void;
  error(msg: string, meta?: Meta): void;
  child(scope: string): Logger;
}

function make(scope?: string): Logger {
  return {
    debug: (msg, meta) => log('debug', scope, msg, meta),
    info:  (msg, meta) => log('info',  scope, msg, meta),
    warn:  (msg, meta) => log('warn',  scope, msg, meta),
    error: (msg, meta) => log('error', scope, msg, meta),
    child: (sub) => make(scope ? `${scope}.${sub}` : sub),
  };
}

export const logger: Logger = make();
