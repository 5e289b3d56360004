import pino from 'pino';

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function toLevel(v: string | undefined): LogLevel {
  return v === 'debug' || v === 'warn' || v === 'error' ? v : 'info';
}

let runtimeLevel: LogLevel = toLevel(process.env.LOG_LEVEL);
const logger = pino({ level: runtimeLevel });

export type LogEntry = { level: LogLevel; msg: string; time: number };
const ring: LogEntry[] = [];
const RING_MAX = 2000;

function push(level: LogLevel, msg: string) {
  ring.push({ level, msg, time: Date.now() });
  if (ring.length > RING_MAX) ring.splice(0, ring.length - RING_MAX);
}

// Unhandled exceptions/rejections
process.on('uncaughtException', (err) => {
  push('error', `uncaughtException: ${String(err)}`);
  logger.error({ err }, 'uncaughtException');
});
process.on('unhandledRejection', (r) => {
  push('error', `unhandledRejection: ${String(r)}`);
  logger.error({ reason: r }, 'unhandledRejection');
});

export function setLogLevel(level: LogLevel) {
  runtimeLevel = level;
  logger.level = level;
}

export function getLogLevel() { return runtimeLevel; }

export function log(level: LogLevel, msg: string) {
  // ring keeps every level; the pino threshold only filters stdout
  push(level, msg);
  logger[level](msg);
}

export function getLogs(since?: number) {
  return ring.filter(e => !since || e.time > since);
}
