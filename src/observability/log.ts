import { redact } from '../security/log_mask.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogMeta = Record<string, string | number | boolean | undefined>;

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

// Secrets registered at runtime (e.g. the macaroon hex once loaded).
const runtimeSecrets = new Set<string>();

export function registerSecret(secret: string) {
  if (secret) runtimeSecrets.add(secret);
}

export function clearSecrets() {
  runtimeSecrets.clear();
}

function minLevel(): LogLevel {
  const v = String(process.env.LOG_LEVEL || 'info').toLowerCase();
  return v === 'debug' || v === 'warn' || v === 'error' ? v : 'info';
}

function redactList(): string[] {
  const fromEnv = String(process.env.LOG_REDACT_LIST || '').split(',').map(s => s.trim()).filter(Boolean);
  return [...fromEnv, ...runtimeSecrets];
}

export function formatLine(level: LogLevel, event: string, meta: LogMeta = {}, json = process.env.JSON_LOGS === 'true'): string {
  if (json) {
    return JSON.stringify({ ts: new Date().toISOString(), level, event, ...meta });
  }
  const kv = Object.entries(meta)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(' ');
  return `[${level}] ${event}${kv ? ' ' + kv : ''}`;
}

export function logEvent(level: LogLevel, event: string, meta: LogMeta = {}) {
  if (ORDER[level] < ORDER[minLevel()]) return;
  const out = redact(formatLine(level, event, meta), redactList());
  if (level === 'error' || level === 'warn') console.error(out);
  else console.log(out);
}

export const log = {
  debug: (event: string, meta?: LogMeta) => logEvent('debug', event, meta),
  info: (event: string, meta?: LogMeta) => logEvent('info', event, meta),
  warn: (event: string, meta?: LogMeta) => logEvent('warn', event, meta),
  error: (event: string, meta?: LogMeta) => logEvent('error', event, meta),
};
