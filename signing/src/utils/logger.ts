type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogMeta {
  [key: string]: unknown;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };
// Compared against keys lowercased with `_` and `-` removed.
const REDACTED_KEYS = new Set([
  'token',
  'accesstoken',
  'secret',
  'password',
  'dbpassword',
  'encryptedvalue',
  'encryptionkey',
  'documentencryptionkey',
  'authorization',
]);

function isRedactedKey(key: string): boolean {
  return REDACTED_KEYS.has(key.toLowerCase().replace(/[_-]/g, ''));
}

function resolveLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error') {
    return raw;
  }
  return 'info';
}

function redact(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redact);
  }

  if (value instanceof Date || value === null || typeof value !== 'object') {
    return value;
  }

  const result: LogMeta = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = isRedactedKey(key) ? '[REDACTED]' : redact(entry);
  }
  return result;
}

function normalizeMeta(meta?: LogMeta | Error): LogMeta {
  if (!meta) {
    return {};
  }

  if (meta instanceof Error) {
    return { error: meta.message, errorName: meta.name };
  }

  const normalized: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    normalized[key] = value instanceof Error ? value.message : value;
  }

  const redacted = redact(normalized);
  return typeof redacted === 'object' && redacted !== null ? { ...redacted } : {};
}

export class Logger {
  private static write(level: LogLevel, message: string, meta?: LogMeta | Error): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[resolveLevel()]) {
      return;
    }

    const payload = {
      level,
      timestamp: new Date().toISOString(),
      message,
      ...normalizeMeta(meta),
    };

    if (level === 'error') {
      console.error(JSON.stringify(payload));
      return;
    }

    if (level === 'warn') {
      console.warn(JSON.stringify(payload));
      return;
    }

    console.log(JSON.stringify(payload));
  }

  static debug(message: string, meta?: LogMeta | Error): void {
    this.write('debug', message, meta);
  }

  static info(message: string, meta?: LogMeta | Error): void {
    this.write('info', message, meta);
  }

  static warn(message: string, meta?: LogMeta | Error): void {
    this.write('warn', message, meta);
  }

  static error(message: string, meta?: LogMeta | Error): void {
    this.write('error', message, meta);
  }
}
