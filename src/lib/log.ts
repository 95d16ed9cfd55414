import pino, { type Logger, type LogFn } from 'pino';
import process from 'node:process';

type LoggerFields = Record<string, unknown>;

const rootLogger = pino({
  level: process.env.LOG_LEVEL ?? 'info',
  base: { service: 'freight-quote-engine' },
});

const FULL_MASK_KEYS = new Set([
  'token',
  'access_token',
  'secret',
  'authorization',
  'apikey',
  'api_key',
  'password',
  'cookie',
  'email',
  'from',
  'to',
  'reply_to',
]);

const SUMMARY_MASK_KEYS = new Set(['text', 'body', 'subject', 'notes', 'content']);

export type LoggerInstance = {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  child: (bindings?: LoggerFields) => LoggerInstance;
};

export function sanitizeValue(value: unknown, parentKey?: string): unknown {
  if (value === null || typeof value === 'undefined') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((entry) => sanitizeValue(entry, parentKey));
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Error) {
    const code = 'code' in value ? value.code : undefined;
    return {
      name: value.name,
      message: value.message,
      code: typeof code === 'string' ? code : undefined,
      stack: process.env.LOG_INCLUDE_STACKS === 'true' ? value.stack : undefined,
    };
  }
  if (typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, nestedValue] of Object.entries(value)) {
      result[key] = sanitizeValue(nestedValue, key);
    }
    return result;
  }

  const normalizedKey = parentKey?.toLowerCase();
  if (typeof value === 'string' && normalizedKey) {
    if (normalizedKey.includes('url')) {
      return maskUrl(value);
    }
    if (FULL_MASK_KEYS.has(normalizedKey)) {
      return normalizedKey === 'email' ||
        normalizedKey === 'to' ||
        normalizedKey === 'from' ||
        normalizedKey === 'reply_to'
        ? maskEmail(value) ?? `[redacted:${normalizedKey}]`
        : `[redacted:${normalizedKey}]`;
    }
    if (SUMMARY_MASK_KEYS.has(normalizedKey)) {
      return maskText(value, normalizedKey);
    }
  }

  return value;
}

export function maskText(value: string, key?: string): string {
  const normalized = value.replace(/\s+/g, ' ').trim();
  if (!normalized) {
    return '[masked-empty]';
  }
  const snippet = normalized.slice(0, 48);
  const suffix = normalized.length > 48 ? '…' : '';
  return `[masked:${key ?? 'value'} len=${normalized.length} snippet="${snippet}${suffix}"]`;
}

// Provider URLs carry access tokens in the query string; keep host and path only.
export function maskUrl(raw: string): string {
  try {
    const parsed = new URL(raw);
    const truncatedPath =
      parsed.pathname.length > 40
        ? `${parsed.pathname.slice(0, 40)}…`
        : parsed.pathname || '/';
    return `[masked:url host=${parsed.host} path=${truncatedPath}]`;
  } catch {
    return maskText(raw, 'url');
  }
}

export function maskEmail(raw: string | null | undefined): string | undefined {
  if (!raw) return undefined;
  const match = /<([^>]+)>/.exec(raw);
  const address = (match ? match[1] : raw).trim();
  const [user, domain] = address.split('@');
  if (!domain) return '[redacted:email]';
  const prefix = user.slice(0, 1) || '*';
  return `${prefix}${'*'.repeat(Math.max(0, user.length - 1))}@${domain}`;
}

function wrapLogger(base: Logger): LoggerInstance {
  const emit = (fn: LogFn, bindingsOrMsg?: unknown, maybeMsg?: unknown) => {
    if (typeof bindingsOrMsg === 'string') {
      fn(bindingsOrMsg);
      return;
    }
    const sanitized = sanitizeValue(bindingsOrMsg);
    if (typeof maybeMsg === 'string') {
      fn(sanitized, maybeMsg);
      return;
    }
    fn(sanitized);
  };

  return {
    debug: (bindingsOrMsg?: unknown, msg?: string) => emit(base.debug.bind(base), bindingsOrMsg, msg),
    info: (bindingsOrMsg?: unknown, msg?: string) => emit(base.info.bind(base), bindingsOrMsg, msg),
    warn: (bindingsOrMsg?: unknown, msg?: string) => emit(base.warn.bind(base), bindingsOrMsg, msg),
    error: (bindingsOrMsg?: unknown, msg?: string) => emit(base.error.bind(base), bindingsOrMsg, msg),
    child: (bindings?: LoggerFields) => wrapLogger(base.child(bindings ?? {})),
  };
}

export function getLogger(): LoggerInstance {
  return wrapLogger(rootLogger);
}

export function getRawLogger(): Logger {
  return rootLogger;
}
