import pino from 'pino';

/** Meta keys whose values never reach a log line (compared lowercased). */
const SENSITIVE_KEYS = new Set([
  'password',
  'currentpassword',
  'current_password',
  'newpassword',
  'new_password',
  'salt',
  'hashedpassword',
  'hashed_password',
  'token',
  'accesstoken',
  'access_token',
  'secret',
  'apikey',
  'apisecret',
  'clientid',
  'client_id',
  'clientsecret',
  'client_secret',
  'ip',
  'ipaddress',
  'remoteaddress',
  'authorization',
  'cookie',
  'body',
]);

const REDACTED = '[REDACTED]';

type LogLevel = 'info' | 'warn' | 'error' | 'debug' | 'fatal';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Uint8Array);
}

function redactValue(value: unknown): unknown {
  // Raw bytes in this codebase are salts and digests.
  if (value instanceof Uint8Array) return REDACTED;
  if (Array.isArray(value)) return value.map(redactValue);
  if (isRecord(value)) return redactMeta(value);
  return value;
}

/** Copies `meta`, replacing sensitive keys and byte arrays at any depth. */
export function redactMeta(meta: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTED : redactValue(value);
  }
  return result;
}

export interface SafeLogger {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
  debug(meta: Record<string, unknown>, msg: string): void;
  fatal(meta: Record<string, unknown>, msg: string): void;
  child(bindings: Record<string, unknown>): SafeLogger;
}

function wrapPino(logger: pino.Logger): SafeLogger {
  const write = (level: LogLevel) => (meta: Record<string, unknown>, msg: string) => {
    logger[level](redactMeta(meta), msg);
  };

  return {
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    debug: write('debug'),
    fatal: write('fatal'),
    child(bindings) {
      return wrapPino(logger.child(redactMeta(bindings)));
    },
  };
}

export function createLogger(opts: { name: string; level?: string }): SafeLogger {
  const instance = pino({
    name: opts.name,
    level: opts.level ?? process.env.LOG_LEVEL ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  });
  return wrapPino(instance);
}
