type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogFormat = 'text' | 'json';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

function normalizeLogLevel(raw: string | undefined): LogLevel {
  const v = String(raw || '').trim().toLowerCase();
  if (v === 'debug' || v === 'info' || v === 'warn' || v === 'error') return v;
  return 'info';
}

function normalizeLogFormat(raw: string | undefined): LogFormat {
  const v = String(raw || '').trim().toLowerCase();
  if (v === 'json') return 'json';
  return 'text';
}

function levelValue(level: LogLevel): number {
  if (level === 'debug') return 10;
  if (level === 'info') return 20;
  if (level === 'warn') return 30;
  return 40;
}

function nowIso(): string {
  return new Date().toISOString();
}

function toKeyValueString(meta: LogMeta | undefined): string {
  if (!meta) return '';
  const parts: string[] = [];
  for (const [k, v] of Object.entries(meta)) {
    if (v === undefined) continue;
    if (v === null) {
      parts.push(`${k}=null`);
      continue;
    }
    if (typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean') {
      parts.push(`${k}=${String(v)}`);
      continue;
    }
    parts.push(`${k}=${JSON.stringify(v)}`);
  }
  return parts.length ? ` ${parts.join(' ')}` : '';
}

export function createLoggerFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  write: (line: string) => void = (line) => process.stdout.write(line)
): Logger {
  const minLevel = normalizeLogLevel(env.LOG_LEVEL);
  const format = normalizeLogFormat(env.LOG_FORMAT);

  function emit(level: LogLevel, message: string, meta?: LogMeta) {
    if (levelValue(level) < levelValue(minLevel)) return;
    if (format === 'json') {
      const payload = { ts: nowIso(), level, msg: message, ...meta };
      write(`${JSON.stringify(payload)}\n`);
      return;
    }
    const line = `${nowIso()} level=${level} msg=${JSON.stringify(message)}${toKeyValueString(meta)}`;
    write(`${line}\n`);
  }

  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
