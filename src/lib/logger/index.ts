/**
 * Namespaced structured logger for the test run.
 *
 * Env:
 *  - LOG_ENABLED=0            -> disable logs (default: enabled)
 *  - LOG_LEVEL=debug|info|... -> min level (default: info)
 *  - LOG_JSON=1               -> JSON lines (default: pretty text)
 *  - LOG_SERVICE_NAME=...     -> service tag (default: nvmeof-remote-test, empty to omit)
 */

type LevelName = 'debug' | 'info' | 'warn' | 'error';

export interface LogMeta {
  [key: string]: unknown;
  error?: unknown;
  err?: unknown;
}

export interface Logger {
  debug(message: unknown, meta?: LogMeta): void;
  info(message: unknown, meta?: LogMeta): void;
  warn(message: unknown, meta?: LogMeta): void;
  error(message: unknown, meta?: LogMeta): void;
  child(namespace: string | string[]): Logger;
}

type Settings = {
  enabled: boolean;
  minLevel: number;
  json: boolean;
  service: string;
};

const LEVELS: Record<LevelName, number> = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

const DEFAULT_SERVICE = 'nvmeof-remote-test';

function isLevelName(value: string): value is LevelName {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function readSettings(env: NodeJS.ProcessEnv): Settings {
  const level = (env.LOG_LEVEL || 'info').toLowerCase();
  return {
    enabled: env.LOG_ENABLED !== '0',
    minLevel: isLevelName(level) ? LEVELS[level] : LEVELS.info,
    json: env.LOG_JSON === '1',
    service: (env.LOG_SERVICE_NAME ?? DEFAULT_SERVICE).trim(),
  };
}

const settings = readSettings(process.env);

function serializeError(err: unknown): unknown {
  if (!(err instanceof Error)) return err;
  const extra: Record<string, unknown> = { ...err };
  return { ...extra, name: err.name, message: err.message, stack: err.stack };
}

function stringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return '{"_":"[unserializable]"}';
  }
}

function prepareMeta(meta?: LogMeta): LogMeta | undefined {
  if (!meta) return undefined;
  const copy: LogMeta = { ...meta };
  if (copy.err) copy.err = serializeError(copy.err);
  if (copy.error) copy.error = serializeError(copy.error);
  return copy;
}

function emit(level: LevelName, line: string): void {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

function createLogger(namespace: string): Logger {
  const write = (level: LevelName, message: unknown, meta?: LogMeta): void => {
    if (!settings.enabled || LEVELS[level] < settings.minLevel) return;

    const ts = new Date().toISOString();
    const msg = String(message ?? '');
    const details = prepareMeta(meta);

    if (settings.json) {
      emit(
        level,
        stringify({
          ts,
          level,
          ns: namespace || undefined,
          service: settings.service || undefined,
          pid: process.pid,
          msg,
          meta: details,
        })
      );
      return;
    }

    const tags = [`[${ts}]`, settings.service && `[${settings.service}]`, `[${level.toUpperCase()}]`, namespace && `[${namespace}]`]
      .filter(Boolean)
      .join(' ');
    emit(level, `${tags} ${msg}${details ? ` ${stringify(details)}` : ''}`);
  };

  return {
    debug: (m, meta) => write('debug', m, meta),
    info: (m, meta) => write('info', m, meta),
    warn: (m, meta) => write('warn', m, meta),
    error: (m, meta) => write('error', m, meta),
    child: (sub) => {
      const parts = Array.isArray(sub) ? sub : [sub];
      return createLogger([namespace, ...parts].filter(Boolean).join(':'));
    },
  };
}

const logger = createLogger('');

export default logger;
