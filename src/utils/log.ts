type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_WEIGHT: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isLevelName(value: string): value is keyof typeof LEVEL_WEIGHT {
  return Object.prototype.hasOwnProperty.call(LEVEL_WEIGHT, value);
}

function resolveThreshold(raw: string | undefined): number {
  const normalized = raw?.trim().toLowerCase();
  if (normalized && isLevelName(normalized)) {
    return LEVEL_WEIGHT[normalized];
  }
  return LEVEL_WEIGHT.info;
}

function serializeMeta(meta: unknown): string {
  if (meta === undefined) return '';
  if (meta instanceof Error) {
    return ` ${meta.stack ?? `${meta.name}: ${meta.message}`}`;
  }
  try {
    return ` ${JSON.stringify(meta, (_key, value: unknown) =>
      value instanceof Error ? { name: value.name, message: value.message, stack: value.stack } : value
    )}`;
  } catch {
    return ` ${String(meta)}`;
  }
}

function write(level: LogLevel, message: string, meta?: unknown) {
  if (LEVEL_WEIGHT[level] < resolveThreshold(process.env.LOG_LEVEL)) return;
  const line = `${new Date().toISOString()} ${level.toUpperCase().padEnd(5)} ${message}${serializeMeta(meta)}`;
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export const log = {
  debug: (message: string, meta?: unknown) => write('debug', message, meta),
  info: (message: string, meta?: unknown) => write('info', message, meta),
  warn: (message: string, meta?: unknown) => write('warn', message, meta),
  error: (message: string, meta?: unknown) => write('error', message, meta)
};
