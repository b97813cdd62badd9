type Level = 'info' | 'warn' | 'error';

export type Logger = Record<Level, (message: string, meta?: Record<string, unknown>) => void>;

function serialize(v: unknown): string {
  try {
    return JSON.stringify(v, (_key, value: unknown) =>
      value instanceof Error ? { name: value.name, message: value.message } : value,
    );
  } catch {
    return String(v);
  }
}

function write(tag: string, level: Level, message: string, meta?: Record<string, unknown>): void {
  const base = `[${tag}] ${new Date().toISOString()} ${level.toUpperCase()} ${message}`;
  const line = meta && Object.keys(meta).length ? `${base} ${serialize(meta)}` : base;

  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
}

export function createLogger(tag: string): Logger {
  return {
    info: (message, meta) => write(tag, 'info', message, meta),
    warn: (message, meta) => write(tag, 'warn', message, meta),
    error: (message, meta) => write(tag, 'error', message, meta),
  };
}
