/**
 * Console logging plus a bounded in-memory buffer of recent entries.
 *
 * Console output is `[name] [LEVEL] message`. Errors always print; the other
 * levels print when they are at or above LOG_LEVEL (default "info").
 * Every entry, printed or not, lands in the buffer for later inspection.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LogEntry {
  id: string;
  ts: number;
  agent: string;
  level: LogLevel;
  message: string;
  detail?: string;
}

const MAX_LOGS = 500;
const buffer: LogEntry[] = [];
let nextId = 1;

export function agentLog(
  agent: string,
  message: string,
  options?: { level?: LogLevel; detail?: string },
): LogEntry {
  const entry: LogEntry = {
    id: `log-${nextId++}`,
    ts: Date.now(),
    agent,
    level: options?.level ?? 'info',
    message,
    detail: options?.detail,
  };
  buffer.push(entry);
  if (buffer.length > MAX_LOGS) buffer.shift();
  return entry;
}

/** Entries after `afterId`, or the whole buffer when the id is unknown. */
export function getAgentLogs(afterId?: string): LogEntry[] {
  if (!afterId) return [...buffer];
  const idx = buffer.findIndex((l) => l.id === afterId);
  return idx < 0 ? [...buffer] : buffer.slice(idx + 1);
}

export function clearAgentLogs(): void {
  buffer.length = 0;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

export function shouldPrint(level: LogLevel, threshold: string | undefined = process.env.LOG_LEVEL): boolean {
  if (level === 'error') return true;
  const min: LogLevel = isLogLevel(threshold) ? threshold : 'info';
  return LEVEL_ORDER[level] >= LEVEL_ORDER[min];
}

/** One-line description of a thrown value, including a nested `cause` when present. */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    const base = err.name && err.name !== 'Error' ? `${err.name}: ${err.message}` : err.message;
    return err.cause !== undefined ? `${base} (cause: ${describeError(err.cause)})` : base;
  }
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export function createLogger(name: string): Logger {
  const write = (level: LogLevel, message: string, data?: unknown): void => {
    agentLog(name, message, {
      level,
      detail: data === undefined ? undefined : describeError(data),
    });
    if (shouldPrint(level)) {
      console.log(`[${name}] [${level.toUpperCase()}] ${message}`, data ?? '');
    }
  };
  return {
    debug: (m, d) => write('debug', m, d),
    info: (m, d) => write('info', m, d),
    warn: (m, d) => write('warn', m, d),
    error: (m, d) => write('error', m, d),
  };
}
