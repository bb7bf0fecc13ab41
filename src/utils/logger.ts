/**
 * Leveled logging to stderr.
 *
 * Text lines read `[HH:MM:SS] LEVEL [scope] message (key=value ...)`; with
 * DOCWEAVE_LOG_JSON=true each entry is one JSON object with `scope` and
 * `meta` as separate fields. DOCWEAVE_LOG_LEVEL sets the initial level.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type EntryLevel = Exclude<LogLevel, 'silent'>;

export type LogMeta = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: EntryLevel;
  /** Component that wrote the entry */
  scope?: string;
  message: string;
  meta?: LogMeta;
}

export interface Logger {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

let currentLevel: LogLevel = parseLogLevel(process.env.DOCWEAVE_LOG_LEVEL);
let jsonMode = process.env.DOCWEAVE_LOG_JSON === 'true';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function setJsonMode(enabled: boolean): void {
  jsonMode = enabled;
}

function enabled(level: EntryLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(currentLevel);
}

// Errors don't survive JSON.stringify; keep their message
function plain(meta: LogMeta): LogMeta {
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] = value instanceof Error ? value.message : value;
  }
  return out;
}

function renderValue(value: unknown): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
}

/**
 * Render one entry as a text line, or as JSON when `json` is set.
 */
export function formatLogEntry(entry: LogEntry, json: boolean = jsonMode): string {
  if (json) return JSON.stringify(entry);

  const time = entry.timestamp.slice(11, 19);
  const scope = entry.scope ? `[${entry.scope}] ` : '';
  const line = `[${time}] ${entry.level.toUpperCase().padEnd(5)} ${scope}${entry.message}`;

  const pairs = Object.entries(entry.meta ?? {}).map(([key, value]) => `${key}=${renderValue(value)}`);
  return pairs.length > 0 ? `${line} (${pairs.join(' ')})` : line;
}

function write(level: EntryLevel, scope: string | undefined, message: string, meta: LogMeta | undefined): void {
  if (!enabled(level)) return;

  const entry: LogEntry = { timestamp: new Date().toISOString(), level, scope, message };
  if (meta && Object.keys(meta).length > 0) entry.meta = plain(meta);

  process.stderr.write(formatLogEntry(entry) + '\n');
}

/**
 * Logger for one component. `bindings` are merged into every entry's meta;
 * per-call meta wins on key clashes.
 */
export function createLogger(scope: string, bindings: LogMeta = {}): Logger {
  const merge = (meta?: LogMeta): LogMeta => ({ ...bindings, ...meta });
  return {
    debug: (msg, meta) => write('debug', scope, msg, merge(meta)),
    info: (msg, meta) => write('info', scope, msg, merge(meta)),
    warn: (msg, meta) => write('warn', scope, msg, merge(meta)),
    error: (msg, meta) => write('error', scope, msg, merge(meta)),
  };
}

/** Unscoped logger */
export const logger: Logger = {
  debug: (msg, meta) => write('debug', undefined, msg, meta),
  info: (msg, meta) => write('info', undefined, msg, meta),
  warn: (msg, meta) => write('warn', undefined, msg, meta),
  error: (msg, meta) => write('error', undefined, msg, meta),
};

export default logger;
