/**
 * Component logging to stderr.
 *
 * stdout carries command output (rank tables, JSON, config dumps), so every
 * log line goes to stderr. Each module logs through its own component
 * logger:
 *
 * ```typescript
 * const log = createLogger('frames');
 * log.debug('Computed 21 frames', { scenario: 'trust-flow-example' });
 * // [14:07:09] DEBUG [frames] Computed 21 frames (scenario=trust-flow-example)
 * ```
 *
 * `TRUSTFLOW_LOG_LEVEL` sets the threshold (default `info`) and
 * `TRUSTFLOW_LOG_JSON=true` switches to one JSON object per line.
 */

/** Levels from most to least verbose; `silent` disables output. */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Levels a message can be written at. */
export type EntryLevel = Exclude<LogLevel, 'silent'>;

export interface LogEntry {
  timestamp: string;
  level: EntryLevel;
  /** Component that wrote the entry */
  component?: string;
  message: string;
  meta?: Record<string, unknown>;
}

export type LogMethod = (message: string, meta?: Record<string, unknown>) => void;

export interface Logger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

export interface LoggerSettings {
  level: LogLevel;
  json: boolean;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Parse a log level name, falling back to `info` for anything unrecognized.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  return value !== undefined && isLogLevel(value) ? value : 'info';
}

const settings: LoggerSettings = {
  level: parseLogLevel(process.env.TRUSTFLOW_LOG_LEVEL),
  json: process.env.TRUSTFLOW_LOG_JSON === 'true',
};

/**
 * Update the process-wide logger settings. Omitted fields keep their value.
 */
export function configureLogger(changes: Partial<LoggerSettings>): void {
  settings.level = changes.level ?? settings.level;
  settings.json = changes.json ?? settings.json;
}

export function setLogLevel(level: LogLevel): void {
  configureLogger({ level });
}

export function getLogLevel(): LogLevel {
  return settings.level;
}

export function setJsonMode(enabled: boolean): void {
  configureLogger({ json: enabled });
}

function isEnabled(level: EntryLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(settings.level);
}

function formatMeta(meta: Record<string, unknown>): string {
  return Object.entries(meta)
    .map(([key, value]) => `${key}=${typeof value === 'object' ? JSON.stringify(value) : String(value)}`)
    .join(' ');
}

/**
 * Render an entry as one output line (without the trailing newline).
 */
export function formatEntry(entry: LogEntry): string {
  if (settings.json) {
    return JSON.stringify(entry);
  }

  const clock = entry.timestamp.slice(11, 19);
  const parts = [`[${clock}]`, entry.level.toUpperCase().padEnd(5)];
  if (entry.component) {
    parts.push(`[${entry.component}]`);
  }
  parts.push(entry.message);

  const line = parts.join(' ');
  return entry.meta && Object.keys(entry.meta).length > 0
    ? `${line} (${formatMeta(entry.meta)})`
    : line;
}

/**
 * Logger whose entries are tagged with `component`.
 */
export function createLogger(component: string): Logger {
  const at =
    (level: EntryLevel): LogMethod =>
    (message, meta) => {
      if (!isEnabled(level)) return;
      const entry: LogEntry = { timestamp: new Date().toISOString(), level, component, message, meta };
      process.stderr.write(`${formatEntry(entry)}\n`);
    };

  return { debug: at('debug'), info: at('info'), warn: at('warn'), error: at('error') };
}
