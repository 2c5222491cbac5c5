/**
 * Structured logging.
 *
 * Emits one JSON line per entry with `ts`, `level`, `msg` and any bound or
 * per-call fields. The default sink is stdout.
 */

import type { LogLevel } from '@prism/config';

export type LogFields = Record<string, unknown>;
export type EntryLevel = Exclude<LogLevel, 'silent'>;

export interface Logger {
  readonly level: LogLevel;
  isEnabled(level: EntryLevel): boolean;
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
  /** Logger that adds `fields` to every entry. */
  child(fields: LogFields): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Receives each serialized line, without the trailing newline. */
  sink?: (line: string) => void;
  now?: () => Date;
  bindings?: LogFields;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Infinity,
};

function stdoutSink(line: string): void {
  process.stdout.write(line + '\n');
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const sink = options.sink ?? stdoutSink;
  const now = options.now ?? (() => new Date());
  const bindings = options.bindings ?? {};

  const isEnabled = (entryLevel: EntryLevel): boolean => SEVERITY[entryLevel] >= SEVERITY[level];

  const write = (entryLevel: EntryLevel, msg: string, fields?: LogFields): void => {
    if (!isEnabled(entryLevel)) return;
    const entry = { ts: now().toISOString(), level: entryLevel, msg, ...bindings, ...fields };
    sink(JSON.stringify(entry));
  };

  return {
    level,
    isEnabled,
    debug: (msg, fields) => write('debug', msg, fields),
    info: (msg, fields) => write('info', msg, fields),
    warn: (msg, fields) => write('warn', msg, fields),
    error: (msg, fields) => write('error', msg, fields),
    child: (fields) => createLogger({ level, sink, now, bindings: { ...bindings, ...fields } }),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger({ level: 'silent', sink: () => {} });
