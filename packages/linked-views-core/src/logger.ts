/**
 * A structured logging utility that separates console output (developer UX)
 * from a bounded in-memory buffer (debugging).
 * State changes are stored as semantic diffs to reduce noise.
 */
/* eslint-disable no-console */

import { compactReplacer, formatters } from './log-formatter';

export type LogCategory = 'Core' | 'Selection' | 'View' | 'Widget' | 'SQL';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  t: number; // Timestamp (ms)
  c: LogCategory;
  l: LogLevel;
  m: string;
  d?: string; // Data/Diff, stringified
}

export interface LoggerOptions {
  enabled?: boolean;
  consoleLevel?: LogLevel;
  maxLogs?: number;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

class LogManager {
  private logs: Array<LogEntry> = [];
  private startTime = Date.now();
  private maxLogs = 1000;
  private debounceTimers = new Map<string, ReturnType<typeof setTimeout>>();

  // Last known state per category, for StateChange diffs
  private stateSnapshots = new Map<LogCategory, unknown>();

  public enabled = true;
  private consoleLevel: LogLevel = 'warn';

  configure(options: LoggerOptions) {
    if (options.enabled !== undefined) {
      this.enabled = options.enabled;
    }
    if (options.consoleLevel !== undefined) {
      this.consoleLevel = options.consoleLevel;
    }
    if (options.maxLogs !== undefined) {
      this.maxLogs = Math.max(1, options.maxLogs);
      this.logs = this.logs.slice(-this.maxLogs);
    }
  }

  private add(
    level: LogLevel,
    category: LogCategory,
    message: string,
    meta?: unknown,
  ) {
    if (!this.enabled) return;

    if (LEVELS[level] >= LEVELS[this.consoleLevel]) {
      this.printConsole(level, category, message, meta);
    }

    let data: string | undefined;

    if (message.includes('StateChange') && meta !== undefined) {
      const diff = formatters.diff(
        this.stateSnapshots.get(category) ?? {},
        toPlain(meta),
      );

      if (!diff) return; // identical update

      this.stateSnapshots.set(category, toPlain(meta));
      data = diff;
    } else if (
      category === 'SQL' &&
      typeof meta === 'object' &&
      meta !== null &&
      'sql' in meta &&
      typeof meta.sql === 'string'
    ) {
      data = formatters.sql(meta.sql);
    } else if (meta !== undefined) {
      try {
        data = JSON.stringify(meta, compactReplacer());
        if (data.length > 500) {
          data = data.substring(0, 500) + '...[TRUNCATED]';
        }
      } catch {
        data = '[Unserializable]';
      }
    }

    this.logs.push({
      t: Date.now(),
      c: category,
      l: level,
      m: message,
      d: data,
    });

    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }
  }

  /**
   * Debounces a log entry. Useful for high-frequency events like brushes.
   */
  debounce(
    id: string,
    delay: number,
    level: LogLevel,
    category: LogCategory,
    message: string,
    meta?: unknown,
  ) {
    const pending = this.debounceTimers.get(id);
    if (pending) {
      clearTimeout(pending);
    }

    const timer = setTimeout(() => {
      this.add(level, category, `${message} (Debounced)`, meta);
      this.debounceTimers.delete(id);
    }, delay);

    this.debounceTimers.set(id, timer);
  }

  /**
   * Stored entries, oldest first.
   */
  entries(): ReadonlyArray<LogEntry> {
    return this.logs;
  }

  /**
   * Dense text report of the stored entries.
   */
  exportText(): string {
    let output = `--- LINKED VIEWS DEBUG LOG (Start: ${new Date(
      this.startTime,
    ).toISOString()}) ---\n`;
    output += `Format: [TimeDelta] [Category] Message | Data\n\n`;

    let lastTime = this.startTime;

    for (const log of this.logs) {
      const timeStr = formatters.timeDelta(lastTime, log.t).padEnd(7);
      const catStr = `[${log.c}]`.padEnd(12);

      let line = `${timeStr} ${catStr} ${log.m}`;
      if (log.d) {
        line += ` | ${log.d}`;
      }

      output += line + '\n';
      lastTime = log.t;
    }

    return output;
  }

  clear() {
    for (const timer of this.debounceTimers.values()) {
      clearTimeout(timer);
    }
    this.debounceTimers.clear();
    this.logs = [];
    this.stateSnapshots.clear();
    this.startTime = Date.now();
  }

  info(cat: LogCategory, msg: string, meta?: unknown) {
    this.add('info', cat, msg, meta);
  }
  debug(cat: LogCategory, msg: string, meta?: unknown) {
    this.add('debug', cat, msg, meta);
  }
  warn(cat: LogCategory, msg: string, meta?: unknown) {
    this.add('warn', cat, msg, meta);
  }
  error(cat: LogCategory, msg: string, meta?: unknown) {
    this.add('error', cat, msg, meta);
  }

  private printConsole(
    level: LogLevel,
    category: LogCategory,
    message: string,
    meta?: unknown,
  ) {
    const line = `[${category}] ${message}`;

    if (level === 'error') {
      console.error(line, meta ?? '');
    } else if (level === 'warn') {
      console.warn(line, meta ?? '');
    } else if (meta !== undefined) {
      console.groupCollapsed(line);
      console.log(meta);
      console.groupEnd();
    } else {
      console.log(line);
    }
  }
}

function toPlain(value: unknown): unknown {
  try {
    return JSON.parse(JSON.stringify(value, compactReplacer()));
  } catch {
    return value;
  }
}

export const logger = new LogManager();

export function configureLogger(options: LoggerOptions) {
  logger.configure(options);
}
