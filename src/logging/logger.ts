/**
 * Structured logger for the exporter
 *
 * Every component takes a child logger (`logger.child('Collector')`), so a
 * line always says which stage of the scrape produced it. Scrape requests
 * carry a correlation id through the async context and it is attached to
 * every entry written while that request is being served.
 */

import { LogLevel, LogEntry, LogFormat, Logger, LoggerState } from './types.js';
import { redact } from './redaction.js';
import { getCorrelationId } from './correlation.js';

const ROOT_COMPONENT = 'exporter';

const state: LoggerState = {
  level: LogLevel.INFO,
  format: 'pretty',
  redactFields: [],
  timers: new Map(),
};

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '\x1b[36m', // Cyan
  [LogLevel.INFO]: '\x1b[32m',  // Green
  [LogLevel.WARN]: '\x1b[33m',  // Yellow
  [LogLevel.ERROR]: '\x1b[31m', // Red
};

const RESET_COLOR = '\x1b[0m';
const DIM_COLOR = '\x1b[2m';

/**
 * Unknown names fall back to INFO
 */
function stringToLevel(levelStr: string): LogLevel {
  switch (levelStr.trim().toUpperCase()) {
    case 'DEBUG': return LogLevel.DEBUG;
    case 'WARN':
    case 'WARNING': return LogLevel.WARN;
    case 'ERROR': return LogLevel.ERROR;
    default: return LogLevel.INFO;
  }
}

function formatEntry(level: LogLevel, entry: LogEntry): string {
  if (state.format === 'json') {
    return JSON.stringify(entry);
  }

  const levelColor = LEVEL_COLORS[level];
  let output = `${DIM_COLOR}${entry.timestamp}${RESET_COLOR} ${levelColor}${entry.level.padEnd(5)}${RESET_COLOR}`;
  output += ` ${DIM_COLOR}[${entry.component}]${RESET_COLOR}`;

  if (entry.correlationId) {
    output += ` ${DIM_COLOR}(${entry.correlationId})${RESET_COLOR}`;
  }

  output += ` ${entry.message}`;

  if (entry.duration !== undefined) {
    output += ` ${DIM_COLOR}(${entry.duration}ms)${RESET_COLOR}`;
  }

  if (entry.meta) {
    output += ` ${DIM_COLOR}${JSON.stringify(entry.meta)}${RESET_COLOR}`;
  }

  if (entry.error) {
    output += `\n  ${levelColor}${entry.error.name}: ${entry.error.message}${RESET_COLOR}`;
    if (entry.error.stack) {
      output += `\n${DIM_COLOR}${entry.error.stack}${RESET_COLOR}`;
    }
  }

  return output;
}

function writeLog(level: LogLevel, entry: LogEntry): void {
  const formatted = formatEntry(level, entry);

  switch (level) {
    case LogLevel.DEBUG:
    case LogLevel.INFO:
      console.log(formatted);
      break;
    case LogLevel.WARN:
      console.warn(formatted);
      break;
    case LogLevel.ERROR:
      console.error(formatted);
      break;
  }
}

interface EntryParts {
  component: string;
  error?: Error;
  meta?: Record<string, unknown>;
  duration?: number;
}

function createEntry(level: LogLevel, message: string, parts: EntryParts): LogEntry {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level: LEVEL_NAMES[level],
    component: parts.component,
    message,
  };

  const correlationId = getCorrelationId();
  if (correlationId) {
    entry.correlationId = correlationId;
  }

  if (parts.error) {
    entry.error = {
      message: parts.error.message,
      name: parts.error.name,
      stack: parts.error.stack,
    };
  }

  if (parts.meta && Object.keys(parts.meta).length > 0) {
    entry.meta = redact(parts.meta, state.redactFields);
  }

  if (parts.duration !== undefined) {
    entry.duration = parts.duration;
  }

  return entry;
}

class ComponentLogger implements Logger {
  constructor(private readonly component: string) {}

  private emit(level: LogLevel, message: string, error?: Error, meta?: Record<string, unknown>): void {
    if (level < state.level) return;
    writeLog(level, createEntry(level, message, {
      component: this.component,
      error,
      meta,
    }));
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.emit(LogLevel.DEBUG, message, undefined, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.emit(LogLevel.INFO, message, undefined, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.emit(LogLevel.WARN, message, undefined, meta);
  }

  error(message: string, errorOrMeta?: Error | Record<string, unknown>, meta?: Record<string, unknown>): void {
    if (errorOrMeta instanceof Error) {
      this.emit(LogLevel.ERROR, message, errorOrMeta, meta);
    } else {
      this.emit(LogLevel.ERROR, message, undefined, errorOrMeta);
    }
  }

  child(component: string): Logger {
    const childComponent = this.component === ROOT_COMPONENT ? component : `${this.component}.${component}`;
    return new ComponentLogger(childComponent);
  }

  time(label: string): void {
    state.timers.set(`${this.component}:${label}`, Date.now());
  }

  timeEnd(label: string, meta?: Record<string, unknown>): number | undefined {
    const key = `${this.component}:${label}`;
    const start = state.timers.get(key);

    if (start === undefined) {
      this.warn(`Timer "${label}" does not exist`);
      return undefined;
    }

    state.timers.delete(key);
    const duration = Date.now() - start;

    if (LogLevel.DEBUG >= state.level) {
      writeLog(LogLevel.DEBUG, createEntry(LogLevel.DEBUG, `${label} completed`, {
        component: this.component,
        meta,
        duration,
      }));
    }

    return duration;
  }
}

const rootLogger = new ComponentLogger(ROOT_COMPONENT);

export const logger = {
  /**
   * Read EXPORTER_LOG_LEVEL, EXPORTER_LOG_FORMAT and EXPORTER_LOG_REDACT
   */
  init(env: NodeJS.ProcessEnv = process.env): void {
    const level = env.EXPORTER_LOG_LEVEL;
    if (level) {
      state.level = stringToLevel(level);
    }

    const format = env.EXPORTER_LOG_FORMAT;
    if (format === 'json' || format === 'pretty') {
      state.format = format;
    }

    const redactFields = env.EXPORTER_LOG_REDACT;
    if (redactFields) {
      state.redactFields = redactFields.split(',').map(f => f.trim()).filter(f => f.length > 0);
    }
  },

  setLevel(level: LogLevel): void {
    state.level = level;
  },

  setLevelFromString(levelStr: string): void {
    state.level = stringToLevel(levelStr);
  },

  setFormat(format: LogFormat): void {
    state.format = format;
  },

  getLevel(): LogLevel {
    return state.level;
  },

  /**
   * Back to INFO, pretty, no custom redaction, no timers (for tests)
   */
  reset(): void {
    state.level = LogLevel.INFO;
    state.format = 'pretty';
    state.redactFields = [];
    state.timers.clear();
  },

  debug: rootLogger.debug.bind(rootLogger),
  info: rootLogger.info.bind(rootLogger),
  warn: rootLogger.warn.bind(rootLogger),
  error: rootLogger.error.bind(rootLogger),
  time: rootLogger.time.bind(rootLogger),
  timeEnd: rootLogger.timeEnd.bind(rootLogger),

  child(component: string): Logger {
    return rootLogger.child(component);
  },
};

export { LogLevel } from './types.js';
export type { Logger, LogEntry } from './types.js';
