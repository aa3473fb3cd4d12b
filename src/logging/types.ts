/**
 * Type definitions for the exporter logging system
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogFormat = 'json' | 'pretty';

export interface LogEntry {
  timestamp: string;
  level: string;
  component: string;
  message: string;
  correlationId?: string;
  meta?: Record<string, unknown>;
  error?: {
    message: string;
    name: string;
    stack?: string;
  };
  duration?: number;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, errorOrMeta?: Error | Record<string, unknown>, meta?: Record<string, unknown>): void;

  /** Create a child logger nested under this component */
  child(component: string): Logger;

  time(label: string): void;

  /** End a timer, log the duration at DEBUG and return it in ms */
  timeEnd(label: string, meta?: Record<string, unknown>): number | undefined;
}

export interface LoggerState {
  level: LogLevel;
  format: LogFormat;
  redactFields: string[];
  timers: Map<string, number>;
}
