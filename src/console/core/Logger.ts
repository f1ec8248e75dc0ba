/**
 * Logger - Pub/Sub event log for console diagnostics
 *
 * Components log through a scope bound to their name:
 *
 *   const log = Logger.scope('pager');
 *   log.debug('pager:spawn', 'less -F -X');
 *
 * Entries below the current threshold are dropped. Subscribers and queries
 * select entries by source, event prefix and minimum level.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type ConsoleEvent =
  | 'mode:change'
  | 'hostname:change'
  | 'candidate:discard'
  | 'candidate:validate'
  | 'candidate:commit'
  | 'candidate:error'
  | 'command:run'
  | 'command:error'
  | 'pager:spawn'
  | 'pager:exit'
  | 'pager:error';

export interface ConsoleLog {
  timestamp: number;
  level: LogLevel;
  source: string;
  event: ConsoleEvent;
  message: string;
  data?: Record<string, unknown>;
}

export type LogSubscriber = (log: ConsoleLog) => void;

export interface LogFilter {
  source?: string;
  /** Event name prefix, e.g. "candidate:" */
  event?: string;
  /** Minimum level */
  level?: LogLevel;
}

export interface ScopedLogger {
  debug(event: ConsoleEvent, message: string, data?: Record<string, unknown>): void;
  info(event: ConsoleEvent, message: string, data?: Record<string, unknown>): void;
  warn(event: ConsoleEvent, message: string, data?: Record<string, unknown>): void;
  error(event: ConsoleEvent, message: string, data?: Record<string, unknown>): void;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };
const MAX_LOGS = 5000;

function matches(filter: LogFilter | undefined, log: ConsoleLog): boolean {
  if (!filter) return true;
  if (filter.source !== undefined && filter.source !== log.source) return false;
  if (filter.event !== undefined && !log.event.startsWith(filter.event)) return false;
  if (filter.level !== undefined && LEVEL_RANK[log.level] < LEVEL_RANK[filter.level]) return false;
  return true;
}

class ConsoleLogger {
  private readonly subscribers = new Map<number, { subscriber: LogSubscriber; filter?: LogFilter }>();
  private nextId = 1;
  private logs: ConsoleLog[] = [];
  private threshold: LogLevel = 'debug';

  setLevel(level: LogLevel): void {
    this.threshold = level;
  }

  log(level: LogLevel, source: string, event: ConsoleEvent, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.threshold]) return;

    const entry: ConsoleLog = { timestamp: Date.now(), level, source, event, message };
    if (data !== undefined) entry.data = data;

    this.logs.push(entry);
    if (this.logs.length > MAX_LOGS) this.logs.splice(0, this.logs.length - MAX_LOGS);

    for (const { subscriber, filter } of this.subscribers.values()) {
      if (matches(filter, entry)) subscriber(entry);
    }
  }

  scope(source: string): ScopedLogger {
    return {
      debug: (event, message, data) => this.log('debug', source, event, message, data),
      info: (event, message, data) => this.log('info', source, event, message, data),
      warn: (event, message, data) => this.log('warn', source, event, message, data),
      error: (event, message, data) => this.log('error', source, event, message, data),
    };
  }

  subscribe(subscriber: LogSubscriber, filter?: LogFilter): number {
    const id = this.nextId++;
    this.subscribers.set(id, { subscriber, filter });
    return id;
  }

  unsubscribe(id: number): void {
    this.subscribers.delete(id);
  }

  getLogs(filter?: LogFilter): ConsoleLog[] {
    return this.logs.filter(l => matches(filter, l));
  }

  /**
   * Clear all logs and subscriptions, and log everything again
   */
  reset(): void {
    this.logs = [];
    this.subscribers.clear();
    this.nextId = 1;
    this.threshold = 'debug';
  }
}

export const Logger = new ConsoleLogger();
