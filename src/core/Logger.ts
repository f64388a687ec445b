/**
 * Logger - Pub/Sub event log for the responder pipeline
 *
 * Every component (parsers, queues, senders, the multiplexer, host stand-ins)
 * publishes what happens to the frames it handles: accepted, rejected,
 * truncated, dropped, sent. Nothing on the data path reports errors to a
 * caller, so this log and the statistics store are the only place a dropped
 * frame leaves a trace. Subscribers can listen to everything or filter by
 * source, event prefix or level.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ResponderLog {
  timestamp: number;
  level: LogLevel;
  source: string;        // component ID (e.g. "arp-parser", "mux", "tap-host")
  event: string;         // namespaced event (e.g. "parser:rejected", "queue:drop")
  message: string;
  data?: Record<string, unknown>;
}

export type LogSubscriber = (log: ResponderLog) => void;

export interface LogFilter {
  source?: string;
  /** Matches events starting with this prefix, so "parser" catches "parser:*" */
  event?: string;
  level?: LogLevel;
}

interface Subscription {
  id: number;
  subscriber: LogSubscriber;
  filter?: LogFilter;
}

class LoggerSingleton {
  private subscriptions: Subscription[] = [];
  private nextId = 1;
  private logs: ResponderLog[] = [];
  private maxLogs = 10000;

  log(level: LogLevel, source: string, event: string, message: string, data?: Record<string, unknown>): void {
    const entry: ResponderLog = {
      timestamp: Date.now(),
      level,
      source,
      event,
      message,
      data,
    };

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs / 2);
    }

    for (const sub of this.subscriptions) {
      if (sub.filter) {
        if (sub.filter.source && sub.filter.source !== source) continue;
        if (sub.filter.event && !event.startsWith(sub.filter.event)) continue;
        if (sub.filter.level && sub.filter.level !== level) continue;
      }
      sub.subscriber(entry);
    }
  }

  debug(source: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log('debug', source, event, message, data);
  }

  info(source: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', source, event, message, data);
  }

  warn(source: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', source, event, message, data);
  }

  error(source: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', source, event, message, data);
  }

  /**
   * Subscribe to log events with optional filter; returns the subscription ID
   */
  subscribe(subscriber: LogSubscriber, filter?: LogFilter): number {
    const id = this.nextId++;
    this.subscriptions.push({ id, subscriber, filter });
    return id;
  }

  unsubscribe(id: number): void {
    this.subscriptions = this.subscriptions.filter(s => s.id !== id);
  }

  getLogs(): ResponderLog[] {
    return [...this.logs];
  }

  getLogsBySource(source: string): ResponderLog[] {
    return this.logs.filter(l => l.source === source);
  }

  /**
   * Clear all logs and subscriptions
   */
  reset(): void {
    this.logs = [];
    this.subscriptions = [];
    this.nextId = 1;
  }
}

export const Logger = new LoggerSingleton();
