/**
 * Unit tests for the responder Logger
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Logger } from '@/core/Logger';

describe('Logger', () => {
  beforeEach(() => {
    Logger.reset();
  });

  it('should record entries with their level', () => {
    Logger.info('arp-parser', 'parser:accepted', 'ok');
    Logger.warn('mux', 'mux:preempt', 'arp preempts icmp mid-frame', { slot: 1 });

    const logs = Logger.getLogs();
    expect(logs.map(log => [log.level, log.source, log.event])).toEqual([
      ['info', 'arp-parser', 'parser:accepted'],
      ['warn', 'mux', 'mux:preempt']
    ]);
    expect(logs[1].data).toEqual({ slot: 1 });
  });

  it('should filter subscribers by event prefix', () => {
    const subscriber = vi.fn();
    Logger.subscribe(subscriber, { event: 'parser' });

    Logger.debug('icmp-parser', 'parser:truncated', 'short');
    Logger.warn('icmp-queue', 'queue:drop', 'full');

    expect(subscriber).toHaveBeenCalledTimes(1);
    expect(subscriber.mock.calls[0][0].event).toBe('parser:truncated');
  });

  it('should filter subscribers by source and level', () => {
    const bySource = vi.fn();
    const byLevel = vi.fn();
    Logger.subscribe(bySource, { source: 'mux' });
    Logger.subscribe(byLevel, { level: 'error' });

    Logger.warn('mux', 'mux:preempt', 'preempted');
    Logger.error('tap-host', 'host:failure', 'gone');

    expect(bySource).toHaveBeenCalledTimes(1);
    expect(byLevel).toHaveBeenCalledTimes(1);
    expect(byLevel.mock.calls[0][0].source).toBe('tap-host');
  });

  it('should stop delivering after unsubscribe', () => {
    const subscriber = vi.fn();
    const id = Logger.subscribe(subscriber);

    Logger.info('mux', 'a', 'first');
    Logger.unsubscribe(id);
    Logger.info('mux', 'b', 'second');

    expect(subscriber).toHaveBeenCalledTimes(1);
  });

  it('should return logs by source', () => {
    Logger.info('arp-sender', 'sender:complete', 'sent');
    Logger.info('icmp-sender', 'sender:complete', 'sent');

    expect(Logger.getLogsBySource('icmp-sender')).toHaveLength(1);
  });

  it('should clear logs and subscriptions on reset', () => {
    const subscriber = vi.fn();
    Logger.subscribe(subscriber);
    Logger.info('mux', 'a', 'first');

    Logger.reset();
    Logger.info('mux', 'b', 'second');

    expect(subscriber).toHaveBeenCalledTimes(1);
    expect(Logger.getLogs()).toHaveLength(1);
  });
});
