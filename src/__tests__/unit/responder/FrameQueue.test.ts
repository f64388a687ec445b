/**
 * Unit tests for FrameQueue
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { FrameQueue } from '@/domain/responder/FrameQueue';
import { Logger } from '@/core/Logger';

describe('FrameQueue', () => {
  beforeEach(() => {
    Logger.reset();
  });

  it('should default to a capacity of 16', () => {
    expect(new FrameQueue<string>('q').getCapacity()).toBe(16);
  });

  it('should reject an invalid capacity', () => {
    expect(() => new FrameQueue<string>('q', 0)).toThrow('Invalid queue capacity: 0');
    expect(() => new FrameQueue<string>('q', 1.5)).toThrow('Invalid queue capacity: 1.5');
  });

  it('should hand frames out in arrival order', () => {
    const queue = new FrameQueue<string>('q', 4);
    queue.enqueue('a');
    queue.enqueue('b');
    queue.enqueue('c');

    expect(queue.peek()).toBe('a');
    expect([queue.dequeue(), queue.dequeue(), queue.dequeue()]).toEqual(['a', 'b', 'c']);
    expect(queue.dequeue()).toBeUndefined();
    expect(queue.isEmpty()).toBe(true);
  });

  it('should keep order across the ring wrap-around', () => {
    const queue = new FrameQueue<number>('q', 2);
    queue.enqueue(1);
    queue.enqueue(2);
    queue.dequeue();
    queue.enqueue(3);

    expect(queue.isFull()).toBe(true);
    expect([queue.dequeue(), queue.dequeue()]).toEqual([2, 3]);
  });

  describe('overflow', () => {
    it('should drop exactly the frames that do not fit', () => {
      const onDrop = vi.fn();
      const queue = new FrameQueue<string>('arp-queue', 2, onDrop);

      const accepted = ['a', 'b', 'c', 'd'].map(frame => queue.enqueue(frame));

      expect(accepted).toEqual([true, true, false, false]);
      expect(queue.getDropCount()).toBe(2);
      expect(onDrop).toHaveBeenCalledTimes(2);
      expect(onDrop).toHaveBeenNthCalledWith(1, 'c');
      expect(onDrop).toHaveBeenNthCalledWith(2, 'd');
      expect([queue.dequeue(), queue.dequeue()]).toEqual(['a', 'b']);
    });

    it('should log each drop under the queue id', () => {
      const queue = new FrameQueue<string>('icmp-queue', 1);
      queue.enqueue('a');
      queue.enqueue('b');

      const logs = Logger.getLogsBySource('icmp-queue');
      expect(logs).toHaveLength(1);
      expect(logs[0].level).toBe('warn');
      expect(logs[0].event).toBe('queue:drop');
      expect(logs[0].message).toBe('Queue full (1), frame dropped');
      expect(logs[0].data).toEqual({ dropped: 1 });
    });

    it('should accept again once the consumer catches up', () => {
      const queue = new FrameQueue<string>('q', 1);
      queue.enqueue('a');
      queue.enqueue('b');
      queue.dequeue();

      expect(queue.enqueue('c')).toBe(true);
      expect(queue.size()).toBe(1);
    });
  });
});
