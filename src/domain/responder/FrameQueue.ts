/**
 * FrameQueue - bounded FIFO between the receive and transmit contexts
 *
 * Single producer (a parser) and single consumer (a sender). Frames move as
 * whole immutable values, so the consumer can never see a partial frame.
 * A full queue does not block the producer: the offered frame is dropped.
 *
 * @example
 * ```typescript
 * const queue = new FrameQueue<ARPFrame>('arp-queue', 16);
 * queue.enqueue(frame);   // false when full
 * queue.dequeue();        // undefined when empty
 * ```
 */

import { Logger } from '@/core/Logger';
import type { FrameSink, FrameSource } from './types';

export const DEFAULT_QUEUE_CAPACITY = 16;

export class FrameQueue<F> implements FrameSink<F>, FrameSource<F> {
  private readonly id: string;
  private readonly capacity: number;
  private readonly slots: Array<F | undefined>;
  private head = 0;
  private count = 0;
  private dropped = 0;
  private readonly onDrop?: (frame: F) => void;

  /**
   * @param id - Component ID used as log source
   * @param capacity - Maximum number of resident frames
   * @param onDrop - Called with each frame refused because the queue is full
   * @throws {Error} If capacity is not a positive integer
   */
  constructor(id: string, capacity: number = DEFAULT_QUEUE_CAPACITY, onDrop?: (frame: F) => void) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Invalid queue capacity: ${capacity}`);
    }

    this.id = id;
    this.capacity = capacity;
    this.slots = new Array<F | undefined>(capacity).fill(undefined);
    this.onDrop = onDrop;
  }

  public enqueue(frame: F): boolean {
    if (this.isFull()) {
      this.dropped++;
      Logger.warn(this.id, 'queue:drop', `Queue full (${this.capacity}), frame dropped`, {
        dropped: this.dropped,
      });
      this.onDrop?.(frame);
      return false;
    }

    this.slots[(this.head + this.count) % this.capacity] = frame;
    this.count++;
    return true;
  }

  public dequeue(): F | undefined {
    if (this.isEmpty()) {
      return undefined;
    }

    const frame = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    return frame;
  }

  public peek(): F | undefined {
    return this.isEmpty() ? undefined : this.slots[this.head];
  }

  public isEmpty(): boolean {
    return this.count === 0;
  }

  public isFull(): boolean {
    return this.count === this.capacity;
  }

  public size(): number {
    return this.count;
  }

  public getCapacity(): number {
    return this.capacity;
  }

  /**
   * Frames refused since construction
   */
  public getDropCount(): number {
    return this.dropped;
  }
}
