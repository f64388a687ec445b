/**
 * FrameCollector - in-process stand-in for the host's receive mailbox
 *
 * Sits downstream of the responder output. A new frame (rising `active`) is
 * acknowledged after `ackDelayTicks` ticks; `Infinity` never acknowledges,
 * which leaves the granted sender stalled. Once a frame is acknowledged every
 * active byte is captured, and the frame is closed on the falling edge.
 * Completed frames wait in a mailbox until pulled.
 */

import { Logger } from '@/core/Logger';
import type { ByteSample, ByteSink } from '@/domain/responder/types';
import { formatHexDump } from './hexdump';

export interface FrameCollectorOptions {
  /** Ticks a frame start is held before it is acknowledged (default 0) */
  ackDelayTicks?: number;
}

export type FrameListener = (frame: Uint8Array) => void;

const SOURCE = 'tap-host';

export class FrameCollector implements ByteSink {
  private readonly ackDelayTicks: number;
  private readonly listeners = new Set<FrameListener>();
  private readonly mailbox: Uint8Array[] = [];
  private current: number[] | null = null;
  private waited = 0;
  private acknowledged = 0;

  constructor(options: FrameCollectorOptions = {}) {
    const delay = options.ackDelayTicks ?? 0;
    if (delay < 0 || (!Number.isInteger(delay) && delay !== Infinity)) {
      throw new Error(`Invalid acknowledge delay: ${delay}`);
    }
    this.ackDelayTicks = delay;
  }

  /**
   * Registers a listener for completed frames; returns its unsubscribe function
   */
  public onFrame(listener: FrameListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  public accept(sample: ByteSample): boolean {
    if (!sample.active) {
      this.waited = 0;
      if (this.current) {
        this.close();
      }
      return false;
    }

    if (this.current) {
      this.current.push(sample.data);
      this.acknowledged++;
      return true;
    }

    if (this.waited < this.ackDelayTicks) {
      this.waited++;
      return false;
    }

    this.waited = 0;
    this.current = [sample.data];
    this.acknowledged++;
    return true;
  }

  /**
   * Number of completed frames waiting in the mailbox
   */
  public pending(): number {
    return this.mailbox.length;
  }

  /**
   * Removes and returns the oldest completed frame
   */
  public pull(): Uint8Array | undefined {
    return this.mailbox.shift();
  }

  public pullAll(): Uint8Array[] {
    return this.mailbox.splice(0, this.mailbox.length);
  }

  /**
   * Bytes acknowledged since construction
   */
  public getAcknowledgedCount(): number {
    return this.acknowledged;
  }

  public isReceiving(): boolean {
    return this.current !== null;
  }

  private close(): void {
    if (!this.current) {
      return;
    }

    const frame = Uint8Array.from(this.current);
    this.current = null;
    this.mailbox.push(frame);
    Logger.debug(SOURCE, 'host:frame-out', `send packet - sz=${frame.length}\n${formatHexDump(frame)}`, {
      length: frame.length,
    });
    this.listeners.forEach(listener => listener(frame));
  }
}
