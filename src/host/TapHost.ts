/**
 * TapHost - in-process stand-in for the TAP device side of the host loop
 *
 * Frames read from the (virtual) network are injected whole and played out
 * to the responder one byte per receive tick, `active` high for the frame's
 * bytes and low for `gapTicks` samples after each frame. When nothing is
 * queued the source reports no byte at all.
 *
 * @example
 * ```typescript
 * const tap = new TapHost({ gapTicks: 4 });
 * tap.inject(request.toBytes());
 * responder.rxTick(tap.next());
 * ```
 */

import { Logger } from '@/core/Logger';
import type { ByteSample, ByteSource } from '@/domain/responder/types';
import { formatHexDump } from './hexdump';

export interface TapHostOptions {
  /** Inactive samples emitted after each frame (default 2) */
  gapTicks?: number;
}

const SOURCE = 'tap-host';

export class TapHost implements ByteSource {
  private readonly gapTicks: number;
  private readonly frames: Uint8Array[] = [];
  private current: Uint8Array | null = null;
  private position = 0;
  private gapRemaining = 0;
  private injected = 0;

  constructor(options: TapHostOptions = {}) {
    const gapTicks = options.gapTicks ?? 2;
    if (!Number.isInteger(gapTicks) || gapTicks < 1) {
      throw new Error(`Invalid gap: ${gapTicks} (at least one idle sample must separate frames)`);
    }
    this.gapTicks = gapTicks;
  }

  /**
   * Queues a frame for transfer to the responder
   */
  public inject(frame: Uint8Array): void {
    if (frame.length === 0) {
      Logger.warn(SOURCE, 'host:bad-frame', 'Ignoring empty frame');
      return;
    }

    this.injected++;
    this.frames.push(Uint8Array.from(frame));
    Logger.debug(SOURCE, 'host:inject', `TAP-RD: nbytes=${frame.length}\n${formatHexDump(frame)}`, {
      length: frame.length,
    });
  }

  public next(): ByteSample | undefined {
    if (this.current) {
      const data = this.current[this.position++];
      if (this.position === this.current.length) {
        this.current = null;
        this.position = 0;
        this.gapRemaining = this.gapTicks;
      }
      return { data, active: true };
    }

    if (this.gapRemaining > 0) {
      this.gapRemaining--;
      return { data: 0, active: false };
    }

    const frame = this.frames.shift();
    if (!frame) {
      return undefined;
    }

    this.current = frame;
    this.position = 0;
    return this.next();
  }

  /**
   * Every injected byte (and trailing gap) has been played out
   */
  public isDrained(): boolean {
    return this.current === null && this.gapRemaining === 0 && this.frames.length === 0;
  }

  public getInjectedCount(): number {
    return this.injected;
  }
}
