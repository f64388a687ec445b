/**
 * FrameParser - assembles fixed-length frames from the input byte stream
 *
 * One instance per protocol; every instance is fed the same samples.
 *
 *   IDLE ──rising edge──▶ RECEIVING ──frame full──▶ CHECK ──▶ IDLE
 *                             │
 *                             └──falling edge (echo only)──▶ IDLE
 *
 * IDLE only leaves on a rising edge of `active`, so bytes beyond the frame
 * length (padding, longer frames of another protocol) are skipped until the
 * next start of frame.
 *
 * The ARP parser does not abort on an early falling edge: inactive samples
 * are ignored and the next active bytes keep filling the buffer, so a short
 * frame is completed by the start of the one after it. This mirrors the
 * receive logic this responder reproduces; see `abortsOnEarlyFrameEnd`.
 */

import { Logger } from '@/core/Logger';
import type { Frame, FrameProtocol, Identity, RejectionReason } from '@/domain/network/protocol';
import { ValidationResult } from '@/domain/network/protocol';
import type { ByteSample, FrameSink } from './types';

export type ParserState = 'IDLE' | 'RECEIVING' | 'CHECK';

export interface FrameParserHooks {
  onAccepted?: () => void;
  onRejected?: (reason: RejectionReason) => void;
  onTruncated?: () => void;
}

export class FrameParser<F extends Frame> {
  private readonly id: string;
  private readonly protocol: FrameProtocol<F>;
  private readonly identity: Identity;
  private readonly sink: FrameSink<F>;
  private readonly hooks: FrameParserHooks;

  private state: ParserState = 'IDLE';
  private readonly buffer: Uint8Array;
  private byteCount = 0;
  private previousActive = false;

  constructor(
    protocol: FrameProtocol<F>,
    identity: Identity,
    sink: FrameSink<F>,
    hooks: FrameParserHooks = {}
  ) {
    this.id = `${protocol.name}-parser`;
    this.protocol = protocol;
    this.identity = identity;
    this.sink = sink;
    this.hooks = hooks;
    this.buffer = new Uint8Array(protocol.frameLength);
  }

  /**
   * Advances one receive tick. Returns the frame emitted to the sink on
   * this tick, if any.
   */
  public step(sample: ByteSample | undefined): F | undefined {
    if (this.state === 'CHECK') {
      // The check takes its own tick; a byte arriving now is not stored
      if (sample) {
        this.previousActive = sample.active;
      }
      return this.check();
    }

    if (!sample) {
      return undefined;
    }

    const risingEdge = sample.active && !this.previousActive;
    const fallingEdge = !sample.active && this.previousActive;
    this.previousActive = sample.active;

    switch (this.state) {
      case 'IDLE':
        if (risingEdge) {
          this.buffer[0] = sample.data;
          this.byteCount = 1;
          this.state = 'RECEIVING';
          this.completeIfFull();
        }
        break;

      case 'RECEIVING':
        if (sample.active) {
          this.buffer[this.byteCount++] = sample.data;
          this.completeIfFull();
        } else if (fallingEdge && this.protocol.abortsOnEarlyFrameEnd) {
          Logger.debug(this.id, 'parser:truncated', `Frame ended after ${this.byteCount} of ${this.protocol.frameLength} bytes`);
          this.hooks.onTruncated?.();
          this.reset();
        }
        break;
    }

    return undefined;
  }

  public getState(): ParserState {
    return this.state;
  }

  public getByteCount(): number {
    return this.byteCount;
  }

  private completeIfFull(): void {
    if (this.byteCount === this.protocol.frameLength) {
      this.state = 'CHECK';
    }
  }

  private check(): F | undefined {
    const candidate = this.protocol.decode(this.buffer);
    const result = this.protocol.validate(candidate, this.protocol.template, this.identity);
    this.reset();

    if (result !== ValidationResult.VALID) {
      Logger.debug(this.id, 'parser:rejected', `Frame rejected: ${result}`, { reason: result });
      this.hooks.onRejected?.(result);
      return undefined;
    }

    Logger.info(this.id, 'parser:accepted', candidate.toString());
    this.hooks.onAccepted?.();
    this.sink.enqueue(candidate);
    return candidate;
  }

  private reset(): void {
    this.state = 'IDLE';
    this.byteCount = 0;
  }
}
