/**
 * FrameSender - serializes replies onto the output byte stream
 *
 * One instance per protocol, driven by the transmit clock:
 *
 *   IDLE ──frame queued──▶ WAIT_ACK ──ack──▶ SENDING ──last byte──▶ IDLE
 *
 * - IDLE: output inactive. A queued request is latched and its reply built
 *   once.
 * - WAIT_ACK: output active with reply byte 0 until the downstream
 *   acknowledges it. There is no timeout; a downstream that never
 *   acknowledges stalls the sender here.
 * - SENDING: one byte per tick, in order, until the reply is exhausted.
 *
 * Each tick is split in two so the multiplexer can look at every sender's
 * output before routing the acknowledge: `present()` then `advance(ack)`.
 */

import { Logger } from '@/core/Logger';
import type { Frame, FrameProtocol, Identity, ProtocolName } from '@/domain/network/protocol';
import { IDLE_SAMPLE, type ByteSample, type FrameSource } from './types';

export type SenderState = 'IDLE' | 'WAIT_ACK' | 'SENDING';

export interface FrameSenderHooks {
  onReplyStarted?: () => void;
  onReplyCompleted?: (reply: Uint8Array) => void;
}

export class FrameSender<F extends Frame> {
  public readonly name: ProtocolName;
  private readonly id: string;
  private readonly protocol: FrameProtocol<F>;
  private readonly identity: Identity;
  private readonly source: FrameSource<F>;
  private readonly hooks: FrameSenderHooks;

  private state: SenderState = 'IDLE';
  private reply: Uint8Array | null = null;
  private byteIndex = 0;

  constructor(
    protocol: FrameProtocol<F>,
    identity: Identity,
    source: FrameSource<F>,
    hooks: FrameSenderHooks = {}
  ) {
    this.name = protocol.name;
    this.id = `${protocol.name}-sender`;
    this.protocol = protocol;
    this.identity = identity;
    this.source = source;
    this.hooks = hooks;
  }

  /**
   * Output for the current tick
   */
  public present(): ByteSample {
    if (this.state === 'IDLE' || !this.reply) {
      return IDLE_SAMPLE;
    }
    return { data: this.reply[this.byteIndex], active: true };
  }

  /**
   * Ends the current tick with the acknowledge routed to this sender
   */
  public advance(ack: boolean): void {
    switch (this.state) {
      case 'IDLE': {
        const request = this.source.dequeue();
        if (request) {
          this.reply = this.protocol.buildReply(request, this.identity).toBytes();
          this.byteIndex = 0;
          this.state = 'WAIT_ACK';
          Logger.debug(this.id, 'sender:latched', `Reply of ${this.reply.length} bytes ready`);
        }
        break;
      }

      case 'WAIT_ACK':
        if (ack) {
          this.state = 'SENDING';
          Logger.debug(this.id, 'sender:start', 'Downstream acknowledged start of reply');
          this.hooks.onReplyStarted?.();
          this.nextByte();
        }
        break;

      case 'SENDING':
        this.nextByte();
        break;
    }
  }

  public isActive(): boolean {
    return this.state !== 'IDLE';
  }

  public getState(): SenderState {
    return this.state;
  }

  public getByteIndex(): number {
    return this.byteIndex;
  }

  private nextByte(): void {
    if (!this.reply) {
      return;
    }

    this.byteIndex++;
    if (this.byteIndex === this.reply.length) {
      const reply = this.reply;
      this.reply = null;
      this.byteIndex = 0;
      this.state = 'IDLE';
      Logger.info(this.id, 'sender:complete', `Reply of ${reply.length} bytes sent`);
      this.hooks.onReplyCompleted?.(reply);
    }
  }
}
