/**
 * PriorityMultiplexer - strict-priority arbiter for the shared output
 *
 * Channels are ordered by priority (index 0 wins). On every transmit tick
 * the highest-priority active channel holds the grant: its sample goes to
 * the output and only it sees the downstream acknowledge; every other
 * channel sees its acknowledge held low.
 *
 * A lower-priority channel that is mid-frame loses the grant as soon as a
 * higher one becomes active. Its sender keeps counting through the bytes it
 * can no longer show, so the interrupted reply is cut short on the wire.
 *
 * When the granted channel finishes a frame the output stays idle for one
 * tick before the next grant, so two frames never run together.
 */

import { Logger } from '@/core/Logger';
import type { ProtocolName } from '@/domain/network/protocol';
import { IDLE_SAMPLE, type ByteSample } from './types';

export interface MuxChannel {
  readonly name: ProtocolName;
  present(): ByteSample;
  advance(ack: boolean): void;
}

const SOURCE = 'mux';

export class PriorityMultiplexer {
  private readonly channels: readonly MuxChannel[];
  private readonly onPreempt?: (preempted: ProtocolName) => void;

  /** Channel index granted on the previous tick */
  private grant: number | null = null;
  /** Channel index granted on the current tick, between present() and advance() */
  private tickGrant: number | null = null;

  /**
   * @param channels - Highest priority first
   * @param onPreempt - Called with the channel that lost the grant mid-frame
   */
  constructor(channels: readonly MuxChannel[], onPreempt?: (preempted: ProtocolName) => void) {
    if (channels.length === 0) {
      throw new Error('PriorityMultiplexer needs at least one channel');
    }
    this.channels = channels;
    this.onPreempt = onPreempt;
  }

  /**
   * Arbitrates and returns the output sample for this tick
   */
  public present(): ByteSample {
    const samples = this.channels.map(channel => channel.present());

    if (this.grant !== null && !samples[this.grant].active) {
      // Inter-frame gap after the granted channel completes
      this.grant = null;
      this.tickGrant = null;
      return IDLE_SAMPLE;
    }

    const winner = samples.findIndex(sample => sample.active);
    const next = winner === -1 ? null : winner;

    if (this.grant !== null && next !== null && next !== this.grant) {
      const preempted = this.channels[this.grant].name;
      Logger.warn(SOURCE, 'mux:preempt', `${this.channels[next].name} preempts ${preempted} mid-frame`);
      this.onPreempt?.(preempted);
    }

    this.grant = next;
    this.tickGrant = next;
    return next === null ? IDLE_SAMPLE : samples[next];
  }

  /**
   * Routes the downstream acknowledge to the granted channel and ends the tick
   */
  public advance(ack: boolean): void {
    this.channels.forEach((channel, index) => {
      channel.advance(index === this.tickGrant ? ack : false);
    });
    this.tickGrant = null;
  }

  public getGrant(): ProtocolName | null {
    return this.grant === null ? null : this.channels[this.grant].name;
  }
}
