/**
 * ProtocolResponder - ARP and ICMP echo responders behind one byte stream
 *
 *   input ──┬─▶ ARP parser ──▶ ARP queue ──▶ ARP sender ──┐
 *           └─▶ ICMP parser ─▶ ICMP queue ─▶ ICMP sender ─┴─▶ multiplexer ─▶ output
 *
 * Receive side (`rxTick`) and transmit side (`txTick`) are clocked
 * independently and meet only at the two queues. ARP has priority on the
 * output.
 *
 * @example
 * ```typescript
 * const responder = new ProtocolResponder(createResponderConfig({ ip: '192.168.43.10' }));
 * responder.rxTick(tap.next());
 * responder.txTick(collector);
 * ```
 */

import type { ResponderConfig } from '@/config/responderConfig';
import type { ARPFrame } from '@/domain/network/entities/ARPFrame';
import type { ICMPFrame } from '@/domain/network/entities/ICMPFrame';
import { arpProtocol } from '@/domain/network/services/ARPService';
import { icmpProtocol } from '@/domain/network/services/ICMPService';
import type { Frame, FrameProtocol, Identity, ProtocolName } from '@/domain/network/protocol';
import { createResponderStore, type ResponderStore } from '@/store/responderStore';
import { FrameParser, type ParserState } from './FrameParser';
import { FrameQueue } from './FrameQueue';
import { FrameSender, type SenderState } from './FrameSender';
import { PriorityMultiplexer } from './PriorityMultiplexer';
import type { ByteSample, ByteSink } from './types';

interface Pipeline<F extends Frame> {
  parser: FrameParser<F>;
  queue: FrameQueue<F>;
  sender: FrameSender<F>;
}

export interface ProtocolResponderOptions {
  /** Statistics store; a fresh one is created when omitted */
  store?: ResponderStore;
  /** Called with every reply once its last byte has been presented */
  onReply?: (protocol: ProtocolName, reply: Uint8Array) => void;
}

export class ProtocolResponder {
  private readonly identity: Identity;
  private readonly store: ResponderStore;
  private readonly arp: Pipeline<ARPFrame>;
  private readonly icmp: Pipeline<ICMPFrame>;
  private readonly mux: PriorityMultiplexer;
  private readonly onReply?: (protocol: ProtocolName, reply: Uint8Array) => void;

  constructor(config: ResponderConfig, options: ProtocolResponderOptions = {}) {
    this.identity = config.identity;
    this.store = options.store ?? createResponderStore();
    this.onReply = options.onReply;

    this.arp = this.createPipeline(arpProtocol, config.queueCapacity);
    this.icmp = this.createPipeline(icmpProtocol, config.queueCapacity);

    this.mux = new PriorityMultiplexer(
      [this.arp.sender, this.icmp.sender],
      preempted => this.store.getState().recordPreemption(preempted)
    );
  }

  /**
   * One receive-clock tick: both parsers see the same sample
   */
  public rxTick(sample: ByteSample | undefined): void {
    this.arp.parser.step(sample);
    this.icmp.parser.step(sample);
  }

  /**
   * One transmit-clock tick: present the arbitrated sample downstream, then
   * advance the senders with its acknowledge. Returns the presented sample.
   */
  public txTick(sink: ByteSink): ByteSample {
    const sample = this.mux.present();
    const ack = sink.accept(sample);
    this.mux.advance(ack);
    return sample;
  }

  /**
   * Nothing half-received, queued or in flight
   */
  public isQuiet(): boolean {
    return [this.arp, this.icmp].every(
      ({ parser, queue, sender }) =>
        parser.getState() === 'IDLE' && queue.isEmpty() && !sender.isActive()
    );
  }

  public getIdentity(): Identity {
    return this.identity;
  }

  public getStore(): ResponderStore {
    return this.store;
  }

  public getParserState(protocol: ProtocolName): ParserState {
    return this.pipeline(protocol).parser.getState();
  }

  public getSenderState(protocol: ProtocolName): SenderState {
    return this.pipeline(protocol).sender.getState();
  }

  public getQueueSize(protocol: ProtocolName): number {
    return this.pipeline(protocol).queue.size();
  }

  public getGrant(): ProtocolName | null {
    return this.mux.getGrant();
  }

  private pipeline(protocol: ProtocolName): Pipeline<ARPFrame> | Pipeline<ICMPFrame> {
    return protocol === 'arp' ? this.arp : this.icmp;
  }

  private createPipeline<F extends Frame>(protocol: FrameProtocol<F>, capacity: number): Pipeline<F> {
    const name = protocol.name;
    const stats = () => this.store.getState();

    const queue = new FrameQueue<F>(`${name}-queue`, capacity, () => stats().recordQueueDrop(name));

    const parser = new FrameParser(protocol, this.identity, queue, {
      onAccepted: () => stats().recordAccepted(name),
      onRejected: reason => stats().recordRejected(name, reason),
      onTruncated: () => stats().recordTruncated(name),
    });

    const sender = new FrameSender(protocol, this.identity, queue, {
      onReplyStarted: () => stats().recordReplyStarted(name),
      onReplyCompleted: reply => {
        stats().recordReplyCompleted(name);
        this.onReply?.(name, reply);
      },
    });

    return { parser, queue, sender };
  }
}
