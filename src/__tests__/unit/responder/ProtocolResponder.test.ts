/**
 * Unit tests for ProtocolResponder, driven tick by tick
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ProtocolResponder } from '@/domain/responder/ProtocolResponder';
import { createResponderConfig } from '@/config/responderConfig';
import { buildARPReply } from '@/domain/network/services/ARPService';
import { FrameCollector } from '@/host/FrameCollector';
import { Logger } from '@/core/Logger';
import { INACTIVE, activeSamples, arpRequest, identity } from '../../helpers/frames';

describe('ProtocolResponder', () => {
  let responder: ProtocolResponder;
  let collector: FrameCollector;
  const onReply = vi.fn();

  const receive = (bytes: Uint8Array) => {
    for (const sample of [...activeSamples(bytes), INACTIVE]) {
      responder.rxTick(sample);
    }
  };

  beforeEach(() => {
    Logger.reset();
    vi.clearAllMocks();
    responder = new ProtocolResponder(createResponderConfig(), { onReply });
    collector = new FrameCollector();
  });

  it('should expose the configured identity', () => {
    expect(responder.getIdentity().mac.equals(identity.mac)).toBe(true);
    expect(responder.getIdentity().ip.equals(identity.ip)).toBe(true);
    expect(responder.isQuiet()).toBe(true);
  });

  it('should feed every sample to both parsers', () => {
    receive(arpRequest().toBytes());

    expect(responder.getQueueSize('arp')).toBe(1);
    expect(responder.getQueueSize('icmp')).toBe(0);

    const stats = responder.getStore().getState().protocols;
    expect(stats.arp.framesAccepted).toBe(1);
    expect(stats.icmp.framesTruncated).toBe(1);
  });

  it('should ignore receive ticks without a byte', () => {
    responder.rxTick(undefined);

    expect(responder.getParserState('arp')).toBe('IDLE');
    expect(responder.getParserState('icmp')).toBe('IDLE');
  });

  it('should transmit the reply on the transmit ticks', () => {
    receive(arpRequest().toBytes());
    const expected = Array.from(buildARPReply(arpRequest(), identity).toBytes());

    const first = responder.txTick(collector);
    expect(first.active).toBe(false);
    expect(responder.getSenderState('arp')).toBe('WAIT_ACK');

    const second = responder.txTick(collector);
    expect(second).toEqual({ data: 0xaa, active: true });
    expect(responder.getGrant()).toBe('arp');

    for (let i = 0; i < 41; i++) {
      responder.txTick(collector);
    }
    expect(collector.isReceiving()).toBe(true);
    expect(onReply).toHaveBeenCalledTimes(1);
    expect(onReply.mock.calls[0][0]).toBe('arp');

    responder.txTick(collector);
    expect(collector.pending()).toBe(1);
    expect(Array.from(collector.pull() ?? [])).toEqual(expected);
    expect(responder.isQuiet()).toBe(true);

    const stats = responder.getStore().getState().protocols.arp;
    expect(stats.repliesStarted).toBe(1);
    expect(stats.repliesCompleted).toBe(1);
  });

  it('should drop requests that find the queue full', () => {
    responder = new ProtocolResponder(createResponderConfig({ queueCapacity: 1 }));

    receive(arpRequest().toBytes());
    receive(arpRequest().toBytes());
    receive(arpRequest().toBytes());

    expect(responder.getQueueSize('arp')).toBe(1);
    expect(responder.getStore().getState().protocols.arp.queueDrops).toBe(2);
    expect(responder.isQuiet()).toBe(false);
  });
});
