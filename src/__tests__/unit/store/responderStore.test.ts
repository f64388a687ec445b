/**
 * Unit tests for the responder statistics store
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createResponderStore, type ResponderStore } from '@/store/responderStore';

describe('responderStore', () => {
  let store: ResponderStore;

  beforeEach(() => {
    store = createResponderStore();
  });

  it('should start with every counter at zero', () => {
    const { arp, icmp } = store.getState().protocols;

    expect(arp.framesAccepted).toBe(0);
    expect(icmp.repliesCompleted).toBe(0);
    expect(Object.values(arp.rejections).every(count => count === 0)).toBe(true);
    expect(Object.keys(icmp.rejections)).toHaveLength(9);
  });

  it('should count per protocol', () => {
    store.getState().recordAccepted('arp');
    store.getState().recordAccepted('arp');
    store.getState().recordTruncated('icmp');
    store.getState().recordQueueDrop('icmp');
    store.getState().recordPreemption('icmp');

    const { arp, icmp } = store.getState().protocols;
    expect(arp.framesAccepted).toBe(2);
    expect(icmp.framesAccepted).toBe(0);
    expect(icmp.framesTruncated).toBe(1);
    expect(icmp.queueDrops).toBe(1);
    expect(icmp.preemptions).toBe(1);
  });

  it('should count rejections by reason', () => {
    store.getState().recordRejected('arp', 'not-our-address');
    store.getState().recordRejected('arp', 'not-our-address');
    store.getState().recordRejected('arp', 'wrong-opcode');

    const { rejections } = store.getState().protocols.arp;
    expect(rejections['not-our-address']).toBe(2);
    expect(rejections['wrong-opcode']).toBe(1);
    expect(rejections['not-for-us']).toBe(0);
    expect(store.getState().protocols.icmp.rejections['not-our-address']).toBe(0);
  });

  it('should track started and completed replies separately', () => {
    store.getState().recordReplyStarted('icmp');

    expect(store.getState().protocols.icmp.repliesStarted).toBe(1);
    expect(store.getState().protocols.icmp.repliesCompleted).toBe(0);

    store.getState().recordReplyCompleted('icmp');
    expect(store.getState().protocols.icmp.repliesCompleted).toBe(1);
  });

  it('should notify subscribers', () => {
    const listener = vi.fn();
    store.subscribe(listener);

    store.getState().recordAccepted('icmp');

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('should reset all counters', () => {
    store.getState().recordAccepted('arp');
    store.getState().recordRejected('icmp', 'wrong-proto-len');
    store.getState().reset();

    expect(store.getState().protocols.arp.framesAccepted).toBe(0);
    expect(store.getState().protocols.icmp.rejections['wrong-proto-len']).toBe(0);
  });

  it('should keep separate state per store', () => {
    const other = createResponderStore();
    store.getState().recordAccepted('arp');

    expect(other.getState().protocols.arp.framesAccepted).toBe(0);
  });
});
