/**
 * Responder Store - per-protocol counters for the responder pipeline
 *
 * Every silent drop (framing, validation, queue overflow) and every reply is
 * counted here. Built on the vanilla zustand store so it can be read from
 * plain Node code (`getState()`, `subscribe`) without a UI binding.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import {
  ValidationResult,
  type ProtocolName,
  type RejectionReason
} from '@/domain/network/protocol';

export interface ProtocolCounters {
  framesAccepted: number;
  framesTruncated: number;
  rejections: Record<RejectionReason, number>;
  queueDrops: number;
  repliesStarted: number;
  repliesCompleted: number;
  preemptions: number;
}

export interface ResponderState {
  protocols: Record<ProtocolName, ProtocolCounters>;

  // Actions
  recordAccepted: (protocol: ProtocolName) => void;
  recordTruncated: (protocol: ProtocolName) => void;
  recordRejected: (protocol: ProtocolName, reason: RejectionReason) => void;
  recordQueueDrop: (protocol: ProtocolName) => void;
  recordReplyStarted: (protocol: ProtocolName) => void;
  recordReplyCompleted: (protocol: ProtocolName) => void;
  recordPreemption: (protocol: ProtocolName) => void;
  reset: () => void;
}

export type ResponderStore = StoreApi<ResponderState>;

function emptyCounters(): ProtocolCounters {
  return {
    framesAccepted: 0,
    framesTruncated: 0,
    rejections: {
      [ValidationResult.NOT_FOR_US]: 0,
      [ValidationResult.ECHO_OF_SELF]: 0,
      [ValidationResult.WRONG_ETHER_TYPE]: 0,
      [ValidationResult.WRONG_HW_TYPE]: 0,
      [ValidationResult.WRONG_PROTO_TYPE]: 0,
      [ValidationResult.WRONG_HW_LEN]: 0,
      [ValidationResult.WRONG_PROTO_LEN]: 0,
      [ValidationResult.WRONG_OPCODE]: 0,
      [ValidationResult.NOT_OUR_ADDRESS]: 0,
    },
    queueDrops: 0,
    repliesStarted: 0,
    repliesCompleted: 0,
    preemptions: 0,
  };
}

function initialProtocols(): Record<ProtocolName, ProtocolCounters> {
  return { arp: emptyCounters(), icmp: emptyCounters() };
}

export function createResponderStore(): ResponderStore {
  return createStore<ResponderState>()((set) => {
    const bump = (
      protocol: ProtocolName,
      update: (counters: ProtocolCounters) => Partial<ProtocolCounters>
    ) =>
      set(state => ({
        protocols: {
          ...state.protocols,
          [protocol]: { ...state.protocols[protocol], ...update(state.protocols[protocol]) },
        },
      }));

    return {
      protocols: initialProtocols(),

      recordAccepted: (protocol) => bump(protocol, c => ({ framesAccepted: c.framesAccepted + 1 })),
      recordTruncated: (protocol) => bump(protocol, c => ({ framesTruncated: c.framesTruncated + 1 })),
      recordRejected: (protocol, reason) =>
        bump(protocol, c => ({ rejections: { ...c.rejections, [reason]: c.rejections[reason] + 1 } })),
      recordQueueDrop: (protocol) => bump(protocol, c => ({ queueDrops: c.queueDrops + 1 })),
      recordReplyStarted: (protocol) => bump(protocol, c => ({ repliesStarted: c.repliesStarted + 1 })),
      recordReplyCompleted: (protocol) => bump(protocol, c => ({ repliesCompleted: c.repliesCompleted + 1 })),
      recordPreemption: (protocol) => bump(protocol, c => ({ preemptions: c.preemptions + 1 })),
      reset: () => set({ protocols: initialProtocols() }),
    };
  });
}
