/**
 * Unit tests for ARPFrame entity
 */

import { describe, it, expect } from 'vitest';
import { ARPFrame, ARPOpcode } from '@/domain/network/entities/ARPFrame';
import { MACAddress } from '@/domain/network/value-objects/MACAddress';
import { LOCAL_IP, PEER_IP, PEER_MAC, arpRequest } from '../../helpers/frames';

describe('ARPFrame', () => {
  describe('create', () => {
    it('should lay out a 42-byte request', () => {
      const bytes = arpRequest().toBytes();

      expect(bytes.length).toBe(42);
      expect(Array.from(bytes.subarray(0, 6))).toEqual([0xff, 0xff, 0xff, 0xff, 0xff, 0xff]);
      expect(Array.from(bytes.subarray(6, 12))).toEqual([0xaa, 0xbb, 0xcc, 0xdd, 0xee, 0xff]);
      // EtherType, htype, ptype, hlen, plen, opcode
      expect(Array.from(bytes.subarray(12, 22))).toEqual([
        0x08, 0x06, 0x00, 0x01, 0x08, 0x00, 0x06, 0x04, 0x00, 0x01
      ]);
      expect(Array.from(bytes.subarray(28, 32))).toEqual([192, 168, 43, 1]);
      expect(Array.from(bytes.subarray(32, 38))).toEqual([0, 0, 0, 0, 0, 0]);
      expect(Array.from(bytes.subarray(38, 42))).toEqual([192, 168, 43, 10]);
    });

    it('should honour overridden static fields', () => {
      const frame = arpRequest({ hardwareType: 6, protocolLength: 16 });

      expect(frame.getHardwareType()).toBe(6);
      expect(frame.getProtocolLength()).toBe(16);
      expect(frame.getHardwareLength()).toBe(6);
    });
  });

  describe('fromBytes', () => {
    it('should read every field back', () => {
      const frame = ARPFrame.fromBytes(arpRequest().toBytes());

      expect(frame.getDestinationMAC().isBroadcast()).toBe(true);
      expect(frame.getSourceMAC().equals(PEER_MAC)).toBe(true);
      expect(frame.getEtherType()).toBe(0x0806);
      expect(frame.getProtocolType()).toBe(0x0800);
      expect(frame.getOperation()).toBe(ARPOpcode.REQUEST);
      expect(frame.getSenderMAC().equals(PEER_MAC)).toBe(true);
      expect(frame.getSenderIP().equals(PEER_IP)).toBe(true);
      expect(frame.getTargetMAC().equals(MACAddress.ZERO)).toBe(true);
      expect(frame.getTargetIP().equals(LOCAL_IP)).toBe(true);
      expect(frame.isRequest()).toBe(true);
      expect(frame.isReply()).toBe(false);
    });

    it('should reject a buffer of the wrong size', () => {
      expect(() => ARPFrame.fromBytes(new Uint8Array(41))).toThrow('Invalid ARP frame size: 41 != 42');
    });

    it('should copy the bytes in and out', () => {
      const source = arpRequest().toBytes();
      const frame = ARPFrame.fromBytes(source);

      source[20] = 0xff;
      frame.toBytes()[21] = 0xff;

      expect(frame.getOperation()).toBe(ARPOpcode.REQUEST);
    });
  });

  it('should describe itself', () => {
    expect(arpRequest().toString()).toBe(
      'ARPFrame { request, sender: 192.168.43.1 (AA:BB:CC:DD:EE:FF), target: 192.168.43.10 }'
    );
  });
});
