/**
 * Unit tests for ICMPFrame entity
 */

import { describe, it, expect } from 'vitest';
import { ICMPFrame, ICMPType } from '@/domain/network/entities/ICMPFrame';
import { LOCAL_IP, PEER_IP, echoRequest } from '../../helpers/frames';

describe('ICMPFrame', () => {
  describe('create', () => {
    it('should build a 98-byte echo datagram with default IPv4 fields', () => {
      const frame = echoRequest();

      expect(ICMPFrame.LENGTH).toBe(98);
      expect(frame.toBytes().length).toBe(98);
      expect(frame.getEtherType()).toBe(0x0800);
      expect(frame.getVersionIHL()).toBe(0x45);
      expect(frame.getTotalLength()).toBe(84);
      expect(frame.getTTL()).toBe(64);
      expect(frame.getProtocol()).toBe(1);
      expect(frame.getSourceIP().equals(PEER_IP)).toBe(true);
      expect(frame.getDestinationIP().equals(LOCAL_IP)).toBe(true);
      expect(frame.isEchoRequest()).toBe(true);
    });

    it('should compute the IPv4 header checksum', () => {
      const frame = echoRequest();

      // 4500 0054 0000 4000 4001 c0a8 2b01 c0a8 2b0a
      expect(frame.getHeaderChecksum()).toBe(0x634d);
    });

    it('should compute the ICMP checksum over header and payload', () => {
      const frame = echoRequest({ payload: new Uint8Array(56) });

      // 0800 1234 0001, zero payload
      expect(frame.getICMPChecksum()).toBe(0xe5ca);
      expect(frame.verifyChecksums()).toEqual({ ip: true, icmp: true });
    });

    it('should zero-pad a short payload', () => {
      const payload = echoRequest({ payload: Uint8Array.of(1, 2, 3) }).getPayload();

      expect(payload.length).toBe(56);
      expect(Array.from(payload.subarray(0, 4))).toEqual([1, 2, 3, 0]);
      expect(payload.every((byte, i) => i < 3 || byte === 0)).toBe(true);
    });

    it('should reject a payload longer than 56 bytes', () => {
      expect(() => echoRequest({ payload: new Uint8Array(57) })).toThrow('Echo payload too large: 57 > 56');
    });
  });

  describe('fromBytes', () => {
    it('should reject a buffer of the wrong size', () => {
      expect(() => ICMPFrame.fromBytes(new Uint8Array(42))).toThrow('Invalid ICMP frame size: 42 != 98');
    });

    it('should read identifier, sequence and payload', () => {
      const frame = ICMPFrame.fromBytes(echoRequest({ sequenceNumber: 0x0203 }).toBytes());

      expect(frame.getType()).toBe(ICMPType.ECHO_REQUEST);
      expect(frame.getCode()).toBe(0);
      expect(frame.getIdentifier()).toBe(0x1234);
      expect(frame.getSequenceNumber()).toBe(0x0203);
      expect(frame.getPayload()[0]).toBe(0x10);
      expect(frame.getPayload()[55]).toBe(0x47);
    });

    it('should report a corrupted checksum', () => {
      const bytes = echoRequest().toBytes();
      bytes[50] ^= 0xff;

      expect(ICMPFrame.fromBytes(bytes).verifyChecksums()).toEqual({ ip: true, icmp: false });
    });
  });

  it('should only treat code 0 as echo', () => {
    expect(echoRequest({ code: 1 }).isEchoRequest()).toBe(false);
    expect(echoRequest({ type: ICMPType.ECHO_REPLY }).isEchoReply()).toBe(true);
  });

  it('should describe itself', () => {
    expect(echoRequest().toString()).toBe(
      'ICMPFrame { echo request, src: 192.168.43.1, dst: 192.168.43.10, id: 4660, seq: 1 }'
    );
  });
});
