/**
 * Unit tests for IPAddress value object
 */

import { describe, it, expect } from 'vitest';
import { IPAddress } from '@/domain/network/value-objects/IPAddress';

describe('IPAddress', () => {
  describe('constructor', () => {
    it('should parse dotted decimal', () => {
      const ip = new IPAddress('192.168.43.10');
      expect(ip.toString()).toBe('192.168.43.10');
      expect(ip.toBytes()).toEqual([192, 168, 43, 10]);
      expect(ip.toNumber()).toBe(3232246538);
    });

    it('should throw error for invalid format', () => {
      expect(() => new IPAddress('1.2.3')).toThrow('Invalid IPv4 address format: 1.2.3');
      expect(() => new IPAddress('256.0.0.1')).toThrow('octets must be between 0 and 255');
      expect(() => new IPAddress('01.2.3.4')).toThrow('octets must be valid numbers');
      expect(() => new IPAddress('')).toThrow('address cannot be empty');
    });
  });

  describe('bytes', () => {
    it('should build from raw bytes', () => {
      expect(IPAddress.fromBytes([10, 0, 0, 2]).toString()).toBe('10.0.0.2');
    });

    it('should reject a wrong number of bytes', () => {
      expect(() => IPAddress.fromBytes([10, 0, 0])).toThrow('IPv4 address must be 4 bytes');
    });

    it('should write its octets at an offset', () => {
      const target = new Uint8Array(6);
      new IPAddress('192.168.43.1').writeTo(target, 2);
      expect(Array.from(target)).toEqual([0, 0, 192, 168, 43, 1]);
    });
  });

  it('should compare by value', () => {
    expect(new IPAddress('192.168.43.10').equals(IPAddress.fromBytes([192, 168, 43, 10]))).toBe(true);
    expect(new IPAddress('192.168.43.10').equals(new IPAddress('192.168.43.1'))).toBe(false);
  });
});
