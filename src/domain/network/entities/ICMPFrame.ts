/**
 * ICMPFrame Entity
 *
 * An Ethernet frame carrying an IPv4 packet (no options) with an ICMP echo
 * message and a 56-byte payload: the default `ping` datagram. 98 bytes:
 *
 *   0..14   Ethernet header
 *   14..34  IPv4 header (RFC 791)
 *   34..42  ICMP header: type, code, checksum, identifier, sequence (RFC 792)
 *   42..98  Echo payload
 *
 * Immutable: the bytes are copied in and out.
 */

import { IPAddress } from '../value-objects/IPAddress';
import { MACAddress } from '../value-objects/MACAddress';
import { internetChecksum, verifyChecksum } from '../checksum';
import { ETHERNET_HEADER, EtherType, readMAC } from './EthernetHeader';
import type { Frame } from '../protocol';

export enum ICMPType {
  ECHO_REPLY = 0,
  ECHO_REQUEST = 8
}

export const IP_PROTOCOL_ICMP = 1;

/** Version 4, IHL 5 (20-byte header, no options) */
export const IPV4_VERSION_IHL = 0x45;

export const IPV4_HEADER_LENGTH = 20;
export const ICMP_HEADER_LENGTH = 8;
export const ECHO_PAYLOAD_LENGTH = 56;
export const DEFAULT_TTL = 64;

export const ICMP_OFFSETS = {
  ...ETHERNET_HEADER,
  versionIHL: 14,
  tos: 15,
  totalLength: 16,
  identification: 18,
  flagsFragment: 20,
  ttl: 22,
  protocol: 23,
  headerChecksum: 24,
  sourceIP: 26,
  destinationIP: 30,
  icmpType: 34,
  icmpCode: 35,
  icmpChecksum: 36,
  identifier: 38,
  sequence: 40,
  payload: 42
} as const;

const IP_START = ICMP_OFFSETS.versionIHL;
const IP_END = IP_START + IPV4_HEADER_LENGTH;
const ICMP_START = ICMP_OFFSETS.icmpType;

export interface ICMPFrameConfig {
  destinationMAC: MACAddress;
  sourceMAC: MACAddress;
  sourceIP: IPAddress;
  destinationIP: IPAddress;
  type: number;
  code?: number;
  identifier: number;
  sequenceNumber: number;
  /** Up to 56 bytes, zero-padded */
  payload?: Uint8Array;
  etherType?: number;
  versionIHL?: number;
  tos?: number;
  totalLength?: number;
  identification?: number;
  flagsFragment?: number;
  ttl?: number;
  protocol?: number;
}

export class ICMPFrame implements Frame {
  public static readonly LENGTH =
    ETHERNET_HEADER.length + IPV4_HEADER_LENGTH + ICMP_HEADER_LENGTH + ECHO_PAYLOAD_LENGTH;

  private readonly bytes: Buffer;

  private constructor(bytes: Buffer) {
    this.bytes = bytes;
  }

  /**
   * @throws {Error} If the buffer is not exactly 98 bytes
   */
  public static fromBytes(bytes: Uint8Array): ICMPFrame {
    if (bytes.length !== ICMPFrame.LENGTH) {
      throw new Error(`Invalid ICMP frame size: ${bytes.length} != ${ICMPFrame.LENGTH}`);
    }
    return new ICMPFrame(Buffer.from(bytes));
  }

  /**
   * Builds a frame from named fields and fills in both checksums.
   * Static fields default to an echo datagram: IPv4/IHL 5, protocol 1,
   * total length 84, TTL 64.
   */
  public static create(config: ICMPFrameConfig): ICMPFrame {
    const payload = config.payload ?? new Uint8Array(0);
    if (payload.length > ECHO_PAYLOAD_LENGTH) {
      throw new Error(`Echo payload too large: ${payload.length} > ${ECHO_PAYLOAD_LENGTH}`);
    }

    const buffer = Buffer.alloc(ICMPFrame.LENGTH);

    config.destinationMAC.writeTo(buffer, ICMP_OFFSETS.destinationMAC);
    config.sourceMAC.writeTo(buffer, ICMP_OFFSETS.sourceMAC);
    buffer.writeUInt16BE(config.etherType ?? EtherType.IPv4, ICMP_OFFSETS.etherType);

    buffer.writeUInt8(config.versionIHL ?? IPV4_VERSION_IHL, ICMP_OFFSETS.versionIHL);
    buffer.writeUInt8(config.tos ?? 0, ICMP_OFFSETS.tos);
    buffer.writeUInt16BE(config.totalLength ?? ICMPFrame.LENGTH - ETHERNET_HEADER.length, ICMP_OFFSETS.totalLength);
    buffer.writeUInt16BE(config.identification ?? 0, ICMP_OFFSETS.identification);
    buffer.writeUInt16BE(config.flagsFragment ?? 0, ICMP_OFFSETS.flagsFragment);
    buffer.writeUInt8(config.ttl ?? DEFAULT_TTL, ICMP_OFFSETS.ttl);
    buffer.writeUInt8(config.protocol ?? IP_PROTOCOL_ICMP, ICMP_OFFSETS.protocol);
    config.sourceIP.writeTo(buffer, ICMP_OFFSETS.sourceIP);
    config.destinationIP.writeTo(buffer, ICMP_OFFSETS.destinationIP);

    buffer.writeUInt8(config.type, ICMP_OFFSETS.icmpType);
    buffer.writeUInt8(config.code ?? 0, ICMP_OFFSETS.icmpCode);
    buffer.writeUInt16BE(config.identifier, ICMP_OFFSETS.identifier);
    buffer.writeUInt16BE(config.sequenceNumber, ICMP_OFFSETS.sequence);
    buffer.set(payload, ICMP_OFFSETS.payload);

    ICMPFrame.writeChecksums(buffer);
    return new ICMPFrame(buffer);
  }

  /**
   * Recomputes the IPv4 header checksum and the ICMP checksum in place
   */
  public static writeChecksums(buffer: Buffer): void {
    buffer.writeUInt16BE(
      internetChecksum(buffer, IP_START, IP_END, ICMP_OFFSETS.headerChecksum),
      ICMP_OFFSETS.headerChecksum
    );
    buffer.writeUInt16BE(
      internetChecksum(buffer, ICMP_START, ICMPFrame.LENGTH, ICMP_OFFSETS.icmpChecksum),
      ICMP_OFFSETS.icmpChecksum
    );
  }

  public getDestinationMAC(): MACAddress {
    return readMAC(this.bytes, ICMP_OFFSETS.destinationMAC);
  }

  public getSourceMAC(): MACAddress {
    return readMAC(this.bytes, ICMP_OFFSETS.sourceMAC);
  }

  public getEtherType(): number {
    return this.bytes.readUInt16BE(ICMP_OFFSETS.etherType);
  }

  public getVersionIHL(): number {
    return this.bytes.readUInt8(ICMP_OFFSETS.versionIHL);
  }

  public getTOS(): number {
    return this.bytes.readUInt8(ICMP_OFFSETS.tos);
  }

  public getTotalLength(): number {
    return this.bytes.readUInt16BE(ICMP_OFFSETS.totalLength);
  }

  public getIdentification(): number {
    return this.bytes.readUInt16BE(ICMP_OFFSETS.identification);
  }

  public getFlagsFragment(): number {
    return this.bytes.readUInt16BE(ICMP_OFFSETS.flagsFragment);
  }

  public getTTL(): number {
    return this.bytes.readUInt8(ICMP_OFFSETS.ttl);
  }

  public getProtocol(): number {
    return this.bytes.readUInt8(ICMP_OFFSETS.protocol);
  }

  public getHeaderChecksum(): number {
    return this.bytes.readUInt16BE(ICMP_OFFSETS.headerChecksum);
  }

  public getSourceIP(): IPAddress {
    return IPAddress.fromBytes(this.bytes.subarray(ICMP_OFFSETS.sourceIP, ICMP_OFFSETS.sourceIP + 4));
  }

  public getDestinationIP(): IPAddress {
    return IPAddress.fromBytes(
      this.bytes.subarray(ICMP_OFFSETS.destinationIP, ICMP_OFFSETS.destinationIP + 4)
    );
  }

  public getType(): number {
    return this.bytes.readUInt8(ICMP_OFFSETS.icmpType);
  }

  public getCode(): number {
    return this.bytes.readUInt8(ICMP_OFFSETS.icmpCode);
  }

  public getICMPChecksum(): number {
    return this.bytes.readUInt16BE(ICMP_OFFSETS.icmpChecksum);
  }

  public getIdentifier(): number {
    return this.bytes.readUInt16BE(ICMP_OFFSETS.identifier);
  }

  public getSequenceNumber(): number {
    return this.bytes.readUInt16BE(ICMP_OFFSETS.sequence);
  }

  public getPayload(): Buffer {
    return Buffer.from(this.bytes.subarray(ICMP_OFFSETS.payload));
  }

  public isEchoRequest(): boolean {
    return this.getType() === ICMPType.ECHO_REQUEST && this.getCode() === 0;
  }

  public isEchoReply(): boolean {
    return this.getType() === ICMPType.ECHO_REPLY && this.getCode() === 0;
  }

  /**
   * Whether the stored IPv4 header checksum and ICMP checksum both match
   * a recomputation over their regions
   */
  public verifyChecksums(): { ip: boolean; icmp: boolean } {
    return {
      ip: verifyChecksum(this.bytes, IP_START, IP_END, ICMP_OFFSETS.headerChecksum),
      icmp: verifyChecksum(this.bytes, ICMP_START, ICMPFrame.LENGTH, ICMP_OFFSETS.icmpChecksum)
    };
  }

  public toBytes(): Buffer {
    return Buffer.from(this.bytes);
  }

  public toString(): string {
    const kind = this.isEchoRequest() ? 'echo request' : this.isEchoReply() ? 'echo reply' : `type ${this.getType()}`;
    return `ICMPFrame { ${kind}, src: ${this.getSourceIP()}, dst: ${this.getDestinationIP()}, id: ${this.getIdentifier()}, seq: ${this.getSequenceNumber()} }`;
  }
}
