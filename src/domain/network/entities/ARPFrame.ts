/**
 * ARPFrame Entity
 *
 * An Ethernet frame carrying an ARP packet for IPv4 over Ethernet (RFC 826),
 * held as its 42 raw bytes. Fields are read at fixed offsets:
 *
 * ┌──────────────────────────────────────────────────────────────┐
 * │ 0  Destination MAC (6) │ 6  Source MAC (6) │ 12 EtherType (2) │
 * ├──────────────────────────────────────────────────────────────┤
 * │ 14 Hardware type (2) │ 16 Protocol type (2)                   │
 * │ 18 HW length (1)     │ 19 Proto length (1) │ 20 Opcode (2)    │
 * │ 22 Sender MAC (6)    │ 28 Sender IP (4)                       │
 * │ 32 Target MAC (6)    │ 38 Target IP (4)                       │
 * └──────────────────────────────────────────────────────────────┘
 *
 * Immutable: the bytes are copied in and out.
 *
 * @example
 * ```typescript
 * const request = ARPFrame.create({
 *   destinationMAC: MACAddress.BROADCAST,
 *   sourceMAC: new MACAddress('AA:BB:CC:DD:EE:FF'),
 *   operation: ARPOpcode.REQUEST,
 *   senderMAC: new MACAddress('AA:BB:CC:DD:EE:FF'),
 *   senderIP: new IPAddress('192.168.43.1'),
 *   targetMAC: MACAddress.ZERO,
 *   targetIP: new IPAddress('192.168.43.10')
 * });
 * ```
 */

import { IPAddress } from '../value-objects/IPAddress';
import { MACAddress } from '../value-objects/MACAddress';
import { ETHERNET_HEADER, EtherType, readMAC } from './EthernetHeader';
import type { Frame } from '../protocol';

export const ARPOpcode = {
  REQUEST: 1,
  REPLY: 2
} as const;

export const ARP_HARDWARE_ETHERNET = 1;

export const ARP_OFFSETS = {
  ...ETHERNET_HEADER,
  hardwareType: 14,
  protocolType: 16,
  hardwareLength: 18,
  protocolLength: 19,
  operation: 20,
  senderMAC: 22,
  senderIP: 28,
  targetMAC: 32,
  targetIP: 38
} as const;

export interface ARPFrameConfig {
  destinationMAC: MACAddress;
  sourceMAC: MACAddress;
  operation: number;
  senderMAC: MACAddress;
  senderIP: IPAddress;
  targetMAC: MACAddress;
  targetIP: IPAddress;
  etherType?: number;
  hardwareType?: number;
  protocolType?: number;
  hardwareLength?: number;
  protocolLength?: number;
}

export class ARPFrame implements Frame {
  public static readonly LENGTH = 42;

  private readonly bytes: Buffer;

  private constructor(bytes: Buffer) {
    this.bytes = bytes;
  }

  /**
   * @throws {Error} If the buffer is not exactly 42 bytes
   */
  public static fromBytes(bytes: Uint8Array): ARPFrame {
    if (bytes.length !== ARPFrame.LENGTH) {
      throw new Error(`Invalid ARP frame size: ${bytes.length} != ${ARPFrame.LENGTH}`);
    }
    return new ARPFrame(Buffer.from(bytes));
  }

  /**
   * Builds a frame from named fields; static fields default to
   * Ethernet/IPv4 values (htype 1, ptype 0x0800, hlen 6, plen 4).
   */
  public static create(config: ARPFrameConfig): ARPFrame {
    const buffer = Buffer.alloc(ARPFrame.LENGTH);

    config.destinationMAC.writeTo(buffer, ARP_OFFSETS.destinationMAC);
    config.sourceMAC.writeTo(buffer, ARP_OFFSETS.sourceMAC);
    buffer.writeUInt16BE(config.etherType ?? EtherType.ARP, ARP_OFFSETS.etherType);

    buffer.writeUInt16BE(config.hardwareType ?? ARP_HARDWARE_ETHERNET, ARP_OFFSETS.hardwareType);
    buffer.writeUInt16BE(config.protocolType ?? EtherType.IPv4, ARP_OFFSETS.protocolType);
    buffer.writeUInt8(config.hardwareLength ?? MACAddress.LENGTH, ARP_OFFSETS.hardwareLength);
    buffer.writeUInt8(config.protocolLength ?? IPAddress.LENGTH, ARP_OFFSETS.protocolLength);
    buffer.writeUInt16BE(config.operation, ARP_OFFSETS.operation);

    config.senderMAC.writeTo(buffer, ARP_OFFSETS.senderMAC);
    config.senderIP.writeTo(buffer, ARP_OFFSETS.senderIP);
    config.targetMAC.writeTo(buffer, ARP_OFFSETS.targetMAC);
    config.targetIP.writeTo(buffer, ARP_OFFSETS.targetIP);

    return new ARPFrame(buffer);
  }

  public getDestinationMAC(): MACAddress {
    return readMAC(this.bytes, ARP_OFFSETS.destinationMAC);
  }

  public getSourceMAC(): MACAddress {
    return readMAC(this.bytes, ARP_OFFSETS.sourceMAC);
  }

  public getEtherType(): number {
    return this.bytes.readUInt16BE(ARP_OFFSETS.etherType);
  }

  public getHardwareType(): number {
    return this.bytes.readUInt16BE(ARP_OFFSETS.hardwareType);
  }

  public getProtocolType(): number {
    return this.bytes.readUInt16BE(ARP_OFFSETS.protocolType);
  }

  public getHardwareLength(): number {
    return this.bytes.readUInt8(ARP_OFFSETS.hardwareLength);
  }

  public getProtocolLength(): number {
    return this.bytes.readUInt8(ARP_OFFSETS.protocolLength);
  }

  public getOperation(): number {
    return this.bytes.readUInt16BE(ARP_OFFSETS.operation);
  }

  public getSenderMAC(): MACAddress {
    return readMAC(this.bytes, ARP_OFFSETS.senderMAC);
  }

  public getSenderIP(): IPAddress {
    return IPAddress.fromBytes(this.bytes.subarray(ARP_OFFSETS.senderIP, ARP_OFFSETS.senderIP + 4));
  }

  public getTargetMAC(): MACAddress {
    return readMAC(this.bytes, ARP_OFFSETS.targetMAC);
  }

  public getTargetIP(): IPAddress {
    return IPAddress.fromBytes(this.bytes.subarray(ARP_OFFSETS.targetIP, ARP_OFFSETS.targetIP + 4));
  }

  public isRequest(): boolean {
    return this.getOperation() === ARPOpcode.REQUEST;
  }

  public isReply(): boolean {
    return this.getOperation() === ARPOpcode.REPLY;
  }

  public toBytes(): Buffer {
    return Buffer.from(this.bytes);
  }

  public toString(): string {
    const op = this.isRequest() ? 'request' : this.isReply() ? 'reply' : `op ${this.getOperation()}`;
    return `ARPFrame { ${op}, sender: ${this.getSenderIP()} (${this.getSenderMAC()}), target: ${this.getTargetIP()} }`;
  }
}
