/**
 * Protocol contracts shared by the ARP and ICMP responders.
 *
 * A protocol is described by a fixed frame length, a reference template and
 * the pure validate/buildReply functions over its frame type. The parser and
 * sender state machines are generic over this descriptor.
 */

import type { IPAddress } from './value-objects/IPAddress';
import type { MACAddress } from './value-objects/MACAddress';

/**
 * Local address identity, read-only for the lifetime of a responder
 */
export interface Identity {
  readonly mac: MACAddress;
  readonly ip: IPAddress;
}

export type ProtocolName = 'arp' | 'icmp';

/**
 * Outcome of checking a candidate frame against its template.
 *
 * Several reasons are shared between protocols:
 * - WRONG_HW_TYPE: ARP hardware type, or IPv4 version/IHL
 * - WRONG_PROTO_TYPE: ARP protocol type, or IPv4 protocol number
 * - WRONG_PROTO_LEN: ARP protocol address length, or IPv4 total length
 * - WRONG_OPCODE: ARP opcode, or ICMP type/code
 */
export const ValidationResult = {
  VALID: 'valid',
  NOT_FOR_US: 'not-for-us',
  ECHO_OF_SELF: 'echo-of-self',
  WRONG_ETHER_TYPE: 'wrong-ether-type',
  WRONG_HW_TYPE: 'wrong-hw-type',
  WRONG_PROTO_TYPE: 'wrong-proto-type',
  WRONG_HW_LEN: 'wrong-hw-len',
  WRONG_PROTO_LEN: 'wrong-proto-len',
  WRONG_OPCODE: 'wrong-opcode',
  NOT_OUR_ADDRESS: 'not-our-address'
} as const;

export type ValidationResultValue = typeof ValidationResult[keyof typeof ValidationResult];

export type RejectionReason = Exclude<ValidationResultValue, 'valid'>;

export const REJECTION_REASONS: readonly RejectionReason[] = [
  ValidationResult.NOT_FOR_US,
  ValidationResult.ECHO_OF_SELF,
  ValidationResult.WRONG_ETHER_TYPE,
  ValidationResult.WRONG_HW_TYPE,
  ValidationResult.WRONG_PROTO_TYPE,
  ValidationResult.WRONG_HW_LEN,
  ValidationResult.WRONG_PROTO_LEN,
  ValidationResult.WRONG_OPCODE,
  ValidationResult.NOT_OUR_ADDRESS
];

/**
 * Anything that travels as a fixed-layout Ethernet frame
 */
export interface Frame {
  getDestinationMAC(): MACAddress;
  getSourceMAC(): MACAddress;
  getEtherType(): number;
  toBytes(): Buffer;
}

export interface FrameProtocol<F extends Frame> {
  readonly name: ProtocolName;
  /** Total frame length in bytes, request and reply alike */
  readonly frameLength: number;
  /** Constant frame carrying the expected static field values */
  readonly template: F;
  /**
   * Whether the parser discards a partial frame when the input goes inactive.
   * The ARP parser does not; see FrameParser.
   */
  readonly abortsOnEarlyFrameEnd: boolean;
  decode(bytes: Uint8Array): F;
  validate(candidate: F, template: F, identity: Identity): ValidationResultValue;
  buildReply(request: F, identity: Identity): F;
}
