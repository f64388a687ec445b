/**
 * Ethernet II header layout (IEEE 802.3)
 *
 * - Destination MAC: 6 bytes
 * - Source MAC: 6 bytes
 * - EtherType: 2 bytes
 *
 * No FCS: the byte stream carries frames as the TAP device delivers them.
 */

import { MACAddress } from '../value-objects/MACAddress';
import { ValidationResult, type Frame, type Identity, type ValidationResultValue } from '../protocol';

/**
 * EtherType constants (IEEE 802.3)
 */
export const EtherType = {
  IPv4: 0x0800,
  ARP: 0x0806
} as const;

export type EtherTypeValue = typeof EtherType[keyof typeof EtherType];

export const ETHERNET_HEADER = {
  destinationMAC: 0,
  sourceMAC: 6,
  etherType: 12,
  length: 14
} as const;

export function readMAC(bytes: Uint8Array, offset: number): MACAddress {
  return MACAddress.fromBytes(bytes.subarray(offset, offset + MACAddress.LENGTH));
}

/**
 * Steps 1-3 of frame validation, common to every protocol:
 * addressed to us (or broadcast), not our own transmission looped back,
 * and carrying the template's EtherType.
 */
export function checkEthernetHeader(
  candidate: Frame,
  template: Frame,
  identity: Identity
): ValidationResultValue {
  const destination = candidate.getDestinationMAC();
  if (!destination.equals(identity.mac) && !destination.isBroadcast()) {
    return ValidationResult.NOT_FOR_US;
  }

  if (candidate.getSourceMAC().equals(identity.mac)) {
    return ValidationResult.ECHO_OF_SELF;
  }

  if (candidate.getEtherType() !== template.getEtherType()) {
    return ValidationResult.WRONG_ETHER_TYPE;
  }

  return ValidationResult.VALID;
}
