/**
 * ICMPService - answering ICMP echo requests (ping) for the local address
 *
 * Only echo request → echo reply; other ICMP types are rejected as
 * `wrong-opcode`. The reply keeps identifier, sequence and payload
 * verbatim and carries freshly computed IPv4 and ICMP checksums.
 */

import {
  DEFAULT_TTL,
  ICMPFrame,
  ICMPType,
  ECHO_PAYLOAD_LENGTH,
  ICMP_HEADER_LENGTH,
  IPV4_HEADER_LENGTH
} from '../entities/ICMPFrame';
import { checkEthernetHeader } from '../entities/EthernetHeader';
import { MACAddress } from '../value-objects/MACAddress';
import { IPAddress } from '../value-objects/IPAddress';
import {
  ValidationResult,
  type FrameProtocol,
  type Identity,
  type ValidationResultValue
} from '../protocol';

/**
 * Reference frame: EtherType IPv4, version/IHL 0x45, protocol 1,
 * total length 84, echo request type 8 code 0.
 */
export const ICMP_TEMPLATE = ICMPFrame.create({
  destinationMAC: MACAddress.ZERO,
  sourceMAC: MACAddress.ZERO,
  sourceIP: new IPAddress('0.0.0.0'),
  destinationIP: new IPAddress('0.0.0.0'),
  type: ICMPType.ECHO_REQUEST,
  code: 0,
  identifier: 0,
  sequenceNumber: 0,
  totalLength: IPV4_HEADER_LENGTH + ICMP_HEADER_LENGTH + ECHO_PAYLOAD_LENGTH
});

export function validateEchoRequest(
  candidate: ICMPFrame,
  template: ICMPFrame,
  identity: Identity
): ValidationResultValue {
  const header = checkEthernetHeader(candidate, template, identity);
  if (header !== ValidationResult.VALID) {
    return header;
  }

  if (candidate.getVersionIHL() !== template.getVersionIHL()) {
    return ValidationResult.WRONG_HW_TYPE;
  }
  if (candidate.getProtocol() !== template.getProtocol()) {
    return ValidationResult.WRONG_PROTO_TYPE;
  }
  // Anything other than a 56-byte echo would be cut at the fixed frame length
  if (candidate.getTotalLength() !== template.getTotalLength()) {
    return ValidationResult.WRONG_PROTO_LEN;
  }
  if (candidate.getType() !== template.getType() || candidate.getCode() !== template.getCode()) {
    return ValidationResult.WRONG_OPCODE;
  }
  if (!candidate.getDestinationIP().equals(identity.ip)) {
    return ValidationResult.NOT_OUR_ADDRESS;
  }

  return ValidationResult.VALID;
}

export function buildEchoReply(request: ICMPFrame, identity: Identity): ICMPFrame {
  return ICMPFrame.create({
    destinationMAC: request.getSourceMAC(),
    sourceMAC: identity.mac,
    etherType: request.getEtherType(),
    versionIHL: request.getVersionIHL(),
    tos: request.getTOS(),
    totalLength: request.getTotalLength(),
    identification: request.getIdentification(),
    flagsFragment: request.getFlagsFragment(),
    ttl: DEFAULT_TTL,
    protocol: request.getProtocol(),
    sourceIP: identity.ip,
    destinationIP: request.getSourceIP(),
    type: ICMPType.ECHO_REPLY,
    code: 0,
    identifier: request.getIdentifier(),
    sequenceNumber: request.getSequenceNumber(),
    payload: request.getPayload()
  });
}

export const icmpProtocol: FrameProtocol<ICMPFrame> = {
  name: 'icmp',
  frameLength: ICMPFrame.LENGTH,
  template: ICMP_TEMPLATE,
  abortsOnEarlyFrameEnd: true,
  decode: bytes => ICMPFrame.fromBytes(bytes),
  validate: validateEchoRequest,
  buildReply: buildEchoReply
};
