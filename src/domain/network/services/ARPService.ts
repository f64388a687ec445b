/**
 * ARPService - answering ARP requests for the local address (RFC 826)
 *
 * Stateless: no ARP cache is kept, every request is judged on its own bytes.
 *
 * - validateARPRequest: checks a received frame against the ARP template
 * - buildARPReply: derives the reply from a validated request
 * - arpProtocol: the descriptor the parser/sender pipeline is instantiated with
 */

import { ARPFrame, ARPOpcode } from '../entities/ARPFrame';
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
 * Reference frame: only the static fields (EtherType, htype, ptype, hlen,
 * plen, opcode) are meaningful; addresses are zero.
 */
export const ARP_TEMPLATE = ARPFrame.create({
  destinationMAC: MACAddress.ZERO,
  sourceMAC: MACAddress.ZERO,
  operation: ARPOpcode.REQUEST,
  senderMAC: MACAddress.ZERO,
  senderIP: new IPAddress('0.0.0.0'),
  targetMAC: MACAddress.ZERO,
  targetIP: new IPAddress('0.0.0.0')
});

export function validateARPRequest(
  candidate: ARPFrame,
  template: ARPFrame,
  identity: Identity
): ValidationResultValue {
  const header = checkEthernetHeader(candidate, template, identity);
  if (header !== ValidationResult.VALID) {
    return header;
  }

  if (candidate.getHardwareType() !== template.getHardwareType()) {
    return ValidationResult.WRONG_HW_TYPE;
  }
  if (candidate.getProtocolType() !== template.getProtocolType()) {
    return ValidationResult.WRONG_PROTO_TYPE;
  }
  if (candidate.getHardwareLength() !== template.getHardwareLength()) {
    return ValidationResult.WRONG_HW_LEN;
  }
  if (candidate.getProtocolLength() !== template.getProtocolLength()) {
    return ValidationResult.WRONG_PROTO_LEN;
  }
  if (candidate.getOperation() !== template.getOperation()) {
    return ValidationResult.WRONG_OPCODE;
  }
  if (!candidate.getTargetIP().equals(identity.ip)) {
    return ValidationResult.NOT_OUR_ADDRESS;
  }

  return ValidationResult.VALID;
}

/**
 * Reply addressed back to the requester: we become the sender, the
 * requester's sender fields become the target fields.
 */
export function buildARPReply(request: ARPFrame, identity: Identity): ARPFrame {
  return ARPFrame.create({
    destinationMAC: request.getSourceMAC(),
    sourceMAC: identity.mac,
    etherType: request.getEtherType(),
    hardwareType: request.getHardwareType(),
    protocolType: request.getProtocolType(),
    hardwareLength: request.getHardwareLength(),
    protocolLength: request.getProtocolLength(),
    operation: ARPOpcode.REPLY,
    senderMAC: identity.mac,
    senderIP: identity.ip,
    targetMAC: request.getSenderMAC(),
    targetIP: request.getSenderIP()
  });
}

export const arpProtocol: FrameProtocol<ARPFrame> = {
  name: 'arp',
  frameLength: ARPFrame.LENGTH,
  template: ARP_TEMPLATE,
  abortsOnEarlyFrameEnd: false,
  decode: bytes => ARPFrame.fromBytes(bytes),
  validate: validateARPRequest,
  buildReply: buildARPReply
};
