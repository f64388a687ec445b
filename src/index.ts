/**
 * Wire responder - ARP and ICMP echo replies from a raw byte stream
 */

// Configuration
export {
  createResponderConfig,
  loadResponderConfigFromEnv,
  DEFAULT_MAC,
  DEFAULT_IP,
} from './config/responderConfig';
export type { ResponderConfig, ResponderConfigOptions } from './config/responderConfig';

// Protocol domain
export { MACAddress } from './domain/network/value-objects/MACAddress';
export { IPAddress } from './domain/network/value-objects/IPAddress';
export { ValidationResult, REJECTION_REASONS } from './domain/network/protocol';
export type {
  Frame,
  FrameProtocol,
  Identity,
  ProtocolName,
  RejectionReason,
  ValidationResultValue,
} from './domain/network/protocol';
export { EtherType, ETHERNET_HEADER } from './domain/network/entities/EthernetHeader';
export { ARPFrame, ARPOpcode, ARP_OFFSETS } from './domain/network/entities/ARPFrame';
export type { ARPFrameConfig } from './domain/network/entities/ARPFrame';
export { ICMPFrame, ICMPType, ICMP_OFFSETS } from './domain/network/entities/ICMPFrame';
export type { ICMPFrameConfig } from './domain/network/entities/ICMPFrame';
export { internetChecksum, onesComplementSum, verifyChecksum } from './domain/network/checksum';
export { arpProtocol, buildARPReply, validateARPRequest, ARP_TEMPLATE } from './domain/network/services/ARPService';
export { icmpProtocol, buildEchoReply, validateEchoRequest, ICMP_TEMPLATE } from './domain/network/services/ICMPService';

// Pipeline
export { FrameParser } from './domain/responder/FrameParser';
export type { ParserState } from './domain/responder/FrameParser';
export { FrameSender } from './domain/responder/FrameSender';
export type { SenderState } from './domain/responder/FrameSender';
export { FrameQueue, DEFAULT_QUEUE_CAPACITY } from './domain/responder/FrameQueue';
export { PriorityMultiplexer } from './domain/responder/PriorityMultiplexer';
export { ProtocolResponder } from './domain/responder/ProtocolResponder';
export { IDLE_SAMPLE } from './domain/responder/types';
export type { ByteSample, ByteSink, ByteSource, FrameSink, FrameSource } from './domain/responder/types';

// Host stand-ins and simulation
export { TapHost } from './host/TapHost';
export { FrameCollector } from './host/FrameCollector';
export { formatHexDump } from './host/hexdump';
export { ClockDomain } from './core/ClockDomain';
export { ResponderSimulator } from './core/ResponderSimulator';
export type { SimulationEventMap, SimulationEventType } from './core/ResponderSimulator';

// Observability
export { Logger } from './core/Logger';
export type { LogLevel, ResponderLog, LogFilter } from './core/Logger';
export { createResponderStore } from './store/responderStore';
export type { ResponderStore, ResponderState, ProtocolCounters } from './store/responderStore';
