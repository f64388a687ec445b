/**
 * Responder configuration
 *
 * The local identity (MAC + IPv4) and the queue capacity are fixed once at
 * startup. Values arrive as strings (options or environment) and are turned
 * into value objects here, so a bad address fails before any frame is seen.
 */

import { MACAddress } from '@/domain/network/value-objects/MACAddress';
import { IPAddress } from '@/domain/network/value-objects/IPAddress';
import type { Identity } from '@/domain/network/protocol';
import { DEFAULT_QUEUE_CAPACITY } from '@/domain/responder/FrameQueue';

export interface ResponderConfig {
  readonly identity: Identity;
  readonly queueCapacity: number;
}

export interface ResponderConfigOptions {
  mac?: string;
  ip?: string;
  queueCapacity?: number;
}

export const DEFAULT_MAC = '02:00:00:00:00:01';
export const DEFAULT_IP = '192.168.43.10';

/**
 * @throws {Error} If an address or the capacity is invalid
 */
export function createResponderConfig(options: ResponderConfigOptions = {}): ResponderConfig {
  const queueCapacity = options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY;
  if (!Number.isInteger(queueCapacity) || queueCapacity < 1) {
    throw new Error(`Invalid queue capacity: ${queueCapacity}`);
  }

  const identity: Identity = Object.freeze({
    mac: new MACAddress(options.mac ?? DEFAULT_MAC),
    ip: new IPAddress(options.ip ?? DEFAULT_IP),
  });

  return Object.freeze({ identity, queueCapacity });
}

/**
 * Reads RESPONDER_MAC, RESPONDER_IP and RESPONDER_QUEUE_CAPACITY;
 * unset variables fall back to the defaults.
 *
 * @throws {Error} If a variable holds an invalid value
 */
export function loadResponderConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ResponderConfig {
  const capacity = env.RESPONDER_QUEUE_CAPACITY;

  let queueCapacity: number | undefined;
  if (capacity !== undefined && capacity !== '') {
    queueCapacity = Number(capacity);
    if (!Number.isInteger(queueCapacity)) {
      throw new Error(`Invalid RESPONDER_QUEUE_CAPACITY: ${capacity}`);
    }
  }

  return createResponderConfig({
    mac: env.RESPONDER_MAC || undefined,
    ip: env.RESPONDER_IP || undefined,
    queueCapacity,
  });
}
