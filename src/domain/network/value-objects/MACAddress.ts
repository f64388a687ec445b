/**
 * MACAddress Value Object
 *
 * Represents a 48-bit hardware address as it appears in an Ethernet header
 * and in the ARP sender/target hardware fields.
 *
 * @example
 * ```typescript
 * const mac = new MACAddress('AA:BB:CC:DD:EE:FF');
 * mac.toString();       // 'AA:BB:CC:DD:EE:FF'
 * mac.isBroadcast();    // false
 * MACAddress.fromBytes(frame.subarray(6, 12));
 * ```
 */
export class MACAddress {
  private readonly value: string;
  private readonly bytes: number[];

  public static readonly LENGTH = 6;
  public static readonly BROADCAST = new MACAddress('FF:FF:FF:FF:FF:FF');
  public static readonly ZERO = new MACAddress('00:00:00:00:00:00');

  /**
   * @param address - 'AA:BB:CC:DD:EE:FF', 'AA-BB-CC-DD-EE-FF' or 'aabbccddeeff'
   * @throws {Error} If address format is invalid
   */
  constructor(address: string) {
    if (!address) {
      throw new Error('Invalid MAC address format: address cannot be empty');
    }

    const normalized = address.replace(/[:-]/g, '').toUpperCase();

    if (!/^[0-9A-F]{12}$/.test(normalized)) {
      throw new Error(`Invalid MAC address format: ${address}`);
    }

    const parts: string[] = [];
    for (let i = 0; i < 12; i += 2) {
      parts.push(normalized.slice(i, i + 2));
    }
    this.value = parts.join(':');
    this.bytes = parts.map(part => parseInt(part, 16));
  }

  /**
   * Creates a MAC address from 6 raw bytes (a number array or a slice of a frame)
   *
   * @throws {Error} If the byte sequence is not 6 valid octets
   */
  public static fromBytes(bytes: ArrayLike<number>): MACAddress {
    if (bytes.length !== MACAddress.LENGTH) {
      throw new Error('MAC address must be 6 bytes');
    }

    const octets = Array.from(bytes);
    for (const byte of octets) {
      if (byte < 0 || byte > 255 || !Number.isInteger(byte)) {
        throw new Error('Invalid byte value: must be integer between 0 and 255');
      }
    }

    return new MACAddress(
      octets.map(byte => byte.toString(16).toUpperCase().padStart(2, '0')).join(':')
    );
  }

  public toString(): string {
    return this.value;
  }

  public toBytes(): number[] {
    return [...this.bytes];
  }

  /**
   * Writes the 6 octets into `target` starting at `offset`
   */
  public writeTo(target: Uint8Array, offset: number): void {
    target.set(this.bytes, offset);
  }

  public isBroadcast(): boolean {
    return this.bytes.every(byte => byte === 0xFF);
  }

  public equals(other: MACAddress): boolean {
    return this.value === other.value;
  }
}
