/**
 * IPAddress Value Object
 *
 * Represents a 32-bit IPv4 address: the responder's own network address and
 * the sender/target protocol addresses carried by ARP and IPv4 headers.
 *
 * @example
 * ```typescript
 * const ip = new IPAddress('192.168.43.10');
 * ip.toNumber();  // 0xC0A82B0A
 * IPAddress.fromBytes(frame.subarray(38, 42));
 * ```
 */
export class IPAddress {
  private readonly value: string;
  private readonly bytes: number[];
  private readonly numeric: number;

  public static readonly LENGTH = 4;

  /**
   * @param address - IPv4 address in dotted decimal format (e.g. '192.168.1.1')
   * @throws {Error} If address format is invalid
   */
  constructor(address: string) {
    if (!address) {
      throw new Error('Invalid IPv4 address format: address cannot be empty');
    }

    const parts = address.split('.');
    if (parts.length !== 4) {
      throw new Error(`Invalid IPv4 address format: ${address}`);
    }

    const bytes: number[] = [];
    for (const part of parts) {
      const num = parseInt(part, 10);

      if (isNaN(num) || num.toString() !== part) {
        throw new Error('Invalid IPv4 address format: octets must be valid numbers');
      }
      if (num < 0 || num > 255) {
        throw new Error('Invalid IPv4 address format: octets must be between 0 and 255');
      }

      bytes.push(num);
    }

    this.bytes = bytes;
    this.value = bytes.join('.');
    this.numeric = bytes.reduce((acc, byte, i) => acc + byte * Math.pow(256, 3 - i), 0);
  }

  /**
   * Creates an IP address from 4 raw bytes
   *
   * @throws {Error} If the byte sequence is not 4 valid octets
   */
  public static fromBytes(bytes: ArrayLike<number>): IPAddress {
    if (bytes.length !== IPAddress.LENGTH) {
      throw new Error('IPv4 address must be 4 bytes');
    }

    const octets = Array.from(bytes);
    for (const byte of octets) {
      if (byte < 0 || byte > 255 || !Number.isInteger(byte)) {
        throw new Error('Invalid byte value: must be integer between 0 and 255');
      }
    }

    return new IPAddress(octets.join('.'));
  }

  public toString(): string {
    return this.value;
  }

  public toBytes(): number[] {
    return [...this.bytes];
  }

  public toNumber(): number {
    return this.numeric;
  }

  public writeTo(target: Uint8Array, offset: number): void {
    target.set(this.bytes, offset);
  }

  public equals(other: IPAddress): boolean {
    return this.value === other.value;
  }
}
