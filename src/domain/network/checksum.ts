/**
 * Internet checksum (RFC 1071)
 *
 * 16-bit one's complement of the one's complement sum of the covered bytes,
 * read as big-endian words. Used for the IPv4 header checksum and the ICMP
 * checksum. An odd trailing byte is padded with zero on the right.
 */

/**
 * Folded one's complement sum of `bytes[start, end)`, skipping the two bytes
 * at `skipOffset` (the checksum field itself) when given.
 */
export function onesComplementSum(
  bytes: Uint8Array,
  start: number = 0,
  end: number = bytes.length,
  skipOffset?: number
): number {
  let sum = 0;

  for (let i = start; i < end; i += 2) {
    if (i === skipOffset) {
      continue;
    }

    const high = bytes[i];
    const low = i + 1 < end ? bytes[i + 1] : 0;
    sum += (high << 8) | low;
  }

  // End-around carry
  while (sum > 0xFFFF) {
    sum = (sum & 0xFFFF) + (sum >>> 16);
  }

  return sum;
}

/**
 * Checksum over `bytes[start, end)` with the field at `checksumOffset` treated as zero
 */
export function internetChecksum(
  bytes: Uint8Array,
  start: number = 0,
  end: number = bytes.length,
  checksumOffset?: number
): number {
  return ~onesComplementSum(bytes, start, end, checksumOffset) & 0xFFFF;
}

/**
 * True when the big-endian value stored at `checksumOffset` matches a fresh
 * computation over the same region.
 */
export function verifyChecksum(
  bytes: Uint8Array,
  start: number,
  end: number,
  checksumOffset: number
): boolean {
  const stored = (bytes[checksumOffset] << 8) | bytes[checksumOffset + 1];
  return stored === internetChecksum(bytes, start, end, checksumOffset);
}
