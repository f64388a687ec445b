/**
 * Wireshark-style hex dump: 16 lowercase hex bytes per line, each followed
 * by a space.
 *
 * @example
 * ```typescript
 * formatHexDump(Uint8Array.of(0xff, 0x08, 0x06)); // 'ff 08 06 '
 * ```
 */
export function formatHexDump(bytes: Uint8Array, bytesPerLine: number = 16): string {
  const lines: string[] = [];

  for (let offset = 0; offset < bytes.length; offset += bytesPerLine) {
    let line = '';
    for (const byte of bytes.subarray(offset, offset + bytesPerLine)) {
      line += `${byte.toString(16).padStart(2, '0')} `;
    }
    lines.push(line);
  }

  return lines.join('\n');
}
