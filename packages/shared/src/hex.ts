const BYTES_PER_LINE = 16;

export function toHex(data: Uint8Array): string {
  return Buffer.from(data).toString('hex');
}

/**
 * Classic offset / hex / ASCII dump, one line per 16 bytes:
 *
 *   00000000  09 00 00 00 02 9c 45 35  00                       |......E5.|
 */
export function hexDump(data: Uint8Array): string {
  const lines: string[] = [];
  for (let offset = 0; offset < data.length; offset += BYTES_PER_LINE) {
    const chunk = data.subarray(offset, offset + BYTES_PER_LINE);
    const hex: string[] = [];
    for (let i = 0; i < BYTES_PER_LINE; i++) {
      const byte = chunk[i];
      hex.push(byte === undefined ? '  ' : byte.toString(16).padStart(2, '0'));
    }
    const left = hex.slice(0, 8).join(' ');
    const right = hex.slice(8).join(' ');
    const ascii = Array.from(chunk, (b) => (b >= 0x20 && b < 0x7f ? String.fromCharCode(b) : '.')).join('');
    lines.push(`${offset.toString(16).padStart(8, '0')}  ${left}  ${right}  |${ascii}|`);
  }
  return lines.join('\n');
}
