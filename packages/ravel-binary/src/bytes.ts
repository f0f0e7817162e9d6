/**
 * Hex dump of up to `length` bytes starting at `offset`, with the byte at
 * `offset` bracketed. Used in error messages and debug output.
 */
export function hexDump(buf: Uint8Array, offset = 0, length = 32): string {
  const start = Math.max(0, offset);
  const end = Math.min(buf.length, start + length);
  const bytes: string[] = [];
  for (let i = start; i < end; i++) {
    const hex = buf[i].toString(16).padStart(2, "0");
    bytes.push(i === offset ? `[${hex}]` : hex);
  }
  return bytes.join(" ");
}
