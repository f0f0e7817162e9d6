// LEB128 varints: 7 bits per byte, low group first, high bit set on every
// byte but the last. Values are unsigned and at most 64 bits wide.

export const MAX_VARINT_LENGTH = 10;

const U64_MAX = 0xffff_ffff_ffff_ffffn;

export function encodeVarint(value: number | bigint): Uint8Array {
  let remaining = typeof value === "bigint" ? value : BigInt(value);
  if (remaining < 0n) throw new RangeError("negative varint");
  if (remaining > U64_MAX) throw new RangeError("varint exceeds 64 bits");
  const out: number[] = [];
  do {
    let byte = Number(remaining & 0x7fn);
    remaining >>= 7n;
    if (remaining !== 0n) byte |= 0x80;
    out.push(byte);
  } while (remaining !== 0n);
  return Uint8Array.from(out);
}

/** Write `value` into `buf` at `offset`, returning the offset after it. */
export function writeVarint(buf: Uint8Array, offset: number, value: number | bigint): number {
  const bytes = encodeVarint(value);
  if (offset + bytes.length > buf.length) throw new RangeError("varint: buffer too small");
  buf.set(bytes, offset);
  return offset + bytes.length;
}

/** Number of bytes `encodeVarint(value)` produces. */
export function varintLength(value: number | bigint): number {
  let remaining = typeof value === "bigint" ? value : BigInt(value);
  if (remaining < 0n) throw new RangeError("negative varint");
  let n = 1;
  while (remaining >= 0x80n) {
    remaining >>= 7n;
    n++;
  }
  return n;
}

/**
 * Largest value that encodes in `length` bytes (0 for a zero length).
 */
export function maxVarintForLength(length: number): bigint {
  if (length <= 0) return 0n;
  if (length >= MAX_VARINT_LENGTH) return U64_MAX;
  return (1n << BigInt(7 * length)) - 1n;
}

export function decodeVarint(
  buf: Uint8Array,
  offset: number,
): { value: bigint; next: number } {
  let result = 0n;
  let shift = 0n;
  let i = offset;
  while (true) {
    if (i >= buf.length) throw new Error("varint: eof");
    const byte = buf[i++];
    if (shift >= 64n) throw new Error("varint: overflow");
    result |= BigInt(byte & 0x7f) << shift;
    if ((byte & 0x80) === 0) {
      if (result > U64_MAX) throw new Error("varint: overflow");
      return { value: result, next: i };
    }
    shift += 7n;
  }
}
