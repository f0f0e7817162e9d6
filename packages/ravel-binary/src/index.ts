// @ravel/ravel-binary - byte-level primitives shared by the wire codecs
// and the stream framer.

export {
  MAX_VARINT_LENGTH,
  encodeVarint,
  writeVarint,
  varintLength,
  maxVarintForLength,
  decodeVarint,
} from "./varint.ts";

export { hexDump } from "./bytes.ts";
