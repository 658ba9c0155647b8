const utf8Decoder = new TextDecoder('utf-8');
const utf8DecoderFatal = new TextDecoder('utf-8', { fatal: true });

export function decodeUtf8(bytes: Uint8Array, fatal = false): string {
  return fatal ? utf8DecoderFatal.decode(bytes) : utf8Decoder.decode(bytes);
}

export function readUint16BE(buf: Uint8Array, offset: number): number {
  return (buf[offset]! << 8) | buf[offset + 1]!;
}

export function readUint16LE(buf: Uint8Array, offset: number): number {
  return buf[offset]! | (buf[offset + 1]! << 8);
}

export function writeUint16BE(buf: Uint8Array, offset: number, value: number): void {
  buf[offset] = (value >>> 8) & 0xff;
  buf[offset + 1] = value & 0xff;
}

export function writeUint16LE(buf: Uint8Array, offset: number, value: number): void {
  buf[offset] = value & 0xff;
  buf[offset + 1] = (value >>> 8) & 0xff;
}

/** Like strlen(), except it never examines positions at or beyond `max`. */
export function boundedLength(units: ArrayLike<number>, max: number): number {
  const limit = Math.min(max, units.length);
  let length = 0;
  while (length < limit && units[length] !== 0) {
    length += 1;
  }
  return length;
}

/** Byte length of a two-byte-unit string up to its 0x0000 terminator, bounded by `maxBytes`. */
export function boundedLength16(bytes: Uint8Array, maxBytes: number): number {
  const units = Math.floor(Math.min(maxBytes, bytes.length) / 2);
  let count = 0;
  while (count < units && (bytes[count * 2] !== 0 || bytes[count * 2 + 1] !== 0)) {
    count += 1;
  }
  return count * 2;
}
