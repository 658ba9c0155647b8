import { readUint16BE, readUint16LE, writeUint16BE, writeUint16LE } from '../binary.js';
import {
  REPLACEMENT_CHARACTER,
  combineSurrogatePair,
  isHighSurrogate,
  isLowSurrogate,
  isScalarValue,
  isSurrogate,
  type DecodeResult
} from './unicode.js';

/** Byte order of a UTF-16 stream. */
export type Endianness = 'be' | 'le';

/**
 * Decode one UTF-16 code point at `offset`, reading at most `maxLen` bytes.
 *
 * A dangling odd byte yields -1; a high surrogate without a following low
 * surrogate, or a lone low surrogate, yields -2. All failures report U+FFFD.
 */
export function decodeUtf16One(
  bytes: Uint8Array,
  offset: number,
  maxLen: number,
  endian: Endianness
): DecodeResult {
  const available = Math.min(maxLen, bytes.length - offset);
  if (available <= 0) return { codePoint: 0, consumed: 0 };
  if (available === 1) return { codePoint: REPLACEMENT_CHARACTER, consumed: -1 };

  const read = endian === 'be' ? readUint16BE : readUint16LE;
  const unit = read(bytes, offset);
  if (isHighSurrogate(unit)) {
    const low = available >= 4 ? read(bytes, offset + 2) : 0;
    if (!isLowSurrogate(low)) return { codePoint: REPLACEMENT_CHARACTER, consumed: -2 };
    return { codePoint: combineSurrogatePair(unit, low), consumed: 4 };
  }
  if (isSurrogate(unit)) return { codePoint: REPLACEMENT_CHARACTER, consumed: -2 };
  return { codePoint: unit, consumed: 2 };
}

/** Bytes `writeUtf16One()` needs for a value. */
export function utf16Length(codePoint: number): number {
  return isScalarValue(codePoint) && codePoint > 0xffff ? 4 : 2;
}

/**
 * Write one code point as UTF-16 at `offset`, using at most `remaining` bytes.
 * Returns the bytes written, or 0 when `remaining` is too small. Values that are
 * not Unicode scalar values are written as U+FFFD.
 */
export function writeUtf16One(
  out: Uint8Array,
  offset: number,
  remaining: number,
  codePoint: number,
  endian: Endianness
): number {
  const write = endian === 'be' ? writeUint16BE : writeUint16LE;
  const value = isScalarValue(codePoint) ? codePoint : REPLACEMENT_CHARACTER;
  if (value > 0xffff) {
    if (remaining < 4) return 0;
    const offsetValue = value - 0x10000;
    write(out, offset, ((offsetValue >> 10) & 0x3ff) + 0xd800);
    write(out, offset + 2, (offsetValue & 0x3ff) + 0xdc00);
    return 4;
  }
  if (remaining < 2) return 0;
  write(out, offset, value);
  return 2;
}

/** Encode one code point as UTF-16. Never fails. */
export function encodeUtf16One(codePoint: number, endian: Endianness): Uint8Array {
  const out = new Uint8Array(utf16Length(codePoint));
  writeUtf16One(out, 0, out.length, codePoint, endian);
  return out;
}
