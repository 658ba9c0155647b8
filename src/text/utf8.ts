import {
  REPLACEMENT_CHARACTER,
  UNICODE_MAX,
  combineSurrogatePair,
  isLowSurrogate,
  isScalarValue,
  isSurrogate,
  type DecodeResult
} from './unicode.js';

/** Size of U+FFFD in UTF-8. */
export const UTF8_REPLACEMENT_SIZE = 3;
const UTF8_REPLACEMENT = Uint8Array.of(0xef, 0xbf, 0xbd);

/** Expected sequence length by lead byte; 0 marks a byte that cannot start a sequence. */
const SEQUENCE_LENGTH = (() => {
  const table = new Uint8Array(256);
  table.fill(1, 0x00, 0x80);
  table.fill(2, 0xc2, 0xe0);
  table.fill(3, 0xe0, 0xf0);
  table.fill(4, 0xf0, 0xf5);
  return table;
})();

function isContinuation(byte: number | undefined): boolean {
  return byte !== undefined && (byte & 0xc0) === 0x80;
}

function invalid(count: number): DecodeResult {
  return { codePoint: REPLACEMENT_CHARACTER, consumed: -count };
}

/** Span of an invalid sequence: the declared span, cut at the first non-continuation byte. */
function invalidSpan(bytes: Uint8Array, offset: number, declared: number, available: number): number {
  const span = Math.min(declared, available);
  for (let i = 1; i < span; i += 1) {
    if (!isContinuation(bytes[offset + i])) return i;
  }
  return span;
}

/**
 * Decode one UTF-8 sequence without rejecting encoded surrogates.
 * Invalid lead bytes C0/C1 span 2 bytes, F5–F7 span 4, F8–FB span 5 and FC–FD span 6,
 * each shortened at the first byte that is not a continuation byte.
 */
function decodeSequence(bytes: Uint8Array, offset: number, maxLen: number): DecodeResult {
  const available = Math.min(maxLen, bytes.length - offset);
  if (available <= 0) return { codePoint: 0, consumed: 0 };
  const lead = bytes[offset]!;
  if (lead === 0) return { codePoint: 0, consumed: 0 };

  const count = SEQUENCE_LENGTH[lead]!;
  if (count === 0) {
    let declared = 1;
    if (lead === 0xc0 || lead === 0xc1) declared = 2;
    else if (lead >= 0xf5 && lead <= 0xf7) declared = 4;
    else if (lead >= 0xf8 && lead <= 0xfb) declared = 5;
    else if (lead === 0xfc || lead === 0xfd) declared = 6;
    return invalid(invalidSpan(bytes, offset, declared, available));
  }
  if (available < count) {
    return invalid(invalidSpan(bytes, offset, available, available));
  }

  for (let i = 1; i < count; i += 1) {
    if (!isContinuation(bytes[offset + i])) return invalid(i);
  }

  let codePoint: number;
  switch (count) {
    case 1:
      return { codePoint: lead, consumed: 1 };
    case 2:
      return { codePoint: ((lead & 0x1f) << 6) | (bytes[offset + 1]! & 0x3f), consumed: 2 };
    case 3:
      codePoint = ((lead & 0x0f) << 12) | ((bytes[offset + 1]! & 0x3f) << 6) | (bytes[offset + 2]! & 0x3f);
      if (codePoint < 0x800) return invalid(3);
      break;
    default:
      codePoint =
        ((lead & 0x07) << 18) |
        ((bytes[offset + 1]! & 0x3f) << 12) |
        ((bytes[offset + 2]! & 0x3f) << 6) |
        (bytes[offset + 3]! & 0x3f);
      if (codePoint < 0x10000) return invalid(4);
      break;
  }
  if (codePoint > UNICODE_MAX) return invalid(count);
  return { codePoint, consumed: count };
}

/** Decode one UTF-8 sequence, accepting encoded surrogate halves as code points. */
export function decodeUtf8Lenient(bytes: Uint8Array, offset = 0, maxLen = bytes.length - offset): DecodeResult {
  return decodeSequence(bytes, offset, maxLen);
}

/**
 * Decode one UTF-8 code point at `offset`, reading at most `maxLen` bytes.
 * An encoded surrogate half is invalid. Returns `consumed: 0` at the bound or at a NUL byte.
 */
export function decodeUtf8One(bytes: Uint8Array, offset = 0, maxLen = bytes.length - offset): DecodeResult {
  const result = decodeSequence(bytes, offset, maxLen);
  if (result.consumed === 3 && isSurrogate(result.codePoint)) return invalid(3);
  return result;
}

/**
 * Decode one UTF-8 code point, also accepting CESU-8: a 3-byte high surrogate
 * followed by a 3-byte low surrogate is joined into one supplementary code point.
 * A lone surrogate half is invalid.
 */
export function decodeCesu8One(bytes: Uint8Array, offset = 0, maxLen = bytes.length - offset): DecodeResult {
  const first = decodeSequence(bytes, offset, maxLen);
  if (first.consumed !== 3 || !isSurrogate(first.codePoint)) return first;
  if (isLowSurrogate(first.codePoint)) return invalid(3);
  const available = Math.min(maxLen, bytes.length - offset);
  if (available - 3 < 3) return invalid(3);
  const second = decodeSequence(bytes, offset + 3, available - 3);
  if (second.consumed !== 3 || !isLowSurrogate(second.codePoint)) return invalid(3);
  return { codePoint: combineSurrogatePair(first.codePoint, second.codePoint), consumed: 6 };
}

/** Number of bytes `encodeUtf8One()` produces for a value. */
export function utf8Length(codePoint: number): number {
  if (!isScalarValue(codePoint)) return UTF8_REPLACEMENT_SIZE;
  if (codePoint <= 0x7f) return 1;
  if (codePoint <= 0x7ff) return 2;
  if (codePoint <= 0xffff) return 3;
  return 4;
}

/**
 * Write one code point as UTF-8 at `offset`, using at most `remaining` bytes.
 * Returns the bytes written, or 0 when `remaining` is too small. Values that are
 * not Unicode scalar values are written as U+FFFD.
 */
export function writeUtf8One(out: Uint8Array, offset: number, remaining: number, codePoint: number): number {
  const size = utf8Length(codePoint);
  if (remaining < size) return 0;
  switch (size) {
    case 1:
      out[offset] = codePoint;
      break;
    case 2:
      out[offset] = 0xc0 | ((codePoint >> 6) & 0x1f);
      out[offset + 1] = 0x80 | (codePoint & 0x3f);
      break;
    case 3:
      if (!isScalarValue(codePoint)) {
        out.set(UTF8_REPLACEMENT, offset);
        break;
      }
      out[offset] = 0xe0 | ((codePoint >> 12) & 0x0f);
      out[offset + 1] = 0x80 | ((codePoint >> 6) & 0x3f);
      out[offset + 2] = 0x80 | (codePoint & 0x3f);
      break;
    default:
      out[offset] = 0xf0 | ((codePoint >> 18) & 0x07);
      out[offset + 1] = 0x80 | ((codePoint >> 12) & 0x3f);
      out[offset + 2] = 0x80 | ((codePoint >> 6) & 0x3f);
      out[offset + 3] = 0x80 | (codePoint & 0x3f);
      break;
  }
  return size;
}

/** Encode one code point as UTF-8. Never fails. */
export function encodeUtf8One(codePoint: number): Uint8Array {
  const out = new Uint8Array(utf8Length(codePoint));
  writeUtf8One(out, 0, out.length, codePoint);
  return out;
}

/** True when every sequence in `bytes` decodes (NUL bytes included). */
export function isValidUtf8(bytes: Uint8Array): boolean {
  let offset = 0;
  while (offset < bytes.length) {
    if (bytes[offset] === 0) {
      offset += 1;
      continue;
    }
    const { consumed } = decodeUtf8One(bytes, offset);
    if (consumed <= 0) return false;
    offset += consumed;
  }
  return true;
}
