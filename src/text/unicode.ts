/** U+FFFD, substituted for anything that cannot be decoded or represented. */
export const REPLACEMENT_CHARACTER = 0xfffd;
/** Largest Unicode scalar value. */
export const UNICODE_MAX = 0x10ffff;

/**
 * Result of decoding one code point. `consumed` is positive for a valid sequence,
 * negative (`-k`) when the first `k` units were invalid and `codePoint` holds
 * U+FFFD, and zero at the end of input.
 */
export type DecodeResult = {
  codePoint: number;
  consumed: number;
};

export function isHighSurrogate(value: number): boolean {
  return value >= 0xd800 && value <= 0xdbff;
}

export function isLowSurrogate(value: number): boolean {
  return value >= 0xdc00 && value <= 0xdfff;
}

export function isSurrogate(value: number): boolean {
  return value >= 0xd800 && value <= 0xdfff;
}

/** True for values that can be encoded: 0..U+10FFFF minus the surrogate range. */
export function isScalarValue(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= UNICODE_MAX && !isSurrogate(value);
}

export function combineSurrogatePair(high: number, low: number): number {
  return (high - 0xd800) * 0x400 + (low - 0xdc00) + 0x10000;
}
