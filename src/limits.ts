/** Resource ceilings for text buffers and normalization. */
export type TextLimits = {
  /** Largest capacity, in units, any single text buffer may grow to. */
  maxBufferUnits?: number;
  /** Longest run of combining marks collected while composing to NFC. */
  maxCombiningRun?: number;
};

/** Safety profile selecting default limits. */
export type TextProfile = 'compat' | 'strict';

const DEFAULT_LIMITS = Object.freeze({
  maxBufferUnits: 256 * 1024 * 1024,
  maxCombiningRun: 10
} satisfies Required<TextLimits>);

const STRICT_LIMITS = Object.freeze({
  maxBufferUnits: 16 * 1024 * 1024,
  maxCombiningRun: 10
} satisfies Required<TextLimits>);

export const DEFAULT_TEXT_LIMITS: Required<TextLimits> = DEFAULT_LIMITS;
export const STRICT_TEXT_LIMITS: Required<TextLimits> = STRICT_LIMITS;

/** Merge caller limits over the defaults of a profile. */
export function resolveTextLimits(limits?: TextLimits, profile: TextProfile = 'compat'): Required<TextLimits> {
  const defaults = profile === 'strict' ? STRICT_TEXT_LIMITS : DEFAULT_TEXT_LIMITS;
  if (!limits) return defaults;
  const maxBufferUnits = limits.maxBufferUnits ?? defaults.maxBufferUnits;
  const maxCombiningRun = limits.maxCombiningRun ?? defaults.maxCombiningRun;
  if (!Number.isSafeInteger(maxBufferUnits) || maxBufferUnits < 1) {
    throw new RangeError(`maxBufferUnits must be a positive safe integer: ${maxBufferUnits}`);
  }
  if (!Number.isSafeInteger(maxCombiningRun) || maxCombiningRun < 2) {
    throw new RangeError(`maxCombiningRun must be an integer of at least 2: ${maxCombiningRun}`);
  }
  return { maxBufferUnits, maxCombiningRun };
}
