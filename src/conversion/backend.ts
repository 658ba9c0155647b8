import type { DecompositionService } from '../text/normalizeD.js';

/** Outcome of one `CharsetTranscoder.transcode()` call. */
export type TranscodeStatus = 'completed' | 'illegal-sequence' | 'output-full';

/** Why a transcoder stopped at an illegal sequence. */
export type IllegalReason = 'malformed' | 'unrepresentable';

export type TranscodeResult = {
  /** Input bytes consumed. */
  consumed: number;
  /** Output bytes written. */
  produced: number;
  status: TranscodeStatus;
  /** Set with `illegal-sequence`: the input at `consumed` is undecodable or has no mapping. */
  reason?: IllegalReason | undefined;
  /** Source bytes of the illegal character, when the transcoder knows them. */
  length?: number | undefined;
};

/**
 * Stateful converter between two charsets, in the manner of an iconv handle.
 *
 * `transcode()` converts as much of `input` as fits in `output` and stops at the
 * first sequence it cannot convert. The caller substitutes for that sequence,
 * skips `length` bytes (one source unit when unknown) and calls again with the
 * rest.
 */
export interface CharsetTranscoder {
  transcode(input: Uint8Array, output: Uint8Array): TranscodeResult;
  /** Return to the initial shift state and drop pending output. */
  reset(): void;
  close(): void;
}

/** Which external conversion facilities a backend offers. */
export type CharsetBackendKind = 'none' | 'external' | 'codepage' | 'decomposition';

/**
 * External charset service used for every conversion the built-in Unicode
 * codecs do not cover.
 *
 * - `none`: no charset conversion; only Unicode and best-effort stages.
 * - `external`: transcoders opened by charset name.
 * - `codepage`: transcoders opened by name or codepage number; charsets that
 *   resolve to one codepage are treated as the same charset.
 * - `decomposition`: `external` plus a platform NFD service, which makes
 *   conversions from Unicode to UTF-8 decompose instead of compose.
 */
export interface CharsetBackend {
  readonly kind: CharsetBackendKind;
  /** Open a transcoder, or return null when the pair is not supported. */
  open(fromCharset: string, toCharset: string): CharsetTranscoder | null;
  readonly decomposition?: DecompositionService | undefined;
}

/** Backend with no external conversions. */
export const NO_BACKEND: CharsetBackend = Object.freeze({
  kind: 'none',
  open: () => null
} satisfies CharsetBackend);
