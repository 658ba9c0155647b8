import { ConversionError } from '../errors.js';
import type { TextLimits } from '../limits.js';
import type { SystemLocale } from '../locale/SystemLocale.js';
import { ByteWriter, emptyCounts, formCodec, type SubstitutionCounts, type UnicodeForm } from '../text/forms.js';
import { normalizeC } from '../text/normalizeC.js';
import { normalizeD, type DecompositionService } from '../text/normalizeD.js';
import type { ByteBuffer } from '../text/TextBuffer.js';
import { REPLACEMENT_CHARACTER } from '../text/unicode.js';
import { decodeCesu8One, decodeUtf8Lenient } from '../text/utf8.js';
import type { CharsetTranscoder } from './backend.js';

/** One step of a conversion pipeline, fixed when the profile is built. */
export type Stage =
  /** Transcode between Unicode forms. */
  | { kind: 'unicode'; from: UnicodeForm; to: UnicodeForm }
  /** Copy UTF-8, joining CESU-8 surrogate pairs and replacing bad sequences. */
  | { kind: 'utf8-clean' }
  | { kind: 'normalize-c'; from: UnicodeForm; to: UnicodeForm }
  | { kind: 'normalize-d'; from: UnicodeForm; to: UnicodeForm; service: DecompositionService }
  /** Re-encode UTF-8 written by tools that took wide characters to be Unicode. */
  | { kind: 'legacy-utf8' }
  | { kind: 'backend'; sourceUnit: 1 | 2; target: UnicodeForm | null }
  /** ASCII passes; other bytes become `?`, or U+FFFD for a UTF-8 target. `same` copies and validates. */
  | { kind: 'best-effort'; same: boolean; toUtf8: boolean }
  | { kind: 'best-effort-to-utf16'; to: UnicodeForm }
  | { kind: 'best-effort-from-utf16'; from: UnicodeForm };

export type StageKind = Stage['kind'];

/** What a stage may use besides its input and output. */
export type StageEnvironment = {
  transcoder: CharsetTranscoder | null;
  locale: SystemLocale;
  limits?: TextLimits | undefined;
};

const QUESTION_MARK = 0x3f;

/** Append the output of `stage` for `input` to `dest`. */
export function runStage(stage: Stage, dest: ByteBuffer, input: Uint8Array, env: StageEnvironment): SubstitutionCounts {
  switch (stage.kind) {
    case 'unicode':
      return appendUnicode(dest, input, stage.from, stage.to);
    case 'utf8-clean':
      return copyUtf8(dest, input);
    case 'normalize-c':
      return normalizeC(dest, input, input.length, stage.from, stage.to, env.limits ? { limits: env.limits } : {});
    case 'normalize-d':
      return normalizeD(dest, input, input.length, stage.from, stage.to, stage.service);
    case 'legacy-utf8':
      return appendLegacyUtf8(dest, input, env.locale);
    case 'backend':
      if (!env.transcoder) throw new ConversionError('TEXT_BACKEND_UNAVAILABLE', 'Backend stage has no open transcoder');
      return appendThroughBackend(dest, input, env.transcoder, stage.sourceUnit, stage.target);
    case 'best-effort':
      return stage.same ? copyAndValidate(dest, input, env.locale) : appendBestEffort(dest, input, stage.toUtf8);
    case 'best-effort-to-utf16':
      return appendBestEffortToUtf16(dest, input, stage.to);
    case 'best-effort-from-utf16':
      return appendBestEffortFromUtf16(dest, input, stage.from);
  }
}

function appendUnicode(dest: ByteBuffer, input: Uint8Array, from: UnicodeForm, to: UnicodeForm): SubstitutionCounts {
  const source = formCodec(from);
  const target = formCodec(to);
  const scale = source.unitSize === 2 ? 1 : target.unitSize;
  const writer = new ByteWriter(dest, target.unitSize, input.length * scale);
  const result = emptyCounts();
  let offset = 0;
  for (;;) {
    const { codePoint, consumed } = source.decode(input, offset, input.length - offset);
    if (consumed === 0) break;
    if (consumed < 0) result.malformed += 1;
    offset += Math.abs(consumed);
    writer.writeCodePoint(target, codePoint);
  }
  writer.finish();
  return result;
}

function copyUtf8(dest: ByteBuffer, input: Uint8Array): SubstitutionCounts {
  const target = formCodec('utf-8');
  const writer = new ByteWriter(dest, 1, input.length);
  const result = emptyCounts();
  let offset = 0;
  let runStart = 0;
  const flushRun = () => {
    if (offset > runStart) writer.writeBytes(input.subarray(runStart, offset));
  };
  for (;;) {
    const { codePoint, consumed } = decodeCesu8One(input, offset, input.length - offset);
    if (consumed === 0) break;
    if (consumed > 0 && consumed !== 6) {
      offset += consumed;
      continue;
    }
    flushRun();
    if (consumed < 0) result.malformed += 1;
    writer.writeCodePoint(target, codePoint);
    offset += Math.abs(consumed);
    runStart = offset;
  }
  flushRun();
  writer.finish();
  return result;
}

function appendLegacyUtf8(dest: ByteBuffer, input: Uint8Array, locale: SystemLocale): SubstitutionCounts {
  const writer = new ByteWriter(dest, 1, input.length);
  const result = emptyCounts();
  let offset = 0;
  for (;;) {
    const { codePoint, consumed } = decodeUtf8Lenient(input, offset, input.length - offset);
    if (consumed === 0) break;
    offset += Math.abs(consumed);
    if (consumed < 0) {
      result.malformed += 1;
      writer.writeByte(QUESTION_MARK);
      continue;
    }
    const wide = locale.wideUnitBits === 16 ? codePoint & 0xffff : codePoint;
    const encoded = locale.encodeCodePoint(wide);
    if (encoded === null) {
      result.unrepresentable += 1;
      writer.writeByte(QUESTION_MARK);
    } else {
      writer.writeBytes(encoded);
    }
  }
  writer.finish();
  return result;
}

function replacementFor(target: UnicodeForm | null): Uint8Array {
  switch (target) {
    case 'utf-8':
      return Uint8Array.of(0xef, 0xbf, 0xbd);
    case 'utf-16be':
      return Uint8Array.of(0xff, 0xfd);
    case 'utf-16le':
      return Uint8Array.of(0xfd, 0xff);
    case null:
      return Uint8Array.of(QUESTION_MARK);
  }
}

/**
 * Drive an external transcoder over `input`. Each illegal sequence is replaced
 * (U+FFFD for Unicode targets, `?` otherwise) and skipped: the transcoder's
 * reported length when it knows it, one source unit otherwise.
 */
function appendThroughBackend(
  dest: ByteBuffer,
  input: Uint8Array,
  transcoder: CharsetTranscoder,
  sourceUnit: 1 | 2,
  target: UnicodeForm | null
): SubstitutionCounts {
  const terminator = target === 'utf-16be' || target === 'utf-16le' ? 2 : 1;
  const writer = new ByteWriter(dest, terminator, input.length * 2);
  const replacement = replacementFor(target);
  const result = emptyCounts();
  transcoder.reset();

  let offset = 0;
  while (input.length - offset >= sourceUnit) {
    const step = transcoder.transcode(input.subarray(offset), writer.tail());
    writer.advance(step.produced);
    offset += step.consumed;
    if (step.status === 'completed') break;
    if (step.status === 'output-full') {
      writer.grow(Math.max((input.length - offset) * 2, 16));
      continue;
    }
    if (step.reason === 'unrepresentable') result.unrepresentable += 1;
    else result.malformed += 1;
    writer.writeBytes(replacement);
    offset += Math.max(step.length ?? sourceUnit, sourceUnit);
  }
  writer.finish();
  return result;
}

function copyAndValidate(dest: ByteBuffer, input: Uint8Array, locale: SystemLocale): SubstitutionCounts {
  const writer = new ByteWriter(dest, 1, input.length);
  writer.writeBytes(input);
  writer.finish();
  const result = emptyCounts();
  if (!locale.isValid(input)) result.malformed = 1;
  return result;
}

function appendBestEffort(dest: ByteBuffer, input: Uint8Array, toUtf8: boolean): SubstitutionCounts {
  const writer = new ByteWriter(dest, 1, input.length);
  const result = emptyCounts();
  const replacement = replacementFor(toUtf8 ? 'utf-8' : null);
  for (const byte of input) {
    if (byte === 0) break;
    if (byte < 0x80) {
      writer.writeByte(byte);
    } else {
      result.unrepresentable += 1;
      writer.writeBytes(replacement);
    }
  }
  writer.finish();
  return result;
}

function appendBestEffortToUtf16(dest: ByteBuffer, input: Uint8Array, to: UnicodeForm): SubstitutionCounts {
  const target = formCodec(to);
  const writer = new ByteWriter(dest, 2, input.length * 2);
  const result = emptyCounts();
  for (const byte of input) {
    if (byte >= 0x80) result.unrepresentable += 1;
    writer.writeCodePoint(target, byte < 0x80 ? byte : REPLACEMENT_CHARACTER);
  }
  writer.finish();
  return result;
}

function appendBestEffortFromUtf16(dest: ByteBuffer, input: Uint8Array, from: UnicodeForm): SubstitutionCounts {
  const source = formCodec(from);
  const writer = new ByteWriter(dest, 1, input.length);
  const result = emptyCounts();
  let offset = 0;
  for (;;) {
    const { codePoint, consumed } = source.decode(input, offset, input.length - offset);
    if (consumed === 0) break;
    offset += Math.abs(consumed);
    if (consumed < 0) result.malformed += 1;
    else if (codePoint > 0x7f) result.unrepresentable += 1;
    writer.writeByte(codePoint > 0x7f ? QUESTION_MARK : codePoint);
  }
  writer.finish();
  return result;
}
