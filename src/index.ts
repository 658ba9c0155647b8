export { ByteBuffer, TextBuffer, WideBuffer } from './text/TextBuffer.js';
export type { AllocationFailureMode, TextBufferOptions } from './text/TextBuffer.js';

export { REPLACEMENT_CHARACTER, UNICODE_MAX, isScalarValue } from './text/unicode.js';
export type { DecodeResult } from './text/unicode.js';
export {
  decodeCesu8One,
  decodeUtf8Lenient,
  decodeUtf8One,
  encodeUtf8One,
  isValidUtf8,
  utf8Length,
  writeUtf8One
} from './text/utf8.js';
export { decodeUtf16One, encodeUtf16One, utf16Length, writeUtf16One } from './text/utf16.js';
export type { Endianness } from './text/utf16.js';
export type { SubstitutionCounts, UnicodeForm } from './text/forms.js';

export { normalizeC } from './text/normalizeC.js';
export type { NormalizeOptions } from './text/normalizeC.js';
export { normalizeD, runtimeDecomposition } from './text/normalizeD.js';
export type { DecompositionService } from './text/normalizeD.js';
export { combiningClass, composePair } from './text/unicodeTables.js';

export {
  CP_UTF8,
  UTF16BE,
  UTF16LE,
  UTF8,
  canonicalCharset,
  charsetForCodepage,
  codepageOf,
  unicodeFormOf
} from './conversion/charsets.js';
export { NO_BACKEND } from './conversion/backend.js';
export type {
  CharsetBackend,
  CharsetBackendKind,
  CharsetTranscoder,
  IllegalReason,
  TranscodeResult,
  TranscodeStatus
} from './conversion/backend.js';
export { createCodepageBackend, createDecompositionBackend, createExternalBackend } from './conversion/iconvBackend.js';
export { ConversionProfile } from './conversion/ConversionProfile.js';
export type {
  ConversionDirection,
  ConversionProfileOptions,
  ConversionResult,
  ProfileFlags,
  SubstitutionPolicy
} from './conversion/ConversionProfile.js';
export type { StageKind } from './conversion/stages.js';
export { ProfileRegistry } from './conversion/ProfileRegistry.js';
export type { ProfileRegistryOptions, ProfileRequest } from './conversion/ProfileRegistry.js';

export { SystemLocale } from './locale/SystemLocale.js';
export type { SystemLocaleOptions } from './locale/SystemLocale.js';
export { detectSystemCharset, localeName } from './locale/detect.js';
export type { LocaleEnvironment } from './locale/detect.js';

export { MultiFormString } from './mstring/MultiFormString.js';
export type { FormResult, MultiFormStringOptions, StringForm } from './mstring/MultiFormString.js';

export { ConversionError } from './errors.js';
export type { ConversionErrorCode, ConversionWarning, ConversionWarningCode } from './errors.js';
export { DEFAULT_TEXT_LIMITS, STRICT_TEXT_LIMITS, resolveTextLimits } from './limits.js';
export type { TextLimits, TextProfile } from './limits.js';
export { POLYTEXT_REPORT_SCHEMA_VERSION } from './reportSchema.js';
