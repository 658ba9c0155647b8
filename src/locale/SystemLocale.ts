import { Buffer } from 'node:buffer';
import iconv from 'iconv-lite';
import { boundedLength } from '../binary.js';
import { canonicalCharset, UTF8 } from '../conversion/charsets.js';
import { isDecodeError, replacementBytes } from '../conversion/iconvBackend.js';
import { outOfMemory } from '../errors.js';
import type { ByteBuffer, WideBuffer } from '../text/TextBuffer.js';
import { REPLACEMENT_CHARACTER, combineSurrogatePair, isHighSurrogate, isLowSurrogate, isScalarValue } from '../text/unicode.js';
import { decodeUtf8One, encodeUtf8One } from '../text/utf8.js';
import { detectSystemCharset, type LocaleEnvironment } from './detect.js';

/** Options for the process-independent view of the system locale. */
export type SystemLocaleOptions = {
  /** Charset of system strings; detected from `env` when omitted. */
  charset?: string;
  /** Bits per wide character: 16 stores UTF-16 code units, 32 stores code points. */
  wideUnitBits?: 16 | 32;
  env?: LocaleEnvironment;
};

const ASCII_NAMES = new Set(['US-ASCII', 'ASCII', 'ANSI_X3.4-1968', '646', 'US']);
const QUESTION_MARK = Uint8Array.of(0x3f);

type Codeset = { kind: 'utf-8' } | { kind: 'ascii' } | { kind: 'external'; name: string; replacement: Uint8Array | null };

type Decoded = { codePoints: number[]; valid: boolean };

function pushCodePoints(codePoints: number[], text: string): void {
  for (const ch of text) {
    const codePoint = ch.codePointAt(0);
    if (codePoint !== undefined) codePoints.push(codePoint);
  }
}

/**
 * The system character set and the native conversions between system strings
 * and wide strings.
 *
 * The charset is read from the environment on first use and cached until
 * `forget()`. Charsets iconv-lite does not know are handled as US-ASCII.
 */
export class SystemLocale {
  readonly wideUnitBits: 16 | 32;
  private readonly override: string | undefined;
  private readonly env: LocaleEnvironment;
  private detected: string | null = null;
  private resolvedCodeset: { charset: string; codeset: Codeset } | null = null;

  constructor(options: SystemLocaleOptions = {}) {
    this.wideUnitBits = options.wideUnitBits ?? 32;
    this.override = options.charset === undefined ? undefined : canonicalCharset(options.charset);
    this.env = options.env ?? process.env;
  }

  /** Canonical name of the system charset. */
  get charset(): string {
    if (this.override !== undefined) return this.override;
    if (this.detected === null) this.detected = canonicalCharset(detectSystemCharset(this.env));
    return this.detected;
  }

  /** Drop the cached charset so the next use reads the environment again. */
  forget(): void {
    this.detected = null;
  }

  /**
   * Append the wide characters of system string `bytes` (up to its first NUL) to
   * `dest`. Undecodable sequences become U+FFFD and make the result false.
   */
  decode(dest: WideBuffer, bytes: Uint8Array): boolean {
    const { codePoints, valid } = this.decodeCodePoints(bytes);
    const units: number[] = [];
    for (const codePoint of codePoints) {
      if (this.wideUnitBits === 16 && codePoint > 0xffff) {
        const offset = codePoint - 0x10000;
        units.push(0xd800 + (offset >> 10), 0xdc00 + (offset & 0x3ff));
      } else {
        units.push(codePoint);
      }
    }
    if (!dest.append(units)) throw outOfMemory(dest.length + units.length + 1);
    return valid;
  }

  /**
   * Append the system encoding of wide string `units` (up to its first zero unit)
   * to `dest`. Characters the charset cannot hold become `?` and make the result
   * false.
   */
  encode(dest: ByteBuffer, units: ArrayLike<number>): boolean {
    const count = boundedLength(units, units.length);
    const out: number[] = [];
    let ok = true;
    for (let i = 0; i < count; i += 1) {
      let value = units[i]!;
      if (this.wideUnitBits === 16) {
        value &= 0xffff;
        const next = i + 1 < count ? units[i + 1]! & 0xffff : 0;
        if (isHighSurrogate(value) && isLowSurrogate(next)) {
          value = combineSurrogatePair(value, next);
          i += 1;
        }
      }
      const encoded = this.encodeCodePoint(value);
      if (encoded === null) ok = false;
      for (const byte of encoded ?? QUESTION_MARK) out.push(byte);
    }
    if (!dest.append(out)) throw outOfMemory(dest.length + out.length + 1);
    return ok;
  }

  /** System encoding of one code point, or null when the charset cannot hold it. */
  encodeCodePoint(codePoint: number): Uint8Array | null {
    if (!isScalarValue(codePoint)) return null;
    const codeset = this.codeset();
    switch (codeset.kind) {
      case 'utf-8':
        return encodeUtf8One(codePoint);
      case 'ascii':
        return codePoint < 0x80 ? Uint8Array.of(codePoint) : null;
      case 'external': {
        const text = String.fromCodePoint(codePoint);
        const encoded = new Uint8Array(iconv.encode(text, codeset.name, { addBOM: false }));
        const substituted = encoded.length === 1 && encoded[0] === 0x3f && text !== '?';
        return substituted || encoded.length === 0 ? null : encoded;
      }
    }
  }

  /** True when every sequence of system string `bytes` decodes. */
  isValid(bytes: Uint8Array): boolean {
    return this.decodeCodePoints(bytes).valid;
  }

  private codeset(): Codeset {
    const charset = this.charset;
    if (this.resolvedCodeset?.charset === charset) return this.resolvedCodeset.codeset;
    let codeset: Codeset;
    if (charset === UTF8) codeset = { kind: 'utf-8' };
    else if (ASCII_NAMES.has(charset) || !iconv.encodingExists(charset)) codeset = { kind: 'ascii' };
    else codeset = { kind: 'external', name: charset, replacement: replacementBytes(charset) };
    this.resolvedCodeset = { charset, codeset };
    return codeset;
  }

  private decodeCodePoints(bytes: Uint8Array): Decoded {
    const length = boundedLength(bytes, bytes.length);
    const codeset = this.codeset();
    const codePoints: number[] = [];
    let valid = true;
    switch (codeset.kind) {
      case 'utf-8': {
        let offset = 0;
        while (offset < length) {
          const { codePoint, consumed } = decodeUtf8One(bytes, offset, length - offset);
          if (consumed === 0) break;
          if (consumed < 0) valid = false;
          codePoints.push(codePoint);
          offset += Math.abs(consumed);
        }
        break;
      }
      case 'ascii':
        for (let i = 0; i < length; i += 1) {
          const byte = bytes[i]!;
          if (byte >= 0x80) valid = false;
          codePoints.push(byte < 0x80 ? byte : REPLACEMENT_CHARACTER);
        }
        break;
      case 'external': {
        const decoder = iconv.getDecoder(codeset.name, { stripBOM: false });
        let start = 0;
        let text = '';
        for (let i = 0; i < length; i += 1) {
          text += decoder.write(Buffer.from(bytes.buffer, bytes.byteOffset + i, 1));
          if (text.length === 0 || isHighSurrogate(text.charCodeAt(text.length - 1))) continue;
          if (isDecodeError(text, bytes.subarray(start, i + 1), codeset.replacement)) valid = false;
          pushCodePoints(codePoints, text);
          start = i + 1;
          text = '';
        }
        const tail = text + (decoder.end() ?? '');
        if (start < length) {
          // Input ended inside a character.
          valid = false;
          pushCodePoints(codePoints, tail.length > 0 ? tail : '\ufffd');
        }
        break;
      }
    }
    return { codePoints, valid };
  }
}
