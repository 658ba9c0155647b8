import { Buffer } from 'node:buffer';
import iconv from 'iconv-lite';
import { runtimeDecomposition, type DecompositionService } from '../text/normalizeD.js';
import type { CharsetBackend, CharsetTranscoder, TranscodeResult } from './backend.js';
import { charsetForCodepage, codepageOf } from './charsets.js';

type Decoder = ReturnType<typeof iconv.getDecoder>;
type Encoder = ReturnType<typeof iconv.getEncoder>;

const EMPTY = new Uint8Array(0);
const QUESTION_MARK = 0x3f;

function hasLoneSurrogate(text: string): boolean {
  for (let i = 0; i < text.length; i += 1) {
    const unit = text.charCodeAt(i);
    if (unit >= 0xd800 && unit <= 0xdbff) {
      const next = text.charCodeAt(i + 1);
      if (!(next >= 0xdc00 && next <= 0xdfff)) return true;
      i += 1;
    } else if (unit >= 0xdc00 && unit <= 0xdfff) {
      return true;
    }
  }
  return false;
}

function endsWithHighSurrogate(text: string): boolean {
  const last = text.charCodeAt(text.length - 1);
  return last >= 0xd800 && last <= 0xdbff;
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}

/** Encoding of U+FFFD in `charset`, or null when the charset cannot hold it. */
export function replacementBytes(charset: string): Uint8Array | null {
  const encoded = new Uint8Array(iconv.encode('\ufffd', charset, { addBOM: false }));
  return encoded.length === 0 || isSubstitution(encoded, '\ufffd') ? null : encoded;
}

/**
 * True when `text`, decoded from `source`, marks a decoding error. iconv-lite
 * decodes bad input to U+FFFD, so a U+FFFD counts as an error unless `source`
 * is exactly the charset's own encoding of it.
 */
export function isDecodeError(text: string, source: Uint8Array, replacement: Uint8Array | null): boolean {
  if (hasLoneSurrogate(text)) return true;
  if (!text.includes('\ufffd')) return false;
  return !(text === '\ufffd' && replacement !== null && sameBytes(source, replacement));
}

/** iconv-lite substitutes `?` for characters the target charset cannot hold. */
function isSubstitution(encoded: Uint8Array, text: string): boolean {
  return encoded.length > 0 && encoded.every((byte) => byte === QUESTION_MARK) && !/^\?+$/.test(text);
}

/**
 * Transcoder over an iconv-lite decoder/encoder pair. Input is fed one byte at
 * a time so that the position of an undecodable or unmappable character is
 * known exactly.
 */
class IconvTranscoder implements CharsetTranscoder {
  private decoder: Decoder;
  private encoder: Encoder;
  private pending: Uint8Array = EMPTY;
  private closed = false;
  private readonly replacement: Uint8Array | null;

  constructor(
    private readonly fromCharset: string,
    private readonly toCharset: string
  ) {
    this.decoder = iconv.getDecoder(fromCharset, { stripBOM: false });
    this.encoder = iconv.getEncoder(toCharset, { addBOM: false });
    this.replacement = replacementBytes(fromCharset);
  }

  transcode(input: Uint8Array, output: Uint8Array): TranscodeResult {
    if (this.closed) throw new Error('Transcoder is closed');
    let produced = 0;
    if (this.pending.length > 0) {
      const count = Math.min(this.pending.length, output.length);
      output.set(this.pending.subarray(0, count));
      produced = count;
      this.pending = this.pending.subarray(count);
      if (this.pending.length > 0) return { consumed: 0, produced, status: 'output-full' };
    }

    let consumed = 0;
    let cursor = 0;
    let text = '';
    while (cursor < input.length) {
      text += this.decoder.write(Buffer.from(input.buffer, input.byteOffset + cursor, 1));
      cursor += 1;
      if (text.length === 0 || endsWithHighSurrogate(text)) continue;

      if (isDecodeError(text, input.subarray(consumed, cursor), this.replacement)) {
        this.resetDecoder();
        return { consumed, produced, status: 'illegal-sequence', reason: 'malformed' };
      }
      const encoded = new Uint8Array(this.encoder.write(text));
      if (isSubstitution(encoded, text)) {
        return { consumed, produced, status: 'illegal-sequence', reason: 'unrepresentable', length: cursor - consumed };
      }
      consumed = cursor;
      text = '';
      const room = output.length - produced;
      if (encoded.length > room) {
        output.set(encoded.subarray(0, room), produced);
        this.pending = encoded.subarray(room);
        return { consumed, produced: output.length, status: 'output-full' };
      }
      output.set(encoded, produced);
      produced += encoded.length;
    }

    if (cursor > consumed) {
      // Input ended inside a character.
      this.resetDecoder();
      return { consumed, produced, status: 'illegal-sequence', reason: 'malformed' };
    }
    return { consumed, produced, status: 'completed' };
  }

  reset(): void {
    this.resetDecoder();
    this.encoder = iconv.getEncoder(this.toCharset, { addBOM: false });
    this.pending = EMPTY;
  }

  close(): void {
    this.pending = EMPTY;
    this.closed = true;
  }

  private resetDecoder(): void {
    this.decoder = iconv.getDecoder(this.fromCharset, { stripBOM: false });
  }
}

/** Name iconv-lite knows for a charset, or null. */
function resolveByName(charset: string): string | null {
  return iconv.encodingExists(charset) ? charset : null;
}

function resolveByCodepage(charset: string): string | null {
  const direct = resolveByName(charset);
  if (direct) return direct;
  const codepage = codepageOf(charset);
  if (codepage === null) return null;
  return resolveByName(charsetForCodepage(codepage)) ?? resolveByName(`windows-${codepage}`);
}

function openWith(resolve: (charset: string) => string | null) {
  return (fromCharset: string, toCharset: string): CharsetTranscoder | null => {
    const from = resolve(fromCharset);
    const to = resolve(toCharset);
    if (from === null || to === null) return null;
    return new IconvTranscoder(from, to);
  };
}

/** Backend that opens iconv-lite transcoders by charset name. */
export function createExternalBackend(): CharsetBackend {
  return { kind: 'external', open: openWith(resolveByName) };
}

/** Backend that also resolves codepage names (`CP1252`, `IBM850`, `WINDOWS-1251`). */
export function createCodepageBackend(): CharsetBackend {
  return { kind: 'codepage', open: openWith(resolveByCodepage) };
}

/** External backend with a platform decomposition service for NFD output. */
export function createDecompositionBackend(decomposition: DecompositionService = runtimeDecomposition): CharsetBackend {
  return { kind: 'decomposition', open: openWith(resolveByName), decomposition };
}
