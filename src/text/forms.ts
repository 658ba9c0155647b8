import { outOfMemory } from '../errors.js';
import type { ByteBuffer } from './TextBuffer.js';
import type { DecodeResult } from './unicode.js';
import { decodeCesu8One, writeUtf8One } from './utf8.js';
import { decodeUtf16One, writeUtf16One } from './utf16.js';

/** Unicode encoding forms this engine transcodes without a backend. */
export type UnicodeForm = 'utf-8' | 'utf-16be' | 'utf-16le';

/** Decoder/encoder pair for one Unicode form. */
export type FormCodec = {
  form: UnicodeForm;
  /** Bytes per code unit; also the width of the terminator. */
  unitSize: 1 | 2;
  /** Source bytes of a surrogate pair (CESU-8 in UTF-8). */
  pairSize: number;
  decode(bytes: Uint8Array, offset: number, maxLen: number): DecodeResult;
  write(out: Uint8Array, offset: number, remaining: number, codePoint: number): number;
};

const UTF8_CODEC: FormCodec = {
  form: 'utf-8',
  unitSize: 1,
  pairSize: 6,
  decode: decodeCesu8One,
  write: writeUtf8One
};

const UTF16BE_CODEC: FormCodec = {
  form: 'utf-16be',
  unitSize: 2,
  pairSize: 4,
  decode: (bytes, offset, maxLen) => decodeUtf16One(bytes, offset, maxLen, 'be'),
  write: (out, offset, remaining, codePoint) => writeUtf16One(out, offset, remaining, codePoint, 'be')
};

const UTF16LE_CODEC: FormCodec = {
  form: 'utf-16le',
  unitSize: 2,
  pairSize: 4,
  decode: (bytes, offset, maxLen) => decodeUtf16One(bytes, offset, maxLen, 'le'),
  write: (out, offset, remaining, codePoint) => writeUtf16One(out, offset, remaining, codePoint, 'le')
};

export function formCodec(form: UnicodeForm): FormCodec {
  switch (form) {
    case 'utf-8':
      return UTF8_CODEC;
    case 'utf-16be':
      return UTF16BE_CODEC;
    case 'utf-16le':
      return UTF16LE_CODEC;
  }
}

/** Substitutions made while producing output. */
export type SubstitutionCounts = {
  /** Source sequences that violated their encoding and were replaced. */
  malformed: number;
  /** Valid characters with no mapping in the target, replaced per policy. */
  unrepresentable: number;
  /** Output was produced without exact handling (capped combining run, unnormalized fallback). */
  bestEffort: boolean;
};

export function emptyCounts(): SubstitutionCounts {
  return { malformed: 0, unrepresentable: 0, bestEffort: false };
}

export function addCounts(target: SubstitutionCounts, source: SubstitutionCounts): void {
  target.malformed += source.malformed;
  target.unrepresentable += source.unrepresentable;
  target.bestEffort = target.bestEffort || source.bestEffort;
}

/**
 * Appends to a byte buffer past its current length, growing it on demand and
 * terminating it with `terminatorBytes` zero bytes on `finish()`. Growth failure
 * throws TEXT_OUT_OF_MEMORY.
 */
export class ByteWriter {
  private position: number;

  constructor(
    private readonly dest: ByteBuffer,
    private readonly terminatorBytes: 1 | 2,
    expectedBytes = 0
  ) {
    this.position = dest.length;
    this.reserve(expectedBytes);
  }

  get length(): number {
    return this.position;
  }

  reserve(bytes: number): void {
    const needed = this.position + bytes + this.terminatorBytes;
    if (!this.dest.ensure(needed)) {
      throw outOfMemory(needed);
    }
  }

  /** Grow so that at least `bytes` more than the current free space is available. */
  grow(bytes: number): void {
    this.reserve(this.available() + bytes);
  }

  /** Free space after the position for in-place writes; pair with `advance()`. */
  tail(): Uint8Array {
    return this.dest.raw().subarray(this.position, this.dest.capacity - this.terminatorBytes);
  }

  advance(bytes: number): void {
    this.position += bytes;
  }

  private available(): number {
    return this.dest.capacity - this.terminatorBytes - this.position;
  }

  writeByte(value: number): void {
    if (this.available() < 1) this.reserve(1);
    this.dest.raw()[this.position] = value;
    this.position += 1;
  }

  writeBytes(bytes: Uint8Array): void {
    if (this.available() < bytes.length) this.reserve(bytes.length);
    this.dest.raw().set(bytes, this.position);
    this.position += bytes.length;
  }

  writeCodePoint(codec: FormCodec, codePoint: number): void {
    let written = codec.write(this.dest.raw(), this.position, this.available(), codePoint);
    while (written === 0) {
      this.reserve(4);
      written = codec.write(this.dest.raw(), this.position, this.available(), codePoint);
    }
    this.position += written;
  }

  finish(): void {
    this.reserve(0);
    this.dest.setLength(this.position, this.terminatorBytes);
  }
}
