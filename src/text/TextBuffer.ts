import { boundedLength, decodeUtf8 } from '../binary.js';
import { abortProcess } from '../fatal.js';
import { resolveTextLimits, type TextLimits } from '../limits.js';

/** What a buffer does when it cannot grow. */
export type AllocationFailureMode = 'recover' | 'abort';

/** Options shared by byte and wide buffers. */
export type TextBufferOptions = {
  limits?: TextLimits;
  /** `abort` terminates the process instead of returning false (legacy behavior). */
  allocationFailure?: AllocationFailureMode;
};

const INITIAL_UNITS = 32;
const DOUBLING_LIMIT = 8192;
/** Bound used by strcat(), which has no caller-supplied length. */
const STRCAT_BOUND = 0x1000000;

type UnitArray = Uint8Array | Uint16Array | Uint32Array;

function isUnitArray(data: ArrayLike<number>): data is UnitArray {
  return data instanceof Uint8Array || data instanceof Uint16Array || data instanceof Uint32Array;
}

/**
 * Growable, always-terminated sequence of code units.
 *
 * Capacity grows from 32 units, doubling below 8 KiB and by 25% above, and never
 * shrinks: `clear()` keeps the storage for the next use. Every growth path
 * returns `false` on failure after resetting the buffer to empty.
 */
export abstract class TextBuffer<A extends UnitArray> {
  protected units: A;
  protected used = 0;
  private readonly maxUnits: number;
  private readonly abortOnFailure: boolean;

  protected constructor(options?: TextBufferOptions) {
    this.maxUnits = resolveTextLimits(options?.limits).maxBufferUnits;
    this.abortOnFailure = options?.allocationFailure === 'abort';
    this.units = this.allocate(0);
  }

  protected abstract allocate(size: number): A;

  /** Text units, excluding the terminator. The view is invalidated by the next growth. */
  abstract view(): A;

  /** Number of text units, excluding the terminator. */
  get length(): number {
    return this.used;
  }

  /** Allocated units, including room for the terminator. */
  get capacity(): number {
    return this.units.length;
  }

  /** Underlying storage for in-place writes; call `ensure()` first and `setLength()` after. */
  raw(): A {
    return this.units;
  }

  /** Grow to hold at least `minCapacity` units. */
  ensure(minCapacity: number): boolean {
    if (!Number.isSafeInteger(minCapacity) || minCapacity < 0) {
      return this.fail(`invalid capacity request ${minCapacity}`);
    }
    const current = this.units.length;
    if (current > 0 && minCapacity <= current) return true;

    let next: number;
    if (current < INITIAL_UNITS) {
      next = INITIAL_UNITS;
    } else if (current < DOUBLING_LIMIT) {
      next = current + current;
    } else {
      next = current + Math.floor(current / 4);
      if (!Number.isSafeInteger(next)) {
        return this.fail(`capacity overflow growing from ${current} units`);
      }
    }
    if (next < minCapacity) next = minCapacity;
    if (minCapacity > this.maxUnits) {
      return this.fail(`${minCapacity} units exceeds the ${this.maxUnits} unit limit`);
    }
    if (next > this.maxUnits) next = this.maxUnits;

    let grown: A;
    try {
      grown = this.allocate(next);
    } catch (error) {
      if (error instanceof RangeError) {
        return this.fail(`allocation of ${next} units failed`);
      }
      throw error;
    }
    grown.set(this.units);
    this.units = grown;
    return true;
  }

  /** Set the text length after in-place writes and write `terminatorUnits` zero units after it. */
  setLength(length: number, terminatorUnits = 1): void {
    if (length < 0 || length + terminatorUnits > this.units.length) {
      throw new RangeError(`length ${length} does not fit capacity ${this.units.length}`);
    }
    this.used = length;
    this.units.fill(0, length, length + terminatorUnits);
  }

  /** Append exactly `count` units of `data` (clamped to its length). */
  append(data: ArrayLike<number>, count: number = data.length): boolean {
    const n = Math.max(0, Math.min(count, data.length));
    if (!this.ensure(this.used + n + 1)) return false;
    if (isUnitArray(data)) {
      this.units.set(data.subarray(0, n), this.used);
    } else {
      for (let i = 0; i < n; i += 1) {
        this.units[this.used + i] = data[i]!;
      }
    }
    this.used += n;
    this.units[this.used] = 0;
    return true;
  }

  /** Append units up to the first zero unit, never examining positions at or beyond `max`. */
  appendBounded(data: ArrayLike<number>, max: number): boolean {
    return this.append(data, boundedLength(data, max));
  }

  /** Append a zero-terminated sequence. */
  strcat(data: ArrayLike<number>): boolean {
    return this.appendBounded(data, STRCAT_BOUND);
  }

  /** Append a single unit. */
  appendUnit(unit: number): boolean {
    if (!this.ensure(this.used + 2)) return false;
    this.units[this.used] = unit;
    this.used += 1;
    this.units[this.used] = 0;
    return true;
  }

  /** Append the text of another buffer of the same kind. */
  concat(other: TextBuffer<A>): boolean {
    return this.append(other.view());
  }

  /** Replace the contents with those of another buffer. */
  copyFrom(other: TextBuffer<A>): boolean {
    this.clear();
    return this.append(other.view());
  }

  /** Empty the text, keeping the storage. */
  clear(): void {
    this.used = 0;
    if (this.units.length > 0) this.units[0] = 0;
  }

  /** Release the storage. */
  free(): void {
    this.used = 0;
    this.units = this.allocate(0);
  }

  private fail(reason: string): false {
    this.free();
    if (this.abortOnFailure) {
      abortProcess(`Out of memory: ${reason}`);
    }
    return false;
  }
}

/** Growable byte string (multibyte, UTF-8 or UTF-16 encoded). */
export class ByteBuffer extends TextBuffer<Uint8Array> {
  constructor(options?: TextBufferOptions) {
    super(options);
  }

  /** Create a buffer holding `data`. */
  static from(data: ArrayLike<number>, options?: TextBufferOptions): ByteBuffer {
    const buffer = new ByteBuffer(options);
    buffer.append(data);
    return buffer;
  }

  protected allocate(size: number): Uint8Array {
    return new Uint8Array(size);
  }

  view(): Uint8Array {
    return this.units.subarray(0, this.used);
  }

  /** Copy of the text bytes. */
  bytes(): Uint8Array {
    return this.units.slice(0, this.used);
  }

  /** Decode the bytes as UTF-8, replacing malformed sequences. */
  text(): string {
    return decodeUtf8(this.view());
  }
}

/** Growable wide-character string; each unit holds one platform wide character. */
export class WideBuffer extends TextBuffer<Uint32Array> {
  constructor(options?: TextBufferOptions) {
    super(options);
  }

  protected allocate(size: number): Uint32Array {
    return new Uint32Array(size);
  }

  view(): Uint32Array {
    return this.units.subarray(0, this.used);
  }

  /**
   * Decode the wide units into a string. Units are read as UTF-16 code units when
   * `unitBits` is 16 and as code points otherwise; values that are not scalars
   * become U+FFFD.
   */
  text(unitBits: 16 | 32 = 32): string {
    const units = this.view();
    let out = '';
    for (let i = 0; i < units.length; i += 1) {
      let unit = units[i]!;
      if (unitBits === 16) {
        unit &= 0xffff;
        const next = i + 1 < units.length ? units[i + 1]! & 0xffff : 0;
        if (unit >= 0xd800 && unit <= 0xdbff && next >= 0xdc00 && next <= 0xdfff) {
          unit = 0x10000 + ((unit - 0xd800) << 10) + (next - 0xdc00);
          i += 1;
        }
      }
      out += unit > 0x10ffff || (unit >= 0xd800 && unit <= 0xdfff) ? '\ufffd' : String.fromCodePoint(unit);
    }
    return out;
  }
}
