import { boundedLength, boundedLength16 } from '../binary.js';
import { ConversionError, outOfMemory, type ConversionWarning } from '../errors.js';
import type { TextLimits } from '../limits.js';
import { SystemLocale } from '../locale/SystemLocale.js';
import { addCounts, emptyCounts, type SubstitutionCounts, type UnicodeForm } from '../text/forms.js';
import { ByteBuffer } from '../text/TextBuffer.js';
import { NO_BACKEND, type CharsetBackend, type CharsetTranscoder } from './backend.js';
import { canonicalCharset, codepageOf, unicodeFormOf } from './charsets.js';
import { runStage, type Stage, type StageEnvironment, type StageKind } from './stages.js';

/** Which side of a conversion is the system charset. */
export type ConversionDirection = 'toCharset' | 'fromCharset';

/** Properties of a profile derived from its charsets and options. */
export type ProfileFlags = {
  direction: ConversionDirection;
  fromUtf8: boolean;
  toUtf8: boolean;
  fromUtf16be: boolean;
  toUtf16be: boolean;
  fromUtf16le: boolean;
  toUtf16le: boolean;
  /** Both sides name the same charset or resolve to the same codepage. */
  same: boolean;
  bestEffort: boolean;
  legacyUtf8: boolean;
  normalizeC: boolean;
  normalizeD: boolean;
};

export type ConversionProfileOptions = {
  direction: ConversionDirection;
  /** Accept lossy stages when no exact conversion exists. */
  bestEffort?: boolean;
  /** Reinterpret UTF-8 written under the assumption that wide characters are Unicode. */
  legacyUtf8?: boolean;
  backend?: CharsetBackend;
  locale?: SystemLocale;
  limits?: TextLimits;
  /** `error` throws after a conversion that substituted characters instead of warning. */
  substitution?: SubstitutionPolicy;
  onWarning?: (warning: ConversionWarning) => void;
};

/** What a conversion does after replacing malformed or unrepresentable input. */
export type SubstitutionPolicy = 'replace' | 'error';

/** Outcome of one conversion; output is produced either way. */
export type ConversionResult = SubstitutionCounts & {
  /** True when nothing was substituted and no stage fell back to best effort. */
  ok: boolean;
};

function isUtf16(form: UnicodeForm | null): form is 'utf-16be' | 'utf-16le' {
  return form === 'utf-16be' || form === 'utf-16le';
}

/**
 * A conversion between two charsets: the flags derived from the pair and a
 * pipeline of at most two stages.
 *
 * When a pipeline has two stages the first (normalization) writes to a scratch
 * buffer owned by the profile and the second reads from it. A profile is used
 * by one caller at a time.
 */
export class ConversionProfile {
  readonly fromCharset: string;
  readonly toCharset: string;
  private readonly fromForm: UnicodeForm | null;
  private readonly toForm: UnicodeForm | null;
  private readonly state: ProfileFlags;
  private readonly backend: CharsetBackend;
  private readonly locale: SystemLocale;
  private readonly limits: TextLimits | undefined;
  private readonly substitution: SubstitutionPolicy;
  private readonly onWarning: ((warning: ConversionWarning) => void) | undefined;
  private readonly scratch: ByteBuffer;
  private transcoder: CharsetTranscoder | null;
  private stages: Stage[];
  private disposed = false;

  /** @throws ConversionError `TEXT_UNSUPPORTED_CONVERSION` when no pipeline exists for the pair. */
  constructor(fromCharset: string, toCharset: string, options: ConversionProfileOptions) {
    this.fromCharset = canonicalCharset(fromCharset);
    this.toCharset = canonicalCharset(toCharset);
    this.backend = options.backend ?? NO_BACKEND;
    this.locale = options.locale ?? new SystemLocale();
    this.limits = options.limits;
    this.substitution = options.substitution ?? 'replace';
    this.onWarning = options.onWarning;
    this.scratch = new ByteBuffer(options.limits ? { limits: options.limits } : undefined);
    this.fromForm = unicodeFormOf(this.fromCharset);
    this.toForm = unicodeFormOf(this.toCharset);

    const fromCharsetDirection = options.direction === 'fromCharset';
    const normalize = fromCharsetDirection && this.fromForm !== null;
    const decompose = normalize && this.backend.decomposition !== undefined && this.toForm === 'utf-8';
    this.state = {
      direction: options.direction,
      fromUtf8: this.fromForm === 'utf-8',
      toUtf8: this.toForm === 'utf-8',
      fromUtf16be: this.fromForm === 'utf-16be',
      toUtf16be: this.toForm === 'utf-16be',
      fromUtf16le: this.fromForm === 'utf-16le',
      toUtf16le: this.toForm === 'utf-16le',
      same: this.isSameCharset(),
      bestEffort: options.bestEffort ?? false,
      legacyUtf8: false,
      normalizeC: normalize && !decompose,
      normalizeD: decompose
    };

    this.transcoder =
      this.fromForm !== null && this.toForm !== null ? null : this.backend.open(this.fromCharset, this.toCharset);
    this.stages = this.buildStages();
    if (options.legacyUtf8) this.setLegacyUtf8(true);
    if (this.stages.length === 0) {
      this.dispose();
      throw new ConversionError(
        'TEXT_UNSUPPORTED_CONVERSION',
        `No conversion from ${this.fromCharset} to ${this.toCharset} is available`,
        { fromCharset: this.fromCharset, toCharset: this.toCharset, context: { backend: this.backend.kind } }
      );
    }
  }

  /** Flags derived at construction; `legacyUtf8` follows `setLegacyUtf8()`. */
  get flags(): Readonly<ProfileFlags> {
    return this.state;
  }

  /** Kinds of the pipeline stages, in order. */
  get pipeline(): StageKind[] {
    return this.stages.map((stage) => stage.kind);
  }

  /** Name of the charset on the non-system side. */
  charsetName(): string {
    return this.state.direction === 'toCharset' ? this.toCharset : this.fromCharset;
  }

  /**
   * Switch the reinterpretation of legacy UTF-8 on or off and rebuild the
   * pipeline. Has no effect when wide characters are 32-bit code points,
   * since such UTF-8 is already correct.
   */
  setLegacyUtf8(enabled: boolean): void {
    if (this.locale.wideUnitBits === 32) return;
    this.state.legacyUtf8 = enabled;
    this.stages = this.buildStages();
  }

  /**
   * Convert `input`, read up to its first NUL (a two-byte NUL for UTF-16 sources)
   * within `length` bytes, and append the result to `dest`.
   *
   * @throws ConversionError `TEXT_OUT_OF_MEMORY` when an output buffer cannot grow.
   * @throws ConversionError `TEXT_MALFORMED_INPUT` or `TEXT_UNREPRESENTABLE` under the
   * `error` substitution policy; `dest` holds the substituted output.
   */
  convert(input: Uint8Array, length: number, dest: ByteBuffer): ConversionResult {
    if (this.disposed) {
      throw new ConversionError('TEXT_INVALID_ARGUMENT', 'Conversion profile has been disposed', {
        fromCharset: this.fromCharset,
        toCharset: this.toCharset
      });
    }
    const bound = Math.max(0, Math.min(length, input.length));
    const sourceLength = isUtf16(this.fromForm) ? boundedLength16(input, bound) : boundedLength(input, bound);
    const total = emptyCounts();

    if (sourceLength === 0) {
      const terminator = isUtf16(this.toForm) ? 2 : 1;
      if (!dest.ensure(dest.length + terminator)) throw outOfMemory(dest.length + terminator);
      dest.setLength(dest.length, terminator);
      return { ok: true, ...total };
    }

    const env: StageEnvironment = { transcoder: this.transcoder, locale: this.locale, limits: this.limits };
    let source = input.subarray(0, sourceLength);
    const [first, second] = this.stages;
    if (first && second) {
      this.scratch.clear();
      addCounts(total, runStage(first, this.scratch, source, env));
      source = this.scratch.view();
      addCounts(total, runStage(second, dest, source, env));
    } else if (first) {
      addCounts(total, runStage(first, dest, source, env));
    }

    if (this.substitution === 'error') this.rejectSubstitutions(total);
    const ok = total.malformed === 0 && total.unrepresentable === 0 && !total.bestEffort;
    if (!ok) this.warn(total);
    return { ok, ...total };
  }

  /** `convert()` into an emptied `dest`. */
  convertInto(dest: ByteBuffer, input: Uint8Array, length: number = input.length): ConversionResult {
    dest.clear();
    return this.convert(input, length, dest);
  }

  /** Close the backend transcoder and release the scratch buffer. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.transcoder?.close();
    this.transcoder = null;
    this.scratch.free();
  }

  private isSameCharset(): boolean {
    if (this.fromCharset === this.toCharset) return true;
    if (this.backend.kind !== 'codepage') return false;
    const systemCodepage = codepageOf(this.locale.charset);
    const from = codepageOf(this.fromCharset, systemCodepage);
    return from !== null && from === codepageOf(this.toCharset, systemCodepage);
  }

  private normalizationStage(output: UnicodeForm): Stage | null {
    if (this.fromForm === null) return null;
    const service = this.backend.decomposition;
    if (this.state.normalizeD && service) {
      return { kind: 'normalize-d', from: this.fromForm, to: output, service };
    }
    if (this.state.normalizeC) return { kind: 'normalize-c', from: this.fromForm, to: output };
    return null;
  }

  private buildStages(): Stage[] {
    const flags = this.state;
    const from = this.fromForm;
    const to = this.toForm;
    const sourceUnit: 1 | 2 = isUtf16(from) ? 2 : 1;
    const backend: Stage = { kind: 'backend', sourceUnit, target: to };

    if (flags.legacyUtf8) return [{ kind: 'legacy-utf8' }];

    if (isUtf16(to)) {
      if (from !== null) return [{ kind: 'unicode', from, to }];
      if (this.transcoder) return [backend];
      if (flags.bestEffort) return [{ kind: 'best-effort-to-utf16', to }];
      return [];
    }

    const stages: Stage[] = [];
    if (isUtf16(from)) {
      const normalization = this.normalizationStage(to === 'utf-8' ? 'utf-8' : from);
      if (normalization) stages.push(normalization);
      if (to === 'utf-8') {
        if (!normalization) stages.push({ kind: 'unicode', from, to });
        return stages;
      }
      if (this.transcoder) return [...stages, backend];
      if (flags.bestEffort) return [...stages, { kind: 'best-effort-from-utf16', from }];
      return [];
    }

    if (from === 'utf-8') {
      const normalization = this.normalizationStage('utf-8');
      if (normalization) stages.push(normalization);
      if (to === 'utf-8') {
        if (!normalization) stages.push({ kind: 'utf8-clean' });
        return stages;
      }
    }

    if (this.transcoder) return [...stages, backend];
    if (flags.bestEffort || flags.same) {
      return [...stages, { kind: 'best-effort', same: flags.same, toUtf8: to === 'utf-8' }];
    }
    return [];
  }

  private rejectSubstitutions(total: SubstitutionCounts): void {
    const options = {
      fromCharset: this.fromCharset,
      toCharset: this.toCharset,
      context: { malformed: String(total.malformed), unrepresentable: String(total.unrepresentable) }
    };
    if (total.malformed > 0) {
      throw new ConversionError('TEXT_MALFORMED_INPUT', `Input is not valid ${this.fromCharset}`, options);
    }
    if (total.unrepresentable > 0) {
      throw new ConversionError(
        'TEXT_UNREPRESENTABLE',
        `Input has characters ${this.toCharset} cannot represent`,
        options
      );
    }
  }

  private warn(total: SubstitutionCounts): void {
    if (!this.onWarning) return;
    const pair = `${this.fromCharset} to ${this.toCharset}`;
    let warning: ConversionWarning;
    if (total.malformed > 0) {
      warning = {
        code: 'TEXT_MALFORMED_INPUT',
        message: `Replaced ${total.malformed} malformed sequence(s) converting ${pair}`,
        fromCharset: this.fromCharset,
        toCharset: this.toCharset
      };
    } else if (total.unrepresentable > 0) {
      warning = {
        code: 'TEXT_UNREPRESENTABLE',
        message: `Replaced ${total.unrepresentable} unrepresentable character(s) converting ${pair}`,
        fromCharset: this.fromCharset,
        toCharset: this.toCharset
      };
    } else {
      warning = {
        code: 'TEXT_BEST_EFFORT',
        message: `Converted ${pair} on a best-effort basis`,
        fromCharset: this.fromCharset,
        toCharset: this.toCharset
      };
    }
    this.onWarning(warning);
  }
}
