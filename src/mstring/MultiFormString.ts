import type { CharsetBackend } from '../conversion/backend.js';
import { ConversionProfile } from '../conversion/ConversionProfile.js';
import type { ProfileRegistry } from '../conversion/ProfileRegistry.js';
import { UTF8 } from '../conversion/charsets.js';
import { createExternalBackend } from '../conversion/iconvBackend.js';
import { outOfMemory } from '../errors.js';
import { SystemLocale } from '../locale/SystemLocale.js';
import { ByteBuffer, WideBuffer, type TextBufferOptions } from '../text/TextBuffer.js';

/** Representations a MultiFormString can hold. */
export type StringForm = 'utf8' | 'system' | 'wide';

/**
 * Result of reading one form. `value` is a view into the string's own buffer,
 * valid until the next mutation, or null when no form could be derived. A value
 * with `ok: false` is a best-effort rendering.
 */
export type FormResult<T> = {
  ok: boolean;
  value: T | null;
};

export type MultiFormStringOptions = TextBufferOptions & {
  /** Supplies cached profiles; without one each derivation uses a transient profile. */
  registry?: ProfileRegistry;
  /** Locale used when there is no registry. */
  locale?: SystemLocale;
  /** Backend for transient profiles; iconv-lite unless given. */
  backend?: CharsetBackend;
};

type ProfileUse = 'toUtf8' | 'fromUtf8';

/**
 * One logical string cached in up to three representations: UTF-8, the
 * system charset and wide characters.
 *
 * A form counts as present only after it was stored or derived without loss.
 * Failed derivations keep their best-effort output in the buffer but leave the
 * form absent.
 */
export class MultiFormString {
  private readonly present = new Set<StringForm>();
  private readonly utf8: ByteBuffer;
  private readonly system: ByteBuffer;
  private readonly wide: WideBuffer;
  private readonly localized: ByteBuffer;
  private readonly registry: ProfileRegistry | undefined;
  private readonly locale: SystemLocale;
  private readonly backend: CharsetBackend;

  constructor(options: MultiFormStringOptions = {}) {
    const { registry, locale, backend, ...bufferOptions } = options;
    this.utf8 = new ByteBuffer(bufferOptions);
    this.system = new ByteBuffer(bufferOptions);
    this.wide = new WideBuffer(bufferOptions);
    this.localized = new ByteBuffer(bufferOptions);
    this.registry = registry;
    this.locale = registry?.locale ?? locale ?? new SystemLocale();
    this.backend = backend ?? createExternalBackend();
  }

  /** True when `form` holds an exact rendering. */
  has(form: StringForm): boolean {
    return this.present.has(form);
  }

  /** Forms currently held exactly. */
  forms(): StringForm[] {
    return (['utf8', 'system', 'wide'] as const).filter((form) => this.present.has(form));
  }

  /** Read a form, deriving it from the others when it is absent. */
  get(form: 'utf8' | 'system'): FormResult<Uint8Array>;
  get(form: 'wide'): FormResult<Uint32Array>;
  get(form: StringForm): FormResult<Uint8Array | Uint32Array>;
  get(form: StringForm): FormResult<Uint8Array | Uint32Array> {
    switch (form) {
      case 'utf8':
        return this.getUtf8();
      case 'system':
        return this.getSystem();
      case 'wide':
        return this.getWide();
    }
  }

  /**
   * Render the system form through `profile` into the localized buffer. Without
   * a profile the system form itself is returned.
   */
  getLocalized(profile: ConversionProfile | null): FormResult<Uint8Array> {
    let ok = true;
    if (!this.present.has('system') && this.present.has('wide')) {
      ok = this.deriveSystemFromWide();
    }
    if (!this.present.has('system')) {
      return { ok: false, value: null };
    }
    if (profile === null) return { ok, value: this.system.view() };
    const result = profile.convertInto(this.localized, this.system.view());
    return { ok: ok && result.ok, value: this.localized.view() };
  }

  /**
   * Store `data` (read up to its first zero unit within `length`) as the only
   * present form. `null` empties the string.
   */
  copyInto(form: 'utf8' | 'system', data: Uint8Array | null, length?: number): void;
  copyInto(form: 'wide', data: ArrayLike<number> | null, length?: number): void;
  copyInto(form: StringForm, data: ArrayLike<number> | null, length?: number): void {
    if (data === null) {
      this.present.clear();
      return;
    }
    this.utf8.clear();
    this.system.clear();
    this.wide.clear();
    this.localized.clear();
    this.present.clear();
    const target = form === 'wide' ? this.wide : form === 'utf8' ? this.utf8 : this.system;
    if (!target.appendBounded(data, length ?? data.length)) throw outOfMemory(length ?? data.length);
    this.present.add(form);
  }

  /** Take the forms and present set of `other`. */
  copyFrom(other: MultiFormString): void {
    this.present.clear();
    for (const form of other.present) this.present.add(form);
    if (!this.utf8.copyFrom(other.utf8)) throw outOfMemory(other.utf8.length + 1);
    if (!this.system.copyFrom(other.system)) throw outOfMemory(other.system.length + 1);
    if (!this.wide.copyFrom(other.wide)) throw outOfMemory(other.wide.length + 1);
  }

  /**
   * Store `data` converted to the system charset through `profile` as the only
   * form. On a lossy conversion the output is kept but no form is present.
   */
  copyConverted(data: Uint8Array | null, profile: ConversionProfile, length: number = data?.length ?? 0): boolean {
    this.present.clear();
    this.utf8.clear();
    this.wide.clear();
    if (data === null) return true;
    const result = profile.convertInto(this.system, data, length);
    if (result.ok) this.present.add('system');
    return result.ok;
  }

  /**
   * Store `utf8` and derive the system and wide forms from it immediately,
   * stopping at the first lossy step. Forms derived before the failure stay
   * present.
   */
  update(utf8: Uint8Array | null): boolean {
    if (utf8 === null) {
      this.present.clear();
      return true;
    }
    this.utf8.clear();
    if (!this.utf8.appendBounded(utf8, utf8.length)) throw outOfMemory(utf8.length + 1);
    this.system.clear();
    this.wide.clear();
    this.present.clear();
    this.present.add('utf8');

    const converted = this.withProfile('fromUtf8', (profile) => profile.convertInto(this.system, this.utf8.view()));
    if (!converted.ok) return false;
    this.present.add('system');

    if (!this.locale.decode(this.wide, this.system.view())) return false;
    this.present.add('wide');
    return true;
  }

  /** Drop every form and release the buffers. */
  clear(): void {
    this.present.clear();
    this.utf8.free();
    this.system.free();
    this.wide.free();
    this.localized.free();
  }

  /** A form decoded to a JavaScript string, or null when it cannot be derived. */
  text(form: StringForm): string | null {
    switch (form) {
      case 'utf8': {
        const { value } = this.getUtf8();
        return value === null ? null : this.utf8.text();
      }
      case 'system': {
        const { value } = this.getSystem();
        if (value === null) return null;
        const decoded = new WideBuffer();
        this.locale.decode(decoded, value);
        return decoded.text(this.locale.wideUnitBits);
      }
      case 'wide': {
        const { value } = this.getWide();
        return value === null ? null : this.wide.text(this.locale.wideUnitBits);
      }
    }
  }

  private getUtf8(): FormResult<Uint8Array> {
    if (this.present.has('utf8')) return { ok: true, value: this.utf8.view() };
    if (!this.present.has('system') && !this.present.has('wide')) return { ok: true, value: null };
    const ok = this.present.has('system') || this.deriveSystemFromWide();
    this.utf8.clear();
    const converted = this.withProfile('toUtf8', (profile) => profile.convertInto(this.utf8, this.system.view()));
    if (ok && converted.ok) this.present.add('utf8');
    return { ok: ok && converted.ok, value: this.utf8.view() };
  }

  private getSystem(): FormResult<Uint8Array> {
    if (this.present.has('system')) return { ok: true, value: this.system.view() };
    if (this.present.has('wide')) {
      const ok = this.deriveSystemFromWide();
      return { ok, value: this.system.view() };
    }
    if (this.present.has('utf8')) {
      this.system.clear();
      const converted = this.withProfile('fromUtf8', (profile) => profile.convertInto(this.system, this.utf8.view()));
      if (converted.ok) this.present.add('system');
      return { ok: converted.ok, value: this.system.view() };
    }
    return { ok: true, value: null };
  }

  private getWide(): FormResult<Uint32Array> {
    if (this.present.has('wide')) return { ok: true, value: this.wide.view() };
    if (!this.present.has('system') && !this.present.has('utf8')) return { ok: true, value: null };
    const ok = this.present.has('system') || this.getSystem().ok;
    this.wide.clear();
    const decoded = this.locale.decode(this.wide, this.system.view());
    if (decoded && ok) this.present.add('wide');
    return { ok: decoded && ok, value: this.wide.view() };
  }

  private deriveSystemFromWide(): boolean {
    this.system.clear();
    const ok = this.locale.encode(this.system, this.wide.view());
    if (ok) this.present.add('system');
    return ok;
  }

  private withProfile<T>(use: ProfileUse, action: (profile: ConversionProfile) => T): T {
    if (this.registry) {
      return action(use === 'toUtf8' ? this.registry.toCharset(UTF8, true) : this.registry.fromCharset(UTF8, true));
    }
    const options = { bestEffort: true, locale: this.locale, backend: this.backend };
    const profile =
      use === 'toUtf8'
        ? new ConversionProfile(this.locale.charset, UTF8, { direction: 'toCharset', ...options })
        : new ConversionProfile(UTF8, this.locale.charset, { direction: 'fromCharset', ...options });
    try {
      return action(profile);
    } finally {
      profile.dispose();
    }
  }
}
