import type { ConversionWarning } from '../errors.js';
import type { TextLimits } from '../limits.js';
import { SystemLocale, type SystemLocaleOptions } from '../locale/SystemLocale.js';
import type { CharsetBackend } from './backend.js';
import { ConversionProfile, type ConversionDirection, type SubstitutionPolicy } from './ConversionProfile.js';
import { canonicalCharset } from './charsets.js';
import { createExternalBackend } from './iconvBackend.js';

/** Options for creating a ProfileRegistry. */
export type ProfileRegistryOptions = {
  /** Defaults to iconv-lite; pass `NO_BACKEND` to use only the built-in stages. */
  backend?: CharsetBackend;
  /** The system locale, or options for constructing one. */
  locale?: SystemLocale | SystemLocaleOptions;
  limits?: TextLimits;
  substitution?: SubstitutionPolicy;
  /** Receives one warning for each conversion that substituted characters. */
  onWarning?: (warning: ConversionWarning) => void;
};

/** Options for `ProfileRegistry.get()`. */
export type ProfileRequest = {
  direction: ConversionDirection;
  bestEffort?: boolean;
};

function profileKey(fromCharset: string, toCharset: string): string {
  return `${canonicalCharset(fromCharset)}\u0000${canonicalCharset(toCharset)}`;
}

/**
 * Conversion profiles owned by one consumer, cached by charset pair.
 *
 * The first request for a pair decides its options; later requests for the
 * same pair return the cached profile unchanged.
 */
export class ProfileRegistry {
  readonly locale: SystemLocale;
  private readonly backend: CharsetBackend;
  private readonly limits: TextLimits | undefined;
  private readonly substitution: SubstitutionPolicy | undefined;
  private readonly profiles = new Map<string, ConversionProfile>();
  private readonly warningsList: ConversionWarning[] = [];
  private readonly onWarning: ((warning: ConversionWarning) => void) | undefined;

  constructor(options: ProfileRegistryOptions = {}) {
    this.backend = options.backend ?? createExternalBackend();
    this.locale = options.locale instanceof SystemLocale ? options.locale : new SystemLocale(options.locale);
    this.limits = options.limits;
    this.substitution = options.substitution;
    this.onWarning = options.onWarning;
  }

  /** Charset of system strings, read from the locale on first use. */
  get systemCharset(): string {
    return this.locale.charset;
  }

  /** Number of cached profiles. */
  get size(): number {
    return this.profiles.size;
  }

  /** Warnings collected from conversions through this registry's profiles. */
  warnings(): ConversionWarning[] {
    return [...this.warningsList];
  }

  /**
   * Cached profile for the pair, building it on first request.
   * @throws ConversionError when no pipeline exists; nothing is cached then.
   */
  get(fromCharset: string, toCharset: string, request: ProfileRequest): ConversionProfile {
    const key = profileKey(fromCharset, toCharset);
    const cached = this.profiles.get(key);
    if (cached) return cached;
    const profile = this.create(fromCharset, toCharset, request);
    this.profiles.set(key, profile);
    return profile;
  }

  /** Profile converting system strings to `charset`. */
  toCharset(charset: string, bestEffort = false): ConversionProfile {
    return this.get(this.systemCharset, charset, { direction: 'toCharset', bestEffort });
  }

  /** Profile converting `charset` strings to the system charset. */
  fromCharset(charset: string, bestEffort = false): ConversionProfile {
    return this.get(charset, this.systemCharset, { direction: 'fromCharset', bestEffort });
  }

  /** Uncached profile; the caller disposes it. */
  transient(fromCharset: string, toCharset: string, request: ProfileRequest): ConversionProfile {
    return this.create(fromCharset, toCharset, request);
  }

  /** Dispose every cached profile and forget the system charset. */
  dispose(): void {
    for (const profile of this.profiles.values()) profile.dispose();
    this.profiles.clear();
    this.locale.forget();
  }

  private create(fromCharset: string, toCharset: string, request: ProfileRequest): ConversionProfile {
    return new ConversionProfile(fromCharset, toCharset, {
      direction: request.direction,
      bestEffort: request.bestEffort ?? false,
      backend: this.backend,
      locale: this.locale,
      ...(this.limits ? { limits: this.limits } : {}),
      ...(this.substitution ? { substitution: this.substitution } : {}),
      onWarning: (warning) => {
        this.warningsList.push(warning);
        this.onWarning?.(warning);
      }
    });
  }
}
