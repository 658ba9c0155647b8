import { POLYTEXT_REPORT_SCHEMA_VERSION } from './reportSchema.js';

// Context keys that would collide with top-level fields of the serialized error.
const RESERVED_KEYS = new Set(['schemaVersion', 'name', 'code', 'message', 'hint', 'context']);

/** Stable text-conversion error codes. */
export type ConversionErrorCode =
  | 'TEXT_OUT_OF_MEMORY'
  | 'TEXT_UNSUPPORTED_CONVERSION'
  | 'TEXT_MALFORMED_INPUT'
  | 'TEXT_UNREPRESENTABLE'
  | 'TEXT_BACKEND_UNAVAILABLE'
  | 'TEXT_INVALID_ARGUMENT';

/** Error thrown when a conversion cannot produce output at all. */
export class ConversionError extends Error {
  /** Machine-readable error code. */
  readonly code: ConversionErrorCode;
  /** Source charset of the failing conversion, if any. */
  readonly fromCharset?: string | undefined;
  /** Target charset of the failing conversion, if any. */
  readonly toCharset?: string | undefined;
  /** Underlying cause, if available. */
  override readonly cause?: unknown;
  /** Additional context for serialization. */
  readonly context?: Record<string, string> | undefined;

  /** Create a ConversionError with a stable code. */
  constructor(
    code: ConversionErrorCode,
    message: string,
    options?: {
      fromCharset?: string | undefined;
      toCharset?: string | undefined;
      context?: Record<string, string> | undefined;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'ConversionError';
    this.code = code;
    this.fromCharset = options?.fromCharset;
    this.toCharset = options?.toCharset;
    this.context = options?.context;
    this.cause = options?.cause;
  }

  /** JSON-safe serialization with schemaVersion "1". */
  toJSON(): {
    schemaVersion: string;
    name: string;
    code: ConversionErrorCode;
    message: string;
    hint: string;
    context: Record<string, string>;
    fromCharset?: string;
    toCharset?: string;
  } {
    const context: Record<string, string> = {};
    for (const [key, value] of Object.entries(this.context ?? {})) {
      if (!RESERVED_KEYS.has(key) && !this.hasCharsetField(key)) context[key] = value;
    }
    return {
      schemaVersion: POLYTEXT_REPORT_SCHEMA_VERSION,
      name: this.name,
      code: this.code,
      message: this.message,
      hint: hintFor(this.code, this.message),
      context,
      ...(this.fromCharset !== undefined ? { fromCharset: this.fromCharset } : {}),
      ...(this.toCharset !== undefined ? { toCharset: this.toCharset } : {})
    };
  }

  private hasCharsetField(key: string): boolean {
    return (key === 'fromCharset' && this.fromCharset !== undefined) || (key === 'toCharset' && this.toCharset !== undefined);
  }
}

function hintFor(code: ConversionErrorCode, message: string): string {
  switch (code) {
    case 'TEXT_OUT_OF_MEMORY':
      return 'Raise limits.maxBufferUnits or shorten the input';
    case 'TEXT_UNSUPPORTED_CONVERSION':
      return 'Request the conversion with bestEffort enabled or install a backend for the charset';
    default:
      return message;
  }
}

/** Non-fatal conversion warning codes. */
export type ConversionWarningCode = 'TEXT_MALFORMED_INPUT' | 'TEXT_UNREPRESENTABLE' | 'TEXT_BEST_EFFORT';

/** Non-fatal warning produced when a conversion substituted characters. */
export type ConversionWarning = {
  code: ConversionWarningCode;
  message: string;
  fromCharset: string;
  toCharset: string;
};

/** Build the error raised when a buffer cannot grow. */
export function outOfMemory(units: number, context?: Record<string, string>): ConversionError {
  return new ConversionError('TEXT_OUT_OF_MEMORY', `Could not grow text buffer to ${units} units`, {
    context: { requestedUnits: String(units), ...context }
  });
}
