import { ByteWriter, emptyCounts, formCodec, type SubstitutionCounts, type UnicodeForm } from './forms.js';
import type { ByteBuffer } from './TextBuffer.js';
import { combiningClass } from './unicodeTables.js';

/** Platform canonical-decomposition routine. Returns `null` when it cannot decompose the run. */
export type DecompositionService = {
  decompose(codePoints: readonly number[]): number[] | null;
};

/** Decomposition through the runtime's own Unicode data. */
export const runtimeDecomposition: DecompositionService = {
  decompose(codePoints) {
    let text = '';
    for (const codePoint of codePoints) text += String.fromCodePoint(codePoint);
    const out: number[] = [];
    for (const ch of text.normalize('NFD')) {
      const codePoint = ch.codePointAt(0);
      if (codePoint !== undefined) out.push(codePoint);
    }
    return out;
  }
};

/** Code points per call into the service, before the next starter. */
const RUN_SIZE = 4096;

/**
 * Decompose `input` (bounded by `length`) to Normalization Form D through
 * `service`, appending the result in `to` form to `dest`. When the service
 * fails on a run the run is written undecomposed and the result is flagged
 * best-effort.
 */
export function normalizeD(
  dest: ByteBuffer,
  input: Uint8Array,
  length: number,
  from: UnicodeForm,
  to: UnicodeForm,
  service: DecompositionService
): SubstitutionCounts {
  const source = formCodec(from);
  const target = formCodec(to);
  const end = Math.min(length, input.length);
  const writer = new ByteWriter(dest, target.unitSize, end * 2);
  const counts = emptyCounts();

  let run: number[] = [];
  const flush = () => {
    if (run.length === 0) return;
    const decomposed = service.decompose(run);
    if (decomposed === null) counts.bestEffort = true;
    for (const codePoint of decomposed ?? run) writer.writeCodePoint(target, codePoint);
    run = [];
  };

  let offset = 0;
  for (;;) {
    const { codePoint, consumed } = source.decode(input, offset, end - offset);
    if (consumed === 0) break;
    if (consumed < 0) {
      flush();
      writer.writeCodePoint(target, codePoint);
      counts.malformed += 1;
      offset -= consumed;
      continue;
    }
    // Runs are split only in front of a starter so reordering stays within one call.
    if (run.length >= RUN_SIZE && combiningClass(codePoint) === 0) flush();
    run.push(codePoint);
    offset += consumed;
  }
  flush();

  writer.finish();
  return counts;
}
