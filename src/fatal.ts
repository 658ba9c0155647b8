/**
 * Terminate the process after an unrecoverable allocation failure.
 *
 * Only reached from buffers created with `allocationFailure: 'abort'`, the
 * compatibility mode for callers with no path to propagate an error.
 */
export function abortProcess(message: string): never {
  process.stderr.write(`polytext: ${message}\n`);
  process.exit(70);
}
