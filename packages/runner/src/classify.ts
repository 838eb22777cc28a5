export const FAILURE_MARKER = '*** FAILURE:';

/** Non-zero exit, or the interpreter printed its failure marker. */
export function isRuntimeFailure(exitCode: number, output: string): boolean {
  return exitCode !== 0 || output.includes(FAILURE_MARKER);
}
