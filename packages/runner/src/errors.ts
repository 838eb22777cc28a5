/**
 * Raised when the harness itself cannot go on (a missing executable or
 * fixture). The batch runner lets it through instead of counting a failure.
 */
export class HarnessFatalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HarnessFatalError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
