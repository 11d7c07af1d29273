/**
 * The single user-facing error kind. Every rejection carries a message meant
 * to be read by whoever wrote the pipeline document: step id, field name and
 * offending raw value where there is one.
 */
export class SpecError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SpecError';
  }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
