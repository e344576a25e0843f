/**
 * Message of an unknown thrown value, for logs.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
