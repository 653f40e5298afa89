/**
 * Message of an unknown thrown value, for logs and wrapped errors.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
