/** Message text for an operator-facing error line. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
