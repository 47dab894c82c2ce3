/** Compact by default; the checkpoint and `status --pretty` indent by two spaces. */
export function formatJson(value: unknown, pretty = false): string {
  return pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value);
}
