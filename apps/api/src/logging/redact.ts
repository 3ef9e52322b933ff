/**
 * Shows enough of a credential to tell which one is loaded: the first
 * `visible` characters, the last two and the length.
 */
export function redactSecret(value: string | undefined, visible = 4): string {
  if (!value) return '(not set)';
  if (value.length <= visible * 2) return '*'.repeat(value.length);
  return `${value.slice(0, visible)}…${value.slice(-2)} (${value.length} chars)`;
}
