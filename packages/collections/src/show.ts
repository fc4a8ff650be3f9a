/**
 * Element rendering for `toString()`: strings print bare, arrays as
 * `[a, b]`, everything else through `String()`.
 */
export function show(value: unknown): string {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) return `[${value.map(show).join(", ")}]`;
  return String(value);
}
