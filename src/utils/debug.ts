/**
 * Console debug output, enabled with DEBUG=true.
 */

/** Reads `DEBUG` on every call. */
export function isDebugEnabled(): boolean {
  return process.env.DEBUG === "true";
}

export function debugLog(message: string, ...details: unknown[]): void {
  if (!isDebugEnabled()) return;
  console.log(message, ...details);
}

/** Prints a titled group of lines; used for per-round pairing decisions. */
export function debugGroup(title: string, lines: string[]): void {
  if (!isDebugEnabled()) return;
  console.group(title);
  for (const line of lines) console.log(line);
  console.groupEnd();
}
