// Characters that never need quoting in a POSIX shell word
const SAFE_WORD = /^[A-Za-z0-9_\/.,:=@%+-]+$/;

/**
 * Quote a single argument for a POSIX shell command line.
 * Safe words are returned unchanged; everything else is wrapped in single
 * quotes, with embedded single quotes written as `'\''`.
 */
export function shellQuote(value: string): string {
  if (SAFE_WORD.test(value)) return value;
  return `'${value.replaceAll("'", "'\\''")}'`;
}
