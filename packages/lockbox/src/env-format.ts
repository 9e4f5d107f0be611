/**
 * Shell export-line encoding.
 *
 * Output is meant for `eval "$(lb env)"`: inside double quotes a POSIX shell
 * only treats `\`, `"`, `$` and `` ` `` specially, so prefixing each of them
 * with a backslash makes the quoted word expand back to the original text.
 *
 * Values containing a raw newline still round-trip through `eval`, but the
 * export stream is line-oriented and line-based consumers will split them.
 */

const SHELL_SPECIAL = new Set(['\\', '"', '$', '`']);

/**
 * Escape a value for use inside a double-quoted shell word.
 * Single left-to-right pass; each special character gains exactly one backslash.
 */
export function escapeShellValue(value: string): string {
  let out = '';
  for (const ch of value) {
    out += SHELL_SPECIAL.has(ch) ? `\\${ch}` : ch;
  }
  return out;
}

/**
 * Format one `export KEY="value"` line, newline-terminated.
 */
export function formatExportLine(key: string, value: string): string {
  return `export ${key}="${escapeShellValue(value)}"\n`;
}
