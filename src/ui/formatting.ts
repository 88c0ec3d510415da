/**
 * Text layout helpers shared by formatters and messages.
 */

type LineInput = string | false | null | undefined;

/**
 * Join lines with newlines, dropping false, null and undefined entries.
 *
 * Empty strings are kept so callers can insert blank lines.
 *
 * @example
 * ```typescript
 * joinLines('Focused window 42', verbose && 'via niri socket', undefined);
 * // 'Focused window 42'
 * ```
 */
export function joinLines(...lines: LineInput[]): string {
  return lines.filter((line): line is string => typeof line === 'string').join('\n');
}
