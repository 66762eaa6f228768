/**
 * Splits text into lines, accepting both CRLF and LF line endings.
 *
 * @param {string} input - The text to split
 * @returns {string[]} The lines without their terminators
 *
 * @example
 * // Returns ["a", "b", "c"]
 * splitLines("a\r\nb\nc")
 */
export function splitLines(input: string): string[] {
  return input.split(/\r?\n/);
}

/**
 * Returns the first line of a commit message, i.e. its subject.
 *
 * @example
 * // Returns "feat: add button"
 * getFirstLine("feat: add button\n\nLonger description")
 */
export function getFirstLine(message: string): string {
  return splitLines(message)[0];
}

/**
 * Trims a value, mapping missing and whitespace-only values to `null`.
 *
 * @example
 * // Returns "main"
 * trimToNull("  main ")
 * // Returns null
 * trimToNull("   ")
 */
export function trimToNull(value: string | null | undefined): string | null {
  const trimmed = value?.trim() ?? '';
  return trimmed === '' ? null : trimmed;
}

/**
 * Formats identities as GitHub mentions joined by the given separator.
 *
 * @example
 * // Returns "@octocat, @hubot"
 * formatMentions(["octocat", "hubot"], ", ")
 */
export function formatMentions(identities: Iterable<string>, separator: string): string {
  return Array.from(identities, (identity) => `@${identity}`).join(separator);
}
