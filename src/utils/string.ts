import { SHORT_SHA_LENGTH } from '@/utils/constants';

/**
 * Returns the first line of a commit message without its line terminator.
 *
 * Scans for the first CR or LF character directly instead of splitting the whole message,
 * so bodies of any size cost nothing beyond the header.
 *
 * @param {string} message - The commit message
 * @returns {string} The header line
 *
 * @example
 * // Returns "feat: add login"
 * getMessageHeader("feat: add login\r\n\r\nDetails")
 */
export function getMessageHeader(message: string): string {
  for (let index = 0; index < message.length; index++) {
    const character = message[index];
    if (character === '\n' || character === '\r') {
      return message.slice(0, index);
    }
  }

  return message;
}

/**
 * Shortens a commit SHA for display purposes.
 *
 * @param {string} sha - The full commit SHA
 * @returns {string} The abbreviated SHA
 *
 * @example
 * // Returns "3f2a9c1"
 * shortSha("3f2a9c1b7e0d4a55c7f0d2e9b1a4c6d8e0f2a4b6")
 */
export function shortSha(sha: string): string {
  return sha.slice(0, SHORT_SHA_LENGTH);
}

/**
 * Escapes a value so it can be placed inside a markdown table cell.
 *
 * Pipes would end the cell and backticks would open a code span, so both are escaped.
 *
 * @param {string} value - The raw cell value
 * @returns {string} The escaped value
 *
 * @example
 * // Returns "a \| b"
 * escapeTableCell("a | b")
 */
export function escapeTableCell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/`/g, '\\`');
}
