import type { Diagnostic, DiagnosticKind, DiagnosticSink } from '@/types';
import { DIAGNOSTIC_KIND } from '@/utils/constants';

/**
 * Message template of each diagnostic kind. `%s` is replaced by the offending character.
 */
export const DIAGNOSTIC_TEMPLATES: Readonly<Record<DiagnosticKind, string>> = {
  [DIAGNOSTIC_KIND.ILLEGAL_TYPE_CHAR]: "illegal '%s' character in commit message type",
  [DIAGNOSTIC_KIND.MISSING_COLON]: "expecting colon (':') character, got '%s' character",
  [DIAGNOSTIC_KIND.INCOMPLETE_TYPE]: "incomplete commit message type after '%s' character",
  [DIAGNOSTIC_KIND.MALFORMED_SCOPE]: "illegal '%s' character in scope",
  [DIAGNOSTIC_KIND.EMPTY_INPUT]: 'empty input',
  [DIAGNOSTIC_KIND.EARLY_EXIT]: "early exit after '%s' character",
  [DIAGNOSTIC_KIND.MISSING_DESCRIPTION_INITIAL_SPACE]:
    "expecting at least one white-space (' ') character, got '%s' character",
  [DIAGNOSTIC_KIND.MISSING_DESCRIPTION]: "expecting a description text (without newlines) after '%s' character",
  [DIAGNOSTIC_KIND.ILLEGAL_NEWLINE]: 'illegal newline',
  [DIAGNOSTIC_KIND.MISSING_BLANK_LINE_AT_BODY_BEGIN]: 'body must begin with a blank line',
};

/**
 * Formats the column suffix appended to every diagnostic message.
 *
 * @param position - The byte offset to report
 * @returns The suffix, e.g. `: col=04`
 */
export function formatColumn(position: number): string {
  return `: col=${String(position).padStart(2, '0')}`;
}

/**
 * Builds a diagnostic from its kind, the column to report and, for templates that carry one,
 * the offending character.
 *
 * Bytes are rendered one by one as Latin-1 characters; the machine never decodes multi-byte
 * sequences.
 *
 * @param kind - The diagnostic kind
 * @param position - The byte offset reported in the message
 * @param character - The byte substituted for `%s`, if the template has a placeholder
 * @returns The diagnostic
 *
 * @example
 * ```typescript
 * createDiagnostic('MissingColon', 5, 0x78)
 * // → { kind: 'MissingColon', message: "expecting colon (':') character, got 'x' character: col=05", position: 5 }
 * ```
 */
export function createDiagnostic(kind: DiagnosticKind, position: number, character?: number): Diagnostic {
  const template = DIAGNOSTIC_TEMPLATES[kind];
  const text = character === undefined ? template : template.replace('%s', String.fromCharCode(character));

  return {
    kind,
    message: `${text}${formatColumn(position)}`,
    position,
  };
}

/**
 * Error thrown by `parseOrThrow` when a message cannot be parsed.
 */
export class ParseError extends Error {
  /**
   * The diagnostic that stopped the parse.
   */
  public readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.name = 'ParseError';
    this.diagnostic = diagnostic;
  }
}

/**
 * Where a diagnostic points, relative to the cursor position `p` it is written at.
 *
 * - `current`: the byte at `p`, column `p`
 * - `previous`: the byte at `p - 1`, column `p`
 * - `last`: the byte at `p - 1`, column `p - 1` (the last byte of a truncated input)
 * - `column`: no character, column `p`
 * - `nextColumn`: no character, column `p + 1`
 */
export type DiagnosticAnchor = 'current' | 'previous' | 'last' | 'column' | 'nextColumn';

/**
 * How a write interacts with a diagnostic that is already recorded.
 *
 * - `unconditional` writers always replace it. They are used where the machine knows the
 *   offending byte, or where their message is the only meaningful one.
 * - `defensive` writers only record a diagnostic when none is set yet, so they never replace the
 *   truncation advisory (`EarlyExit`) recorded on the last byte of the input.
 */
export type DiagnosticWriter = 'unconditional' | 'defensive';

/**
 * Holds the single diagnostic of a parse attempt and decides which write wins.
 */
export class DiagnosticRecorder {
  private _current: Diagnostic | null = null;

  constructor(
    private readonly buffer: Uint8Array,
    private readonly sink?: DiagnosticSink,
  ) {}

  /**
   * The diagnostic recorded so far, or `null`.
   */
  public get current(): Diagnostic | null {
    return this._current;
  }

  /**
   * Records the truncation advisory for the byte at `position`, the last byte of the input.
   */
  public advise(position: number): void {
    this.write(createDiagnostic(DIAGNOSTIC_KIND.EARLY_EXIT, position, this.buffer[position]));
  }

  /**
   * Writes a diagnostic anchored at cursor position `p`.
   *
   * @param writer - Whether an existing diagnostic is kept
   * @param kind - The diagnostic kind
   * @param anchor - Which character and column to report
   * @param p - The cursor position
   */
  public record(writer: DiagnosticWriter, kind: DiagnosticKind, anchor: DiagnosticAnchor, p: number): void {
    if (writer === 'defensive' && this._current !== null) {
      return;
    }

    switch (anchor) {
      case 'current':
        this.write(createDiagnostic(kind, p, this.buffer[p]));
        break;
      case 'previous':
        this.write(createDiagnostic(kind, p, this.buffer[p - 1]));
        break;
      case 'last':
        this.write(createDiagnostic(kind, p - 1, this.buffer[p - 1]));
        break;
      case 'column':
        this.write(createDiagnostic(kind, p));
        break;
      case 'nextColumn':
        this.write(createDiagnostic(kind, p + 1));
        break;
    }
  }

  private write(diagnostic: Diagnostic): void {
    this._current = diagnostic;
    this.sink?.error(diagnostic.message);
  }
}
