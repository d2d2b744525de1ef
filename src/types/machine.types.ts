import type { DiagnosticKind, Profile } from '@/types/common.types';

/**
 * Types for the commit message machine.
 */

/**
 * Structured view of a conventional commit message.
 */
export interface Message {
  /** The commit type (e.g., 'feat', 'fix') */
  type: string;
  /** The scope without parentheses. `null` when no scope was given, `''` for an explicit `()` */
  scope: string | null;
  /** Whether the header carries the `!` breaking change marker */
  breaking: boolean;
  /** The single-line description following `: ` */
  description: string;
  /** The bytes following the blank line, verbatim. `null` when the message has no body */
  body: string | null;
}

/**
 * A parse error located at a byte offset of the input.
 */
export interface Diagnostic {
  /** Which rule of the grammar was violated */
  kind: DiagnosticKind;
  /** Human readable message, ending with `: col=NN` */
  message: string;
  /** Byte offset reported in the message */
  position: number;
}

/**
 * Outcome of a single parse.
 *
 * - success: `message` set, `diagnostic` null
 * - best-effort failure with a minimally valid partial message: both set
 * - failure: `message` null, `diagnostic` set
 */
export interface ParseResult {
  message: Message | null;
  diagnostic: Diagnostic | null;
}

/**
 * Observer notified of every field the machine recognizes and every diagnostic it writes.
 * Purely a side channel; it never affects the parse outcome.
 */
export interface DiagnosticSink {
  info(message: string, fields?: Record<string, string>): void;
  error(message: string): void;
}

export interface MachineOptions {
  /**
   * Keyword vocabulary accepted as commit types. Defaults to `minimal`.
   */
  profile?: Profile;

  /**
   * Return the partially parsed message alongside the diagnostic when it has at least a type
   * and a description. Defaults to `false`.
   */
  bestEffort?: boolean;

  /**
   * Optional observer for recognized fields and diagnostics.
   */
  sink?: DiagnosticSink;
}

/**
 * A configured parser. Holds options only; every call to `parse` owns its own scan state.
 */
export interface Machine {
  readonly profile: Profile;
  readonly bestEffort: boolean;
  parse(input: string | Uint8Array): ParseResult;
}
