import { ConventionalCommit } from '@/conventional-commit';
import { DiagnosticRecorder, ParseError } from '@/diagnostics';
import type { DiagnosticAnchor, DiagnosticWriter } from '@/diagnostics';
import { getTypeTrie } from '@/type-tables';
import type { TypeTrieNode } from '@/type-tables';
import type { DiagnosticKind, Machine, MachineOptions, Message, ParseResult } from '@/types';
import { BYTE, DIAGNOSTIC_KIND, PROFILE } from '@/utils/constants';

//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// States and actions
//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

/**
 * Grammar positions of the machine.
 *
 * - `start`: nothing consumed yet
 * - `type`: inside a keyword, `node` is the trie node reached so far
 * - `typeEnd`: a complete keyword was consumed
 * - `breaking`: the `!` marker was consumed
 * - `scopeOpen` / `scope` / `scopeEnd`: after `(`, inside the scope, after `)`
 * - `colon`: the `:` separator was consumed
 * - `spaces`: skipping the spaces before the description
 * - `description`: inside the description
 * - `descriptionEnd`: the line terminator after the description was consumed
 * - `blankLine`: the blank line before the body was consumed
 * - `body`: inside the body
 * - `fail`: an error was recorded; the scan stops here
 */
export type MachineState =
  | { name: 'start' }
  | { name: 'type'; node: TypeTrieNode }
  | { name: 'typeEnd' }
  | { name: 'breaking' }
  | { name: 'scopeOpen' }
  | { name: 'scope' }
  | { name: 'scopeEnd' }
  | { name: 'colon' }
  | { name: 'spaces' }
  | { name: 'description' }
  | { name: 'descriptionEnd' }
  | { name: 'blankLine' }
  | { name: 'body' }
  | { name: 'fail' };

export type MachineStateName = MachineState['name'];

/**
 * Side effects a transition asks the driver to perform, in order.
 */
export type MachineAction =
  | { type: 'markToken' }
  | { type: 'captureType' }
  | { type: 'setBreaking' }
  | { type: 'captureScope' }
  | { type: 'captureDescription' }
  | { type: 'captureBody' }
  | { type: 'diagnose'; writer: DiagnosticWriter; kind: DiagnosticKind; anchor: DiagnosticAnchor };

export interface Transition {
  next: MachineState;
  actions: readonly MachineAction[];
}

/**
 * States after which the grammar requires at least one more byte. Entering one of them on the
 * last byte of the input records the truncation advisory.
 */
const ADVISORY_STATES: ReadonlySet<MachineStateName> = new Set(['typeEnd', 'breaking', 'scopeEnd', 'colon']);

/**
 * States in which the input may end.
 */
const ACCEPTING_STATES: ReadonlySet<MachineStateName> = new Set(['description', 'blankLine', 'body']);

const FAIL: MachineState = { name: 'fail' };

const NO_ACTIONS: readonly MachineAction[] = [];

function go(next: MachineState, ...actions: MachineAction[]): Transition {
  return { next, actions };
}

function failWith(...actions: MachineAction[]): Transition {
  return { next: FAIL, actions };
}

function unconditional(kind: DiagnosticKind, anchor: DiagnosticAnchor): MachineAction {
  return { type: 'diagnose', writer: 'unconditional', kind, anchor };
}

function defensive(kind: DiagnosticKind, anchor: DiagnosticAnchor): MachineAction {
  return { type: 'diagnose', writer: 'defensive', kind, anchor };
}

function isLineTerminator(byte: number): boolean {
  return byte === BYTE.LF || byte === BYTE.CR;
}

//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// Transition function
//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

/**
 * Computes the edge taken from `state` on `byte`.
 *
 * Every state has exactly one default edge. Apart from `description` and `body`, which consume
 * anything that is not a line terminator, the default edge leads to `fail` and writes the
 * diagnostic of that grammar position.
 *
 * @param state - The current state
 * @param byte - The byte under the cursor
 * @param root - Root of the keyword trie of the active profile
 * @returns The next state and the actions to perform
 */
export function transition(state: MachineState, byte: number, root: TypeTrieNode): Transition {
  switch (state.name) {
    case 'start':
    case 'type': {
      const child = (state.name === 'start' ? root : state.node).children.get(byte);
      if (!child) {
        return failWith(unconditional(DIAGNOSTIC_KIND.ILLEGAL_TYPE_CHAR, 'current'));
      }
      const next: MachineState = child.terminal ? { name: 'typeEnd' } : { name: 'type', node: child };

      return state.name === 'start' ? go(next, { type: 'markToken' }) : go(next);
    }

    case 'typeEnd': {
      // The type is known for sure only once a byte follows it.
      const captureType: MachineAction = { type: 'captureType' };
      switch (byte) {
        case BYTE.EXCLAMATION:
          return go({ name: 'breaking' }, captureType, { type: 'setBreaking' });
        case BYTE.OPEN_PAREN:
          return go({ name: 'scopeOpen' }, captureType);
        case BYTE.COLON:
          return go({ name: 'colon' }, captureType);
        default:
          return failWith(captureType, defensive(DIAGNOSTIC_KIND.MISSING_COLON, 'current'));
      }
    }

    case 'breaking':
      if (byte === BYTE.COLON) {
        return go({ name: 'colon' });
      }
      return failWith(defensive(DIAGNOSTIC_KIND.MISSING_COLON, 'current'));

    case 'scopeOpen':
      switch (byte) {
        case BYTE.OPEN_PAREN:
          return failWith(unconditional(DIAGNOSTIC_KIND.MALFORMED_SCOPE, 'current'));
        case BYTE.CLOSE_PAREN:
          return go({ name: 'scopeEnd' }, { type: 'markToken' }, { type: 'captureScope' });
        default:
          return go({ name: 'scope' }, { type: 'markToken' });
      }

    case 'scope':
      switch (byte) {
        case BYTE.OPEN_PAREN:
          return failWith(unconditional(DIAGNOSTIC_KIND.MALFORMED_SCOPE, 'current'));
        case BYTE.CLOSE_PAREN:
          return go({ name: 'scopeEnd' }, { type: 'captureScope' });
        default:
          return go(state);
      }

    case 'scopeEnd':
      switch (byte) {
        case BYTE.EXCLAMATION:
          return go({ name: 'breaking' }, { type: 'setBreaking' });
        case BYTE.COLON:
          return go({ name: 'colon' });
        default:
          return failWith(defensive(DIAGNOSTIC_KIND.MISSING_COLON, 'current'));
      }

    case 'colon':
      if (byte === BYTE.SPACE) {
        return go({ name: 'spaces' });
      }
      return failWith(defensive(DIAGNOSTIC_KIND.MISSING_DESCRIPTION_INITIAL_SPACE, 'current'));

    case 'spaces':
      switch (byte) {
        case BYTE.LF:
          return failWith(unconditional(DIAGNOSTIC_KIND.ILLEGAL_NEWLINE, 'nextColumn'));
        case BYTE.CR:
          return failWith(unconditional(DIAGNOSTIC_KIND.MISSING_DESCRIPTION, 'previous'));
        case BYTE.SPACE:
          return go(state);
        default:
          return go({ name: 'description' }, { type: 'markToken' });
      }

    case 'description':
      if (isLineTerminator(byte)) {
        return go({ name: 'descriptionEnd' }, { type: 'captureDescription' });
      }
      return go(state);

    case 'descriptionEnd':
      if (isLineTerminator(byte)) {
        return go({ name: 'blankLine' });
      }
      return failWith(unconditional(DIAGNOSTIC_KIND.MISSING_BLANK_LINE_AT_BODY_BEGIN, 'column'));

    case 'blankLine':
      return go({ name: 'body' }, { type: 'markToken' });

    case 'body':
      return go(state);

    case 'fail':
      return go(state);
  }
}

/**
 * Computes the actions performed when the input ends in `state`.
 *
 * @param state - The state the scan stopped in
 * @returns The actions to perform at the end offset
 */
export function endOfInput(state: MachineState): readonly MachineAction[] {
  switch (state.name) {
    // Only reachable with an empty input.
    case 'start':
      return [unconditional(DIAGNOSTIC_KIND.EMPTY_INPUT, 'column')];

    case 'type':
      return [unconditional(DIAGNOSTIC_KIND.INCOMPLETE_TYPE, 'previous')];

    case 'scopeOpen':
    case 'scope':
      return [unconditional(DIAGNOSTIC_KIND.EARLY_EXIT, 'last')];

    // Entering these states on the last byte always records the advisory, which stays.
    case 'typeEnd':
    case 'breaking':
    case 'scopeEnd':
    case 'colon':
      return [defensive(DIAGNOSTIC_KIND.EARLY_EXIT, 'last')];

    case 'spaces':
      return [unconditional(DIAGNOSTIC_KIND.MISSING_DESCRIPTION, 'previous')];

    case 'description':
      return [{ type: 'captureDescription' }];

    case 'descriptionEnd':
      return [unconditional(DIAGNOSTIC_KIND.MISSING_BLANK_LINE_AT_BODY_BEGIN, 'column')];

    case 'blankLine':
      return [{ type: 'markToken' }, { type: 'captureBody' }];

    case 'body':
      return [{ type: 'captureBody' }];

    case 'fail':
      return NO_ACTIONS;
  }
}

//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// Driver
//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { ignoreBOM: true });

/**
 * Parses a commit message made of a header, an optional blank-line separated body, and nothing
 * else.
 *
 * The scan is a single left-to-right pass over the bytes of the input. When the message is
 * valid, the structured message is returned with no diagnostic. Otherwise the diagnostic tells
 * what went wrong and at which byte offset. In best-effort mode, a failed parse still returns
 * the partial message when it has at least a type and a description.
 *
 * Strings are encoded as UTF-8 before scanning, so reported columns are byte offsets. Captured
 * fields are decoded back as UTF-8 and keep a leading U+FEFF. Byte input that is not valid
 * UTF-8 still scans, but each invalid sequence decodes to U+FFFD in the returned fields.
 *
 * @param input - The commit message
 * @param options - Profile, best-effort mode and optional sink
 * @returns The parsed message and/or the diagnostic
 *
 * @example
 * ```typescript
 * parse('feat(api)!: drop v1 endpoints')
 * // → { message: { type: 'feat', scope: 'api', breaking: true, description: 'drop v1 endpoints', body: null }, diagnostic: null }
 *
 * parse('feat!')
 * // → { message: null, diagnostic: { kind: 'EarlyExit', message: "early exit after '!' character: col=04", position: 4 } }
 *
 * parse('feat: x\nmore', { bestEffort: true })
 * // → message { type: 'feat', description: 'x', ... } and the MissingBlankLineAtBodyBegin diagnostic
 * ```
 */
export function parse(input: string | Uint8Array, options: MachineOptions = {}): ParseResult {
  const { profile = PROFILE.MINIMAL, bestEffort = false, sink } = options;

  const buffer = typeof input === 'string' ? encoder.encode(input) : input;
  const end = buffer.length;
  const root = getTypeTrie(profile);
  const output = new ConventionalCommit(sink);
  const diagnostics = new DiagnosticRecorder(buffer, sink);

  let tokenStart = 0;
  const text = (to: number): string => decoder.decode(buffer.subarray(tokenStart, to));

  const perform = (actions: readonly MachineAction[], p: number): void => {
    for (const action of actions) {
      switch (action.type) {
        case 'markToken':
          tokenStart = p;
          break;
        case 'captureType':
          output.setType(text(p));
          break;
        case 'setBreaking':
          output.setBreaking();
          break;
        case 'captureScope':
          output.setScope(text(p));
          break;
        case 'captureDescription':
          output.setDescription(text(p));
          break;
        case 'captureBody':
          output.setBody(text(p));
          break;
        case 'diagnose':
          diagnostics.record(action.writer, action.kind, action.anchor, p);
          break;
      }
    }
  };

  let state: MachineState = { name: 'start' };

  for (let p = 0; p < end; p++) {
    const { next, actions } = transition(state, buffer[p], root);
    perform(actions, p);
    state = next;

    if (state.name === 'fail') {
      break;
    }
    if (p + 1 === end && ADVISORY_STATES.has(state.name)) {
      diagnostics.advise(p);
    }
  }

  if (state.name !== 'fail') {
    perform(endOfInput(state), end);
  }

  const diagnostic = diagnostics.current;

  if (ACCEPTING_STATES.has(state.name) && diagnostic === null) {
    return { message: output.export(), diagnostic: null };
  }

  if (bestEffort && output.isMinimal()) {
    return { message: output.export(), diagnostic };
  }

  return { message: null, diagnostic };
}

/**
 * Parses a commit message, throwing when it is not fully valid.
 *
 * @param input - The commit message
 * @param options - Profile and optional sink. Best-effort mode has no effect here.
 * @returns The parsed message
 * @throws {ParseError} If the message does not match the grammar
 */
export function parseOrThrow(input: string | Uint8Array, options: MachineOptions = {}): Message {
  const { message, diagnostic } = parse(input, { ...options, bestEffort: false });

  if (diagnostic !== null) {
    throw new ParseError(diagnostic);
  }
  if (message === null) {
    // parse() always pairs a missing message with a diagnostic
    throw new TypeError('Parser returned neither a message nor a diagnostic');
  }

  return message;
}

/**
 * Creates a reusable parser bound to a set of options.
 *
 * @param options - Profile, best-effort mode and optional sink
 * @returns The machine
 *
 * @example
 * ```typescript
 * const machine = createMachine({ profile: 'conventional', bestEffort: true });
 * machine.parse('docs: fix typo').message?.type // → 'docs'
 * ```
 */
export function createMachine(options: MachineOptions = {}): Machine {
  const profile = options.profile ?? PROFILE.MINIMAL;
  const bestEffort = options.bestEffort ?? false;

  return {
    profile,
    bestEffort,
    parse: (input) => parse(input, { profile, bestEffort, sink: options.sink }),
  };
}
