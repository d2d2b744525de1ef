import { CommitParser } from 'conventional-commits-parser';
import { config } from '@/config';
import { formatMessage, isBreakingChange, isFeat } from '@/conventional-commit';
import { parse } from '@/machine';
import type { ConventionalCommitResult, MachineOptions, ReleaseType } from '@/types';
import { BREAKING_CHANGE_NOTE_KEYWORDS, RELEASE_TYPE } from '@/utils/constants';

/**
 * Footer parser used once the machine has accepted a message.
 *
 * The machine owns the header grammar (type, scope, `!`, description) and the body boundary. It
 * does not look inside the body, so `BREAKING CHANGE:` and `BREAKING-CHANGE:` footers are
 * extracted here with `conventional-commits-parser`, fed with the message rebuilt by
 * `formatMessage()`.
 *
 * - `headerPattern` accepts the optional `!` so that headers the machine produced always match.
 * - `noteKeywords` are the footer tokens that mark a breaking change.
 */
const footerParser = new CommitParser({
  headerPattern: /^(\w*)(?:\((.*)\))?!?: (.*)$/,
  headerCorrespondence: ['type', 'scope', 'subject'],
  noteKeywords: BREAKING_CHANGE_NOTE_KEYWORDS,
});

//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// Single-message detection
//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

/**
 * Parses a commit message according to the Conventional Commits grammar.
 *
 * The message is trimmed, then scanned by the machine with the configured keyword profile and
 * best-effort mode (each can be overridden through `options`). A message the machine accepts
 * (or, in best-effort mode, partially accepts) is then checked for breaking change footers.
 *
 * @param message - The full commit message string
 * @param options - Optional profile and best-effort overrides, defaulting to the action config
 * @returns The parsed result, or `null` if the message is not a conventional commit
 *
 * @example
 * ```typescript
 * parseConventionalCommit('feat(api): add user endpoint')
 * // → { type: 'feat', scope: 'api', breaking: false, description: 'add user endpoint', body: null }
 *
 * parseConventionalCommit('fix!: critical security patch')
 * // → { type: 'fix', scope: null, breaking: true, description: 'critical security patch', body: null }
 *
 * parseConventionalCommit('feat: new feature\n\nBREAKING CHANGE: old API removed')
 * // → { type: 'feat', scope: null, breaking: true, description: 'new feature', body: 'BREAKING CHANGE: old API removed' }
 * ```
 */
export function parseConventionalCommit(
  message: string,
  options: Pick<MachineOptions, 'profile' | 'bestEffort'> = {},
): ConventionalCommitResult | null {
  const trimmed = message.trim();
  if (!trimmed) {
    return null;
  }

  const { message: parsed } = parse(trimmed, {
    profile: options.profile ?? config.types,
    bestEffort: options.bestEffort ?? config.bestEffort,
  });

  if (parsed === null) {
    return null;
  }

  const breakingNote = parsed.body !== null && footerParser.parse(formatMessage(parsed)).notes.length > 0;

  return {
    type: parsed.type,
    scope: parsed.scope,
    breaking: parsed.breaking || breakingNote,
    description: parsed.description,
    body: parsed.body,
  };
}

/**
 * Determines the semantic version release type from a single commit message.
 *
 * - Breaking change (`!` or `BREAKING CHANGE` footer) → MAJOR
 * - `feat` → MINOR
 * - Any other accepted type (`fix`, `docs`, `chore`, ...) → PATCH
 *
 * @param message - The full commit message string
 * @returns The computed release type, or `null` if the message is not a conventional commit
 *
 * @example
 * ```typescript
 * detectConventionalCommitReleaseType('feat: add login')
 * // → 'minor'
 *
 * detectConventionalCommitReleaseType('fix!: security patch')
 * // → 'major'
 *
 * detectConventionalCommitReleaseType('update readme')
 * // → null
 * ```
 */
export function detectConventionalCommitReleaseType(message: string): ReleaseType | null {
  const parsed = parseConventionalCommit(message);

  if (!parsed) {
    return null;
  }

  // Breaking changes always produce a MAJOR release, regardless of type
  if (isBreakingChange(parsed)) {
    return RELEASE_TYPE.MAJOR;
  }

  if (isFeat(parsed)) {
    return RELEASE_TYPE.MINOR;
  }

  return RELEASE_TYPE.PATCH;
}

//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// Multi-message orchestration
//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

/**
 * Returns the higher-priority release type between two values (MAJOR > MINOR > PATCH).
 *
 * @param current - The current accumulated release type (may be null on first iteration)
 * @param candidate - The release type from the current commit
 * @returns The higher-priority of the two release types
 *
 * @example
 * ```typescript
 * higherPriorityReleaseType(null, 'patch')    // → 'patch'
 * higherPriorityReleaseType('patch', 'minor') // → 'minor'
 * higherPriorityReleaseType('major', 'patch') // → 'major'
 * ```
 */
export function higherPriorityReleaseType(current: ReleaseType | null, candidate: ReleaseType): ReleaseType {
  if (candidate === RELEASE_TYPE.MAJOR || current === RELEASE_TYPE.MAJOR) {
    return RELEASE_TYPE.MAJOR;
  }
  if (candidate === RELEASE_TYPE.MINOR || current === RELEASE_TYPE.MINOR) {
    return RELEASE_TYPE.MINOR;
  }
  return RELEASE_TYPE.PATCH;
}

/**
 * Computes the highest-priority release type across an array of commit messages.
 *
 * Messages that are not conventional commits are skipped. Returns `null` when none of them is.
 *
 * @param messages - The commit messages to analyze
 * @returns The highest-priority release type found, or `null`
 *
 * @example
 * ```typescript
 * computeReleaseType(['feat: add login', 'fix!: security patch'])
 * // → 'major'
 * ```
 */
export function computeReleaseType(messages: ReadonlyArray<string>): ReleaseType | null {
  let result: ReleaseType | null = null;

  for (const message of messages) {
    const releaseType = detectConventionalCommitReleaseType(message);
    if (releaseType !== null) {
      result = higherPriorityReleaseType(result, releaseType);
    }
  }

  return result;
}
