/**
 * Release type constants for semantic versioning
 */
export const RELEASE_TYPE = {
  MAJOR: 'major',
  MINOR: 'minor',
  PATCH: 'patch',
} as const;

/**
 * Keyword vocabularies the machine can be configured with. Each profile selects one of the
 * compiled type tries in `type-tables.ts`.
 */
export const PROFILE = {
  MINIMAL: 'minimal',
  CONVENTIONAL: 'conventional',
  FALCO: 'falco',
} as const;

export const ALLOWED_PROFILES = Object.values(PROFILE);

/**
 * Diagnostic kinds produced by the machine. The message templates for each kind live in
 * `diagnostics.ts`.
 */
export const DIAGNOSTIC_KIND = {
  ILLEGAL_TYPE_CHAR: 'IllegalTypeChar',
  MISSING_COLON: 'MissingColon',
  INCOMPLETE_TYPE: 'IncompleteType',
  MALFORMED_SCOPE: 'MalformedScope',
  EMPTY_INPUT: 'EmptyInput',
  EARLY_EXIT: 'EarlyExit',
  MISSING_DESCRIPTION_INITIAL_SPACE: 'MissingDescriptionInitialSpace',
  MISSING_DESCRIPTION: 'MissingDescription',
  ILLEGAL_NEWLINE: 'IllegalNewline',
  MISSING_BLANK_LINE_AT_BODY_BEGIN: 'MissingBlankLineAtBodyBegin',
} as const;

/**
 * Byte values the machine interprets. Every other byte passes through untouched inside the
 * scope, description and body.
 */
export const BYTE = {
  LF: 0x0a,
  CR: 0x0d,
  SPACE: 0x20,
  EXCLAMATION: 0x21,
  OPEN_PAREN: 0x28,
  CLOSE_PAREN: 0x29,
  COLON: 0x3a,
} as const;

/**
 * Footer tokens that mark a breaking change in the commit body.
 */
export const BREAKING_CHANGE_NOTE_KEYWORDS = ['BREAKING CHANGE', 'BREAKING-CHANGE'];

export const PR_SUMMARY_MARKER = '<!-- conventional-commit-validator pr-summary-marker -->';

export const PROJECT_URL = 'https://github.com/conventional-commit-validator/conventional-commit-validator';

export const BRANDING_COMMENT = `<h4 align="center"><sub align="middle">Validated by <a href="${PROJECT_URL}">conventional-commit-validator</a></sub></h4>`;

/**
 * Number of characters of a commit SHA shown in annotations and comments.
 */
export const SHORT_SHA_LENGTH = 7;
