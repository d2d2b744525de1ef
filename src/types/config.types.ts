import type { Profile } from '@/types/common.types';

/**
 * Configuration related types
 */

/**
 * Configuration interface used for defining key GitHub Action input configuration.
 */
export interface Config {
  /**
   * The keyword vocabulary accepted as commit message types. One of:
   * - `minimal`: feat, fix
   * - `conventional`: build, chore, ci, docs, feat, fix, perf, refactor, revert, style, test
   * - `falco`: build, chore, ci, docs, feat, fix, new, perf, revert, rule, test, update
   */
  types: Profile;

  /**
   * Whether invalid commit messages that still carry a type and a description are reported
   * with their partially parsed fields. The commit is still reported as invalid.
   */
  bestEffort: boolean;

  /**
   * Whether the pull request title is validated as a commit header in addition to the commits.
   * This is useful for repositories that squash merge, where the title becomes the commit message.
   */
  validatePullRequestTitle: boolean;

  /**
   * Commits whose header (first line) starts with any of these prefixes are skipped
   * (e.g., "Merge branch"). Matching is case-sensitive; empty prefixes never match.
   */
  ignoreCommitPrefixes: string[];

  /**
   * Whether to skip posting the validation summary comment on the pull request.
   */
  disableComment: boolean;

  /**
   * Flag to control whether the small branding link should be disabled or not in the
   * pull request (PR) comments. When branding is enabled, a link to the action's
   * repository is added at the bottom of comments.
   */
  disableBranding: boolean;

  /**
   * The GitHub token (`GITHUB_TOKEN`) used for API authentication.
   * This token is required to list pull request commits and post comments.
   */
  githubToken: string;
}
