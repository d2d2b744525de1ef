import type { OctokitRestApi, Repo } from '@/types/github.types';

/**
 * Pull request the action validates, together with an authenticated API client.
 */
export interface Context {
  /**
   * The repository the pull request belongs to.
   */
  repo: Repo;

  /**
   * Octokit client with the REST endpoint methods and pagination plugins, authenticated with the
   * `github_token` input.
   */
  octokit: OctokitRestApi;

  /**
   * The pull request number. Used to list its commits.
   */
  prNumber: number;

  /**
   * The pull request title, trimmed. Validated as a commit header when enabled.
   */
  prTitle: string;

  /**
   * The issue number the summary comment is posted on. Same as `prNumber` for pull requests.
   */
  issueNumber: number;
}
