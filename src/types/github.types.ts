import type { Diagnostic, Message } from '@/types/machine.types';
import type { PaginateInterface } from '@octokit/plugin-paginate-rest';
import type { Api } from '@octokit/plugin-rest-endpoint-methods';

/**
 * GitHub API and repository related types
 */

/**
 * Custom type that extends Octokit with pagination support
 */
export type OctokitRestApi = Api & { paginate: PaginateInterface };

/**
 * Details about a specific commit of the pull request.
 */
export interface CommitDetails {
  /**
   * The commit message.
   */
  message: string;

  /**
   * The SHA-1 hash of the commit.
   */
  sha: string;
}

/**
 * Validation outcome of a single commit message (or of the pull request title).
 */
export interface CommitValidation {
  /**
   * The commit SHA, or `null` for the pull request title.
   */
  sha: string | null;

  /**
   * The first line of the validated message.
   */
  header: string;

  /**
   * The parsed message. Present on success, and on failure in best-effort mode when the
   * message has at least a type and a description.
   */
  message: Message | null;

  /**
   * The diagnostic, or `null` when the message is valid.
   */
  diagnostic: Diagnostic | null;
}

/**
 * Interface representing the repository structure of a GitHub repo in the form of the owner and name.
 */
export interface Repo {
  /**
   * The owner of the repository, typically a GitHub user or an organization.
   */
  owner: string;

  /**
   * The name of the repository.
   */
  repo: string;
}
