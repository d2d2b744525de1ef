import { config } from '@/config';
import { context } from '@/context';
import type { CommitDetails, CommitValidation } from '@/types';
import { BRANDING_COMMENT, PR_SUMMARY_MARKER } from '@/utils/constants';
import { escapeTableCell, shortSha } from '@/utils/string';
import { debug, endGroup, info, startGroup } from '@actions/core';
import { RequestError } from '@octokit/request-error';

/**
 * Retrieves the commits of the current pull request, oldest first.
 *
 * @returns {Promise<CommitDetails[]>} A promise that resolves to the message and SHA of every commit.
 * @throws {Error} Throws an error if the request to fetch commits fails or if permissions
 *                 are insufficient to read the pull request.
 */
export async function getPullRequestCommits(): Promise<CommitDetails[]> {
  console.time('Elapsed time fetching commits');
  startGroup('Fetching pull request commits');

  try {
    const {
      octokit,
      repo: { owner, repo },
      prNumber: pull_number,
    } = context;

    const iterator = octokit.paginate.iterator(octokit.rest.pulls.listCommits, { owner, repo, pull_number });

    const commits: CommitDetails[] = [];
    for await (const { data } of iterator) {
      for (const commit of data) {
        commits.push({
          message: commit.commit.message,
          sha: commit.sha,
        });
      }
    }

    info(`Found ${commits.length} commit${commits.length !== 1 ? 's' : ''}.`);
    debug(JSON.stringify(commits, null, 2));

    return commits;
  } catch (error) {
    // A 403 means the workflow token cannot read the pull request. Make it clear what needs to change.
    if (error instanceof RequestError && error.status === 403) {
      throw new Error(
        `Unable to read pull requests due to insufficient permissions. Ensure the workflow permissions.pull-requests is set to "write".\n${error.message}`,
        { cause: error },
      );
    }
    throw error;
    /* c8 ignore next */
  } finally {
    console.timeEnd('Elapsed time fetching commits');
    endGroup();
  }
}

/**
 * Renders the table row of a single validation.
 *
 * @param {CommitValidation} validation - The validation to render
 * @returns {string} The markdown table row
 */
function renderValidationRow({ sha, header, diagnostic }: CommitValidation): string {
  const subject = sha === null ? 'Pull request title' : `<code>${shortSha(sha)}</code>`;
  const result = diagnostic === null ? '✅' : `❌ ${escapeTableCell(diagnostic.message)}`;

  return `| ${subject} | ${escapeTableCell(header)} | ${result} |`;
}

/**
 * Builds the body of the pull request summary comment.
 *
 * @param {CommitValidation[]} validations - The validations to summarize
 * @returns {string} The markdown comment body, starting with the summary marker
 */
export function getValidationCommentBody(validations: CommitValidation[]): string {
  const invalidCount = validations.filter(({ diagnostic }) => diagnostic !== null).length;

  const commentBody: string[] = [PR_SUMMARY_MARKER];

  if (invalidCount > 0) {
    commentBody.push('\n# ❌ Conventional Commits\n');
    commentBody.push(
      `**${invalidCount} of ${validations.length} ${validations.length === 1 ? 'message does' : 'messages do'} not follow the Conventional Commits format.**\n`,
    );
  } else {
    commentBody.push('\n# ✅ Conventional Commits\n');
  }

  if (validations.length === 0) {
    commentBody.push('No commits to validate in this pull request.');
  } else {
    commentBody.push('| Commit | Header | Result |', '|--|--|--|');
    for (const validation of validations) {
      commentBody.push(renderValidationRow(validation));
    }
  }

  if (config.disableBranding === false) {
    commentBody.push(`\n${BRANDING_COMMENT}`);
  }

  return commentBody.join('\n').trim();
}

/**
 * Comments on the pull request with the validation result of every commit, replacing the
 * summary comment posted by a previous run.
 *
 * @param {CommitValidation[]} validations - The validations to report
 * @returns {Promise<void>} A promise that resolves when the comment has been posted and previous
 * summary comments have been deleted.
 * @throws {Error} Throws an error if there are permission issues or other failures when posting
 * to the GitHub API.
 */
export async function addValidationComment(validations: CommitValidation[]): Promise<void> {
  console.time('Elapsed time commenting on pull request');
  startGroup('Adding pull request validation comment');

  try {
    const {
      octokit,
      repo: { owner, repo },
      issueNumber: issue_number,
    } = context;

    // Create new PR comment (Requires permission > pull-requests: write)
    const { data: newComment } = await octokit.rest.issues.createComment({
      issue_number,
      owner,
      repo,
      body: getValidationCommentBody(validations),
    });
    info(`Posted comment ${newComment.id} @ ${newComment.html_url}`);

    // Filter out the comments that contain the PR summary marker and are not the current comment
    const iterator = octokit.paginate.iterator(octokit.rest.issues.listComments, { issue_number, owner, repo });
    const commentsToDelete = [];
    for await (const { data } of iterator) {
      for (const comment of data) {
        if (comment.body?.includes(PR_SUMMARY_MARKER) && comment.id !== newComment.id) {
          commentsToDelete.push(comment);
        }
      }
    }

    // Delete all our previous comments
    for (const comment of commentsToDelete) {
      info(`Deleting previous PR comment from ${comment.created_at}`);
      await octokit.rest.issues.deleteComment({ comment_id: comment.id, owner, repo });
    }
  } catch (error) {
    if (error instanceof RequestError) {
      throw new Error(
        [
          `Failed to create a comment on the pull request: ${error.message} - Ensure that the`,
          'GitHub Actions workflow has the correct permissions to write comments. To grant the required permissions,',
          'update your workflow YAML file with the following block under "permissions":\n\npermissions:\n',
          ' pull-requests: write',
        ].join(' '),
        { cause: error },
      );
    }

    const errorMessage = error instanceof Error ? error.message.trim() : String(error).trim();
    throw new Error(`Failed to create a comment on the pull request: ${errorMessage}`, { cause: error });
  } finally {
    console.timeEnd('Elapsed time commenting on pull request');
    endGroup();
  }
}
