import { computeReleaseType } from '@/commit-analyzer';
import { getConfig } from '@/config';
import { getContext } from '@/context';
import { createActionsSink } from '@/diagnostic-sink';
import { parse } from '@/machine';
import { addValidationComment, getPullRequestCommits } from '@/pull-request';
import type { CommitDetails, CommitValidation, Config, Context, Diagnostic, Message } from '@/types';
import { getMessageHeader, shortSha } from '@/utils/string';
import { endGroup, error, info, isDebug, setFailed, setOutput, startGroup } from '@actions/core';

/**
 * Initializes and returns the configuration and context objects.
 * Config must be initialized before context due to dependency constraints.
 *
 * @returns {{ config: Config; context: Context }} Initialized config and context objects.
 */
function initialize(): { config: Config; context: Context } {
  const configInstance = getConfig();
  const contextInstance = getContext();

  return { config: configInstance, context: contextInstance };
}

/**
 * Runs the machine over a single message with the configured profile and best-effort mode.
 *
 * Surrounding white-space is removed first, so a trailing newline left by the editor does not
 * count as the start of a body.
 *
 * @param {string} text - The message to validate
 * @param {string | null} sha - The commit SHA, or `null` for the pull request title
 * @param {Config} config - The action configuration
 * @returns {CommitValidation} The validation outcome
 */
export function validateMessage(text: string, sha: string | null, config: Config): CommitValidation {
  const trimmed = text.trim();
  const { message, diagnostic } = parse(trimmed, {
    profile: config.types,
    bestEffort: config.bestEffort,
    sink: isDebug() ? createActionsSink() : undefined,
  });

  return { sha, header: getMessageHeader(trimmed), message, diagnostic };
}

/**
 * Removes the commits whose header starts with one of the configured ignore prefixes.
 *
 * @param {CommitDetails[]} commits - The pull request commits
 * @param {string[]} prefixes - The ignore prefixes
 * @returns {CommitDetails[]} The commits to validate
 */
export function filterIgnoredCommits(commits: CommitDetails[], prefixes: string[]): CommitDetails[] {
  return commits.filter(({ message, sha }) => {
    const header = getMessageHeader(message);
    const prefix = prefixes.find((candidate) => candidate !== '' && header.startsWith(candidate));
    if (prefix !== undefined) {
      info(`Skipping commit ${shortSha(sha)} (matches ignore prefix "${prefix}")`);
      return false;
    }

    return true;
  });
}

/**
 * Reports every failed validation as an error annotation.
 *
 * @param {CommitValidation[]} validations - The validations to report
 */
function reportDiagnostics(validations: CommitValidation[]): void {
  for (const { sha, header, diagnostic } of validations) {
    if (diagnostic === null) {
      info(`✅ ${sha === null ? 'Pull request title' : shortSha(sha)}: ${header}`);
      continue;
    }

    error(`${diagnostic.message}\n\n${header}`, {
      title: sha === null ? 'Invalid pull request title' : `Invalid commit message ${shortSha(sha)}`,
    });
  }
}

/**
 * Sets GitHub Action outputs describing the validation of the pull request.
 *
 * - `valid`: Whether every validated message follows the format
 * - `invalid-commits`: SHAs of the commits whose message does not follow the format
 * - `release-type`: The highest release type implied by the valid commits (`major`, `minor`,
 *   `patch`), or an empty string
 * - `commits`: Object mapping every validated commit SHA to its parsed message and diagnostic
 *
 * @param {CommitValidation[]} validations - The validations, including the pull request title if validated
 * @param {CommitDetails[]} commits - The validated commits
 */
function setActionOutputs(validations: CommitValidation[], commits: CommitDetails[]): void {
  const invalidCommits: string[] = [];
  const commitsMap: Record<string, { message: Message | null; diagnostic: Diagnostic | null }> = {};

  for (const { sha, message, diagnostic } of validations) {
    if (sha === null) {
      continue;
    }

    commitsMap[sha] = { message, diagnostic };
    if (diagnostic !== null) {
      invalidCommits.push(sha);
    }
  }

  const valid = validations.every(({ diagnostic }) => diagnostic === null);
  const releaseType = computeReleaseType(
    commits.filter(({ sha }) => !invalidCommits.includes(sha)).map(({ message }) => message),
  );

  startGroup('GitHub Action Outputs');
  info(`Valid: ${valid}`);
  info(`Invalid commits: ${JSON.stringify(invalidCommits)}`);
  info(`Release type: ${releaseType ?? ''}`);
  info(`Commits: ${JSON.stringify(commitsMap, null, 2)}`);
  endGroup();

  setOutput('valid', valid);
  setOutput('invalid-commits', invalidCommits);
  setOutput('release-type', releaseType ?? '');
  setOutput('commits', commitsMap);
}

/**
 * Executes the main process of the conventional-commit-validator action.
 *
 * This function validates the pull request by:
 * 1. Collecting the pull request commits and dropping those matching an ignore prefix
 * 2. Validating every commit message (and the pull request title, when enabled)
 * 3. Reporting each invalid message as an error annotation
 * 4. Replacing the pull request summary comment, unless disabled
 * 5. Setting the GitHub Action outputs
 *
 * The step fails when at least one message is invalid.
 *
 * @returns {Promise<void>} A promise that resolves when the process completes
 * @throws Will capture and report any errors through setFailed
 */
export async function run(): Promise<void> {
  try {
    const { config, context } = initialize();

    const commits = filterIgnoredCommits(await getPullRequestCommits(), config.ignoreCommitPrefixes);

    startGroup('Validating commit messages');
    const validations = commits.map(({ message, sha }) => validateMessage(message, sha, config));
    if (config.validatePullRequestTitle) {
      validations.unshift(validateMessage(getMessageHeader(context.prTitle), null, config));
    }
    reportDiagnostics(validations);
    endGroup();

    if (config.disableComment) {
      info('Pull request comment is disabled. Skipping.');
    } else {
      await addValidationComment(validations);
    }

    setActionOutputs(validations, commits);

    const invalidCount = validations.filter(({ diagnostic }) => diagnostic !== null).length;
    if (invalidCount > 0) {
      setFailed(
        `${invalidCount} of ${validations.length} ${validations.length === 1 ? 'message does' : 'messages do'} not follow the Conventional Commits format.`,
      );
    }
  } catch (error) {
    if (error instanceof Error) {
      setFailed(error.message);
    }
  }
}
