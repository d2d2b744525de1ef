import * as fs from 'node:fs';
import { config } from '@/config';
import type { Context, OctokitRestApi } from '@/types';
import { endGroup, info, startGroup } from '@actions/core';
import { Octokit } from '@octokit/core';
import { paginateRest } from '@octokit/plugin-paginate-rest';
import { restEndpointMethods } from '@octokit/plugin-rest-endpoint-methods';
import type { PullRequestEvent } from '@octokit/webhooks-types';
import { homepage, version } from '../package.json';

/**
 * Events whose payload carries the pull request to validate.
 */
const PULL_REQUEST_EVENTS = ['pull_request', 'pull_request_target'];

let contextInstance: Context | null = null;

/**
 * Reads an environment variable set by the Actions runner.
 *
 * @param {string} name - The variable name
 * @returns {string} The non-empty value
 * @throws {Error} If the variable is missing or empty
 */
function getRequiredEnvironmentVar(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(
      `The ${name} environment variable is missing or invalid. This variable should be automatically set by GitHub for each workflow run. If this variable is missing or not correctly set, it indicates a serious issue with the GitHub Actions environment, potentially affecting the execution of subsequent steps in the workflow. Please review the workflow setup or consult the documentation for proper configuration.`,
    );
  }

  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Runtime check of the payload fields this action reads: the pull request number and title,
 * and the repository full name.
 */
function isPullRequestEvent(payload: unknown): payload is PullRequestEvent {
  if (!isRecord(payload) || !isRecord(payload.pull_request) || !isRecord(payload.repository)) {
    return false;
  }

  const { pull_request: pullRequest, repository } = payload;

  return (
    typeof pullRequest.number === 'number' &&
    typeof pullRequest.title === 'string' &&
    typeof repository.full_name === 'string'
  );
}

/**
 * Loads the webhook payload of the triggering event.
 *
 * @param {string} eventPath - Value of `GITHUB_EVENT_PATH`
 * @returns {PullRequestEvent} The pull request payload
 * @throws {Error} If the file does not exist or does not hold a pull request payload
 */
function readPullRequestEvent(eventPath: string): PullRequestEvent {
  if (!fs.existsSync(eventPath)) {
    throw new Error(`Specified GITHUB_EVENT_PATH ${eventPath} does not exist`);
  }

  const payload: unknown = JSON.parse(fs.readFileSync(eventPath, { encoding: 'utf8' }));
  if (!isPullRequestEvent(payload)) {
    throw new Error('Event payload did not match expected pull_request event payload');
  }

  return payload;
}

/**
 * Creates the API client used to list commits and manage the summary comment.
 */
function createOctokit(): OctokitRestApi {
  const RestOctokit = Octokit.plugin(restEndpointMethods, paginateRest);

  return new RestOctokit({
    auth: `token ${config.githubToken}`,
    userAgent: `[octokit] conventional-commit-validator/${version} (${homepage})`,
  });
}

/**
 * Clears the cached context so the next access reads the environment again. Only effective when
 * `NODE_ENV` is `test`.
 */
export function clearContextForTesting(): void {
  if (process.env.NODE_ENV === 'test') {
    contextInstance = null;
  }
}

/**
 * Builds the context from the runner environment on first use and caches it.
 *
 * @returns {Context} The pull request context
 * @throws {Error} If the workflow was not triggered by a pull request event
 */
function initializeContext(): Context {
  if (contextInstance) {
    return contextInstance;
  }

  try {
    startGroup('Initializing Context');

    const eventName = getRequiredEnvironmentVar('GITHUB_EVENT_NAME');
    const repository = getRequiredEnvironmentVar('GITHUB_REPOSITORY');
    const eventPath = getRequiredEnvironmentVar('GITHUB_EVENT_PATH');

    if (!PULL_REQUEST_EVENTS.includes(eventName)) {
      throw new Error(
        'This workflow is not running in the context of a pull request. Ensure this workflow is triggered by a pull request event.',
      );
    }

    const { pull_request: pullRequest } = readPullRequestEvent(eventPath);
    const [owner, repo] = repository.split('/');

    contextInstance = {
      repo: { owner, repo },
      octokit: createOctokit(),
      prNumber: pullRequest.number,
      prTitle: pullRequest.title.trim(),
      issueNumber: pullRequest.number,
    };

    info(`Event Name: ${eventName}`);
    info(`Repository: ${owner}/${repo}`);
    info(`Pull Request: #${contextInstance.prNumber} ${contextInstance.prTitle}`);

    return contextInstance;
  } finally {
    endGroup();
  }
}

export const getContext = (): Context => {
  return initializeContext();
};

export const context: Context = new Proxy({} as Context, {
  get(target, prop) {
    return getContext()[prop as keyof Context];
  },
});
