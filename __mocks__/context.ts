import { merge } from 'ts-deepmerge';
import { createDefaultOctokitMock } from '@/tests/helpers/octokit';
import type { MockOctokit } from '@/tests/helpers/octokit';
import type { Context, Repo } from '@/types';

/**
 * Default repository configuration
 */
const defaultRepo: Repo = {
  owner: 'octo-org',
  repo: 'octo-repo',
};

/**
 * Context with the Octokit client replaced by the in-process mock
 */
export type MockContext = Omit<Context, 'octokit'> & { octokit: MockOctokit };

/**
 * Context interface with added utility methods
 */
export interface ContextWithMethods extends MockContext {
  set: (overrides?: Partial<MockContext>) => void;
  reset: () => void;
}

/**
 * Default context values
 */
function createDefaultContext(): MockContext {
  return {
    repo: defaultRepo,
    octokit: createDefaultOctokitMock(),
    prNumber: 1,
    prTitle: 'feat: test pull request',
    issueNumber: 1,
  };
}

// Store the current context configuration
let currentContext: MockContext = createDefaultContext();

/**
 * Context proxy handler
 */
const contextProxyHandler: ProxyHandler<ContextWithMethods> = {
  get(_target: ContextWithMethods, prop: string | symbol): unknown {
    if (typeof prop === 'string') {
      if (prop === 'set') {
        return (overrides: Partial<MockContext> = {}) => {
          // Note: No need for deep merge
          currentContext = { ...currentContext, ...overrides };
        };
      }
      if (prop === 'reset') {
        return () => {
          currentContext = createDefaultContext();
        };
      }
      return Reflect.get(currentContext, prop);
    }
    return undefined;
  },
};

/**
 * Create and export the context mock directly with the proxy
 */
export const context = new Proxy({} as ContextWithMethods, contextProxyHandler);

/**
 * Returns the current context configuration
 */
export function getContext(): MockContext {
  return currentContext;
}

/**
 * Default pull request payload for testing
 */
const defaultPullRequestPayload = {
  action: 'opened',
  pull_request: {
    number: 123,
    title: 'feat: test pull request',
    body: 'Test PR body',
    merged: false,
  },
  repository: {
    full_name: 'octo-org/octo-repo',
  },
};

/**
 * Create a mock pull request factory function
 */
export function createPullRequestMock(overrides: Record<string, unknown> = {}) {
  return merge(defaultPullRequestPayload, overrides);
}
