import type { Config } from '@/types';
import { ALLOWED_PROFILES } from '@/utils/constants';
import { createConfigFromInputs } from '@/utils/metadata';
import { endGroup, info, startGroup } from '@actions/core';

// Keep configInstance private to this module
let configInstance: Config | null = null;

/**
 * Clears the cached config instance during testing.
 *
 * This utility function is specifically designed for testing scenarios where
 * multiple different configurations need to be tested. It resets the singleton
 * instance to null, allowing the next config initialization to start fresh with
 * new mocked values.
 *
 * @remarks
 * - This function only works when NODE_ENV is set to 'test'
 * - It is intended for testing purposes only and should not be used in production code
 * - Typically used in beforeEach() test setup or before testing different config variations
 */
export function clearConfigForTesting(): void {
  if (process.env.NODE_ENV === 'test') {
    configInstance = null;
  }
}

/**
 * Lazy-initialized configuration object. This is kept separate from the exported
 * config to allow testing utilities to be imported without triggering initialization.
 */
function initializeConfig(): Config {
  if (configInstance) {
    return configInstance;
  }

  try {
    startGroup('Initializing Config');

    // Initialize the config instance using action metadata
    configInstance = createConfigFromInputs();

    // Validate the keyword vocabulary
    if (!ALLOWED_PROFILES.includes(configInstance.types)) {
      throw new TypeError(`Invalid types '${configInstance.types}'. Must be one of: ${ALLOWED_PROFILES.join(', ')}`);
    }

    info(`Types: ${configInstance.types}`);
    info(`Best Effort: ${configInstance.bestEffort}`);
    info(`Validate Pull Request Title: ${configInstance.validatePullRequestTitle}`);
    info(`Ignore Commit Prefixes: ${configInstance.ignoreCommitPrefixes.join(', ')}`);
    info(`Disable Comment: ${configInstance.disableComment}`);
    info(`Disable Branding: ${configInstance.disableBranding}`);

    return configInstance;
  } finally {
    endGroup();
  }
}

// Create a getter for the config that initializes on first use
export function getConfig(): Config {
  return initializeConfig();
}

// For backward compatibility and existing usage
export const config: Config = new Proxy({} as Config, {
  get(_target, prop) {
    return getConfig()[prop as keyof Config];
  },
});
