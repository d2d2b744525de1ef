import type { ActionInputMetadata, Config } from '@/types';
import { getBooleanInput, getInput } from '@actions/core';

/**
 * Factory functions to reduce duplication in ACTION_INPUTS metadata definitions.
 * These functions create standardized metadata objects for common input patterns.
 */
const requiredString = (configKey: keyof Config): ActionInputMetadata => ({
  configKey,
  required: true,
  type: 'string',
});

const requiredBoolean = (configKey: keyof Config): ActionInputMetadata => ({
  configKey,
  required: true,
  type: 'boolean',
});

const optionalArray = (configKey: keyof Config): ActionInputMetadata => ({
  configKey,
  required: false,
  type: 'array',
});

/**
 * Complete mapping of all GitHub Action inputs to their metadata.
 * This is the single source of truth for input configuration.
 * Note: defaultValue is removed as defaults come from action.yml at runtime
 */
export const ACTION_INPUTS: Record<string, ActionInputMetadata> = {
  types: requiredString('types'),
  'best-effort': requiredBoolean('bestEffort'),
  'validate-pull-request-title': requiredBoolean('validatePullRequestTitle'),
  'ignore-commit-prefixes': optionalArray('ignoreCommitPrefixes'),
  'disable-comment': requiredBoolean('disableComment'),
  'disable-branding': requiredBoolean('disableBranding'),
  github_token: requiredString('githubToken'),
} as const;

/**
 * Creates a config object by reading inputs using GitHub Actions API and converting them
 * according to the metadata definitions. This provides a dynamic way to build the config
 * without manually mapping each input.
 */
export function createConfigFromInputs(): Config {
  const config = {} as Config;

  for (const [inputName, metadata] of Object.entries(ACTION_INPUTS)) {
    const { configKey, required, type } = metadata;

    try {
      let value: unknown;

      if (type === 'boolean') {
        // Use getBooleanInput for boolean types for proper parsing
        value = getBooleanInput(inputName, { required });
      } else if (type === 'array') {
        // Handle array inputs with special parsing
        const input = getInput(inputName, { required });

        if (!input || input.trim() === '') {
          value = [];
        } else {
          value = Array.from(
            new Set(
              input
                .split(',')
                .map((item: string) => item.trim())
                .filter(Boolean),
            ),
          );
        }
      } else {
        // Handle string inputs
        value = getInput(inputName, { required });
      }

      // Safely assign to config using the configKey
      Object.assign(config, { [configKey]: value });
    } catch (error) {
      throw new Error(
        `Failed to process input '${inputName}': ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  return config;
}
