import { getActionDefaults } from '@/tests/helpers/action-defaults';
import type { ActionInputMetadata } from '@/types';
import { ACTION_INPUTS, createConfigFromInputs } from '@/utils/metadata';
import { getBooleanInput, getInput } from '@actions/core';
import { describe, expect, it, vi } from 'vitest';

describe('utils/metadata', () => {
  describe('ACTION_INPUTS', () => {
    it('should contain all expected input configurations', () => {
      expect(Object.keys(ACTION_INPUTS)).toEqual([
        'types',
        'best-effort',
        'validate-pull-request-title',
        'ignore-commit-prefixes',
        'disable-comment',
        'disable-branding',
        'github_token',
      ]);
    });

    it('should have correct metadata structure for required boolean inputs', () => {
      for (const inputName of ['best-effort', 'validate-pull-request-title', 'disable-comment', 'disable-branding']) {
        expect(ACTION_INPUTS[inputName]).toEqual({
          configKey: expect.any(String),
          required: true,
          type: 'boolean',
        });
      }
    });

    it('should have correct metadata structure for optional array inputs', () => {
      expect(ACTION_INPUTS['ignore-commit-prefixes']).toEqual({
        configKey: 'ignoreCommitPrefixes',
        required: false,
        type: 'array',
      });
    });

    it('should have proper configKey mappings', () => {
      const expectedMappings: Record<string, string> = {
        types: 'types',
        'best-effort': 'bestEffort',
        'validate-pull-request-title': 'validatePullRequestTitle',
        'ignore-commit-prefixes': 'ignoreCommitPrefixes',
        'disable-comment': 'disableComment',
        'disable-branding': 'disableBranding',
        github_token: 'githubToken',
      };

      for (const [inputName, expectedConfigKey] of Object.entries(expectedMappings)) {
        expect(ACTION_INPUTS[inputName].configKey).toBe(expectedConfigKey);
      }
    });

    it('should only use known metadata types', () => {
      const validTypes: ActionInputMetadata['type'][] = ['string', 'boolean', 'array'];
      for (const metadata of Object.values(ACTION_INPUTS)) {
        expect(validTypes).toContain(metadata.type);
      }
    });

    it('should declare a default in action.yml for every required input', () => {
      const defaults = getActionDefaults();

      expect(defaults).toEqual({
        types: 'conventional',
        'best-effort': 'false',
        'validate-pull-request-title': 'false',
        'ignore-commit-prefixes': 'Merge branch,Merge pull request,Merge remote-tracking branch',
        'disable-comment': 'false',
        'disable-branding': 'false',
        github_token: '${{ github.token }}',
      });
    });
  });

  describe('createConfigFromInputs', () => {
    it('should throw a custom error if getInput fails', () => {
      const errorMessage = 'Input retrieval failed';
      vi.mocked(getInput).mockImplementationOnce(() => {
        throw new Error(errorMessage);
      });

      expect(() => createConfigFromInputs()).toThrow(`Failed to process input 'types': ${errorMessage}`);
    });

    it('should handle non-Error objects thrown during input processing', () => {
      const errorObject = 'A plain string error';
      vi.mocked(getInput).mockImplementationOnce(() => {
        throw errorObject;
      });

      expect(() => createConfigFromInputs()).toThrow(`Failed to process input 'types': ${errorObject}`);
    });

    it('should process all input types correctly', () => {
      const mockValues: Record<string, string> = {
        types: 'falco',
        'ignore-commit-prefixes': 'Merge branch, Revert ,Merge branch',
        github_token: 'test-token',
      };
      const mockBooleans: Record<string, boolean> = {
        'best-effort': true,
        'validate-pull-request-title': true,
      };
      vi.mocked(getInput).mockImplementation((name) => mockValues[name] ?? '');
      vi.mocked(getBooleanInput).mockImplementation((name) => mockBooleans[name] ?? false);

      expect(createConfigFromInputs()).toEqual({
        types: 'falco',
        bestEffort: true,
        validatePullRequestTitle: true,
        ignoreCommitPrefixes: ['Merge branch', 'Revert'],
        disableComment: false,
        disableBranding: false,
        githubToken: 'test-token',
      });
    });
  });
});
