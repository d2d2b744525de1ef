import {
  computeReleaseType,
  detectConventionalCommitReleaseType,
  higherPriorityReleaseType,
  parseConventionalCommit,
} from '@/commit-analyzer';
import { config } from '@/mocks/config';
import { afterEach, describe, expect, it } from 'vitest';

describe('commit-analyzer', () => {
  afterEach(() => {
    config.resetDefaults();
  });

  describe('parseConventionalCommit()', () => {
    it('should parse header fields', () => {
      expect(parseConventionalCommit('feat(api): add user endpoint')).toEqual({
        type: 'feat',
        scope: 'api',
        breaking: false,
        description: 'add user endpoint',
        body: null,
      });
    });

    it('should detect the breaking change marker', () => {
      expect(parseConventionalCommit('fix!: critical security patch')).toEqual({
        type: 'fix',
        scope: null,
        breaking: true,
        description: 'critical security patch',
        body: null,
      });
    });

    it('should detect breaking change footers', () => {
      expect(parseConventionalCommit('feat: new feature\n\nBREAKING CHANGE: old API removed')).toEqual({
        type: 'feat',
        scope: null,
        breaking: true,
        description: 'new feature',
        body: 'BREAKING CHANGE: old API removed',
      });
      expect(parseConventionalCommit('fix: y\n\nExplain.\n\nBREAKING-CHANGE: config renamed')?.breaking).toBe(true);
    });

    it('should not flag a body without breaking change footer', () => {
      expect(parseConventionalCommit('docs: y\n\nReworded the introduction.')?.breaking).toBe(false);
    });

    it('should trim surrounding white-space', () => {
      expect(parseConventionalCommit('  chore: bump deps \n')?.description).toBe('bump deps');
    });

    it('should return null for empty and non-conventional messages', () => {
      expect(parseConventionalCommit('')).toBeNull();
      expect(parseConventionalCommit('   ')).toBeNull();
      expect(parseConventionalCommit('update readme')).toBeNull();
      expect(parseConventionalCommit('feat: x\nno blank line')).toBeNull();
    });

    it('should use the configured profile', () => {
      expect(parseConventionalCommit('rule: add detection')).toBeNull();

      config.set({ types: 'falco' });
      expect(parseConventionalCommit('rule: add detection')?.type).toBe('rule');
    });

    it('should let options override the configured profile', () => {
      expect(parseConventionalCommit('docs: y', { profile: 'minimal' })).toBeNull();
    });

    it('should return partial messages in best-effort mode', () => {
      config.set({ bestEffort: true });
      expect(parseConventionalCommit('feat: x\nno blank line')).toEqual({
        type: 'feat',
        scope: null,
        breaking: false,
        description: 'x',
        body: null,
      });
    });
  });

  describe('detectConventionalCommitReleaseType()', () => {
    it('should map commits to release types', () => {
      expect(detectConventionalCommitReleaseType('feat: add login')).toBe('minor');
      expect(detectConventionalCommitReleaseType('fix: handle null')).toBe('patch');
      expect(detectConventionalCommitReleaseType('docs: typo')).toBe('patch');
      expect(detectConventionalCommitReleaseType('fix!: security patch')).toBe('major');
      expect(detectConventionalCommitReleaseType('chore: x\n\nBREAKING CHANGE: node 18 dropped')).toBe('major');
    });

    it('should return null for non-conventional messages', () => {
      expect(detectConventionalCommitReleaseType('update readme')).toBeNull();
    });
  });

  describe('higherPriorityReleaseType()', () => {
    it('should keep the highest release type', () => {
      expect(higherPriorityReleaseType(null, 'patch')).toBe('patch');
      expect(higherPriorityReleaseType('patch', 'minor')).toBe('minor');
      expect(higherPriorityReleaseType('minor', 'patch')).toBe('minor');
      expect(higherPriorityReleaseType('minor', 'major')).toBe('major');
      expect(higherPriorityReleaseType('major', 'patch')).toBe('major');
    });
  });

  describe('computeReleaseType()', () => {
    it('should return the highest release type across messages', () => {
      expect(computeReleaseType(['fix: a', 'feat: b'])).toBe('minor');
      expect(computeReleaseType(['fix: a', 'feat!: b', 'docs: c'])).toBe('major');
    });

    it('should skip non-conventional messages', () => {
      expect(computeReleaseType(['update readme', 'fix: a'])).toBe('patch');
    });

    it('should return null when no message is conventional', () => {
      expect(computeReleaseType([])).toBeNull();
      expect(computeReleaseType(['update readme'])).toBeNull();
    });
  });
});
