import type { Profile } from '@/types';
import { PROFILE } from '@/utils/constants';

/**
 * A node of a compiled keyword trie. Edges are keyed on exact byte values.
 */
export interface TypeTrieNode {
  /** Outgoing edges keyed by the next byte of a keyword */
  readonly children: ReadonlyMap<number, TypeTrieNode>;
  /** Whether the path from the root to this node spells a complete keyword */
  readonly terminal: boolean;
}

/**
 * Commit types recognized by each profile.
 */
export const PROFILE_TYPES: Readonly<Record<Profile, readonly string[]>> = {
  [PROFILE.MINIMAL]: ['feat', 'fix'],
  [PROFILE.CONVENTIONAL]: ['build', 'chore', 'ci', 'docs', 'feat', 'fix', 'perf', 'refactor', 'revert', 'style', 'test'],
  [PROFILE.FALCO]: ['build', 'chore', 'ci', 'docs', 'feat', 'fix', 'new', 'perf', 'revert', 'rule', 'test', 'update'],
};

interface MutableTypeTrieNode {
  children: Map<number, MutableTypeTrieNode>;
  terminal: boolean;
}

/**
 * Compiles a list of keywords into a byte trie.
 *
 * The machine leaves the trie as soon as it reaches a terminal node, so a keyword that is a
 * proper prefix of another one could never be matched in full. Such tables are rejected.
 *
 * @param keywords - The keywords to compile. Must be non-empty ASCII words.
 * @returns The root node of the trie
 * @throws {TypeError} If a keyword is empty, is not ASCII, or is a prefix of another keyword
 *
 * @example
 * ```typescript
 * const root = compileTypeTrie(['feat', 'fix']);
 * root.children.get(0x66)?.children.has(0x69) // → true ('f' then 'i')
 * ```
 */
export function compileTypeTrie(keywords: readonly string[]): TypeTrieNode {
  const root: MutableTypeTrieNode = { children: new Map(), terminal: false };

  for (const keyword of keywords) {
    if (keyword.length === 0) {
      throw new TypeError('Commit types cannot be empty');
    }

    let node = root;
    for (let index = 0; index < keyword.length; index++) {
      const byte = keyword.charCodeAt(index);
      if (byte > 0x7f) {
        throw new TypeError(`Commit type '${keyword}' must only contain ASCII characters`);
      }
      if (node.terminal) {
        throw new TypeError(`Commit type '${keyword}' cannot extend another commit type`);
      }

      let child = node.children.get(byte);
      if (!child) {
        child = { children: new Map(), terminal: false };
        node.children.set(byte, child);
      }
      node = child;
    }

    if (node.children.size > 0) {
      throw new TypeError(`Commit type '${keyword}' cannot be a prefix of another commit type`);
    }
    node.terminal = true;
  }

  return root;
}

// Compiled once at module load; the machine only ever reads them.
const TYPE_TRIES: Readonly<Record<Profile, TypeTrieNode>> = {
  [PROFILE.MINIMAL]: compileTypeTrie(PROFILE_TYPES[PROFILE.MINIMAL]),
  [PROFILE.CONVENTIONAL]: compileTypeTrie(PROFILE_TYPES[PROFILE.CONVENTIONAL]),
  [PROFILE.FALCO]: compileTypeTrie(PROFILE_TYPES[PROFILE.FALCO]),
};

/**
 * Returns the compiled keyword trie for a profile.
 *
 * @param profile - The profile to look up
 * @returns The root node of the profile's trie
 */
export function getTypeTrie(profile: Profile): TypeTrieNode {
  return TYPE_TRIES[profile];
}
