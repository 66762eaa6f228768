import { getCommitAuthors } from '@/authors';
import { CategoryTrie } from '@/category-trie';
import type { CategoryDefinition, CategoryMatch, ClassifiedCommit, GitHubCommit } from '@/types';
import {
  DEFAULT_BOT_OVERRIDES,
  DEFAULT_CATEGORIES,
  DEFAULT_OTHER_CATEGORY,
  UNKNOWN_CATEGORY_EMOJI,
} from '@/utils/constants';
import { trimToNull } from '@/utils/string';

export interface CommitCategorizerOptions {
  categories?: readonly CategoryDefinition[];

  /**
   * Login to lookup key. The key is resolved through the same prefix index as commit messages.
   */
  botOverrides?: Readonly<Record<string, string>>;
  otherCategory?: CategoryDefinition;
}

/**
 * Assigns commits to release note categories.
 *
 * Categories, bot overrides and the fallback are supplied at construction, so alternate category sets
 * can be used side by side.
 */
export class CommitCategorizer {
  private readonly trie: CategoryTrie;
  private readonly botOverrides: Map<string, string>;
  private readonly emojis: Map<string, string>;
  readonly categories: readonly CategoryDefinition[];
  readonly otherCategory: CategoryDefinition;

  constructor({
    categories = DEFAULT_CATEGORIES,
    botOverrides = DEFAULT_BOT_OVERRIDES,
    otherCategory = DEFAULT_OTHER_CATEGORY,
  }: CommitCategorizerOptions = {}) {
    this.categories = [...categories].sort((a, b) => a.priority - b.priority);
    this.otherCategory = otherCategory;
    this.trie = new CategoryTrie({ priority: otherCategory.priority, name: otherCategory.name });

    for (const { priority, name, prefixes } of this.categories) {
      this.trie.insert(priority, name, prefixes);
    }

    this.botOverrides = new Map(
      Object.entries(botOverrides).map(([login, key]) => [login.toLowerCase(), key] as const),
    );
    this.emojis = new Map(
      [...this.categories, otherCategory].map(({ name, emoji }) => [name.toLowerCase(), emoji] as const),
    );
  }

  /**
   * Determines the category of a commit. Commits from an overridden login (e.g. `dependabot[bot]`) are
   * classified by the override key; all others by their message.
   *
   * @param {GitHubCommit} commit - The commit to categorize
   * @returns {CategoryMatch} The category name and priority
   */
  categorize(commit: GitHubCommit): CategoryMatch {
    const login = trimToNull(commit.authorLogin) ?? trimToNull(commit.committerLogin);

    if (login !== null) {
      const overrideKey = this.botOverrides.get(login.toLowerCase());
      if (overrideKey !== undefined) {
        return this.trie.lookup(overrideKey);
      }
    }

    return this.trie.lookup(commit.message);
  }

  classify(commit: GitHubCommit): ClassifiedCommit {
    const { name, priority } = this.categorize(commit);

    return { commit, category: name, priority, authors: getCommitAuthors(commit) };
  }

  /**
   * Classifies commits and groups them by category. Keys are in ascending priority order; commits keep
   * their input order within a category.
   *
   * @param {GitHubCommit[]} commits - The commits to group
   * @returns {Map<string, ClassifiedCommit[]>} Classified commits keyed by category name
   */
  groupByCategory(commits: readonly GitHubCommit[]): Map<string, ClassifiedCommit[]> {
    const classified = commits.map((commit) => this.classify(commit));
    // Array.prototype.sort is stable, so equal priorities keep input order.
    classified.sort((a, b) => a.priority - b.priority);

    const groups = new Map<string, ClassifiedCommit[]>();
    for (const item of classified) {
      const group = groups.get(item.category);
      if (group) {
        group.push(item);
      } else {
        groups.set(item.category, [item]);
      }
    }

    return groups;
  }

  getEmoji(category: string): string {
    return this.emojis.get(category.toLowerCase()) ?? UNKNOWN_CATEGORY_EMOJI;
  }

  isKnownCategory(category: string): boolean {
    const name = category.toLowerCase();
    return this.categories.some((definition) => definition.name.toLowerCase() === name);
  }
}
