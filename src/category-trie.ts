import type { CategoryGroup, CategoryMatch } from '@/types';
import { MAX_PRIORITY, OTHER_CATEGORY } from '@/utils/constants';

interface TrieNode {
  children: Map<string, number>;
  match: CategoryMatch | null;
}

/**
 * Prefix index that maps the start of a commit message to a category.
 *
 * Nodes are stored in a single array and children are referenced by index, keyed by lower-cased
 * character. Lookup walks the message and stops at the first terminal node it reaches, so
 * `"feat(ui): add button"` matches the `feat` prefix. A message that leaves the tree before reaching a
 * terminal node falls back to the `Other` category with the highest possible priority value.
 *
 * When one registered prefix is a proper prefix of another, the shorter one is reached first. Callers
 * should not rely on that.
 */
export class CategoryTrie implements Iterable<CategoryGroup> {
  private readonly nodes: TrieNode[] = [{ children: new Map(), match: null }];
  private readonly groups: CategoryGroup[] = [];
  readonly otherCategory: CategoryMatch;

  constructor(otherCategory: CategoryMatch = { priority: MAX_PRIORITY, name: OTHER_CATEGORY }) {
    this.otherCategory = otherCategory;
  }

  /**
   * Number of registered category groups.
   */
  get size(): number {
    return this.groups.length;
  }

  /**
   * Registers a category and the prefixes that select it.
   *
   * @param {number} priority - Sort order of the category; lower renders first
   * @param {string} category - Display name of the category
   * @param {readonly string[]} prefixes - Case-insensitive message prefixes
   * @throws {TypeError} If a prefix is empty
   */
  insert(priority: number, category: string, prefixes: readonly string[]): void {
    for (const prefix of prefixes) {
      if (prefix.length === 0) {
        throw new TypeError(`Category "${category}" cannot be registered with an empty prefix`);
      }
    }

    this.groups.push({ priority, category, prefixes: [...prefixes] });

    for (const prefix of prefixes) {
      let index = 0;
      for (const char of prefix) {
        const key = char.toLowerCase();
        let child = this.nodes[index].children.get(key);
        if (child === undefined) {
          child = this.nodes.length;
          this.nodes.push({ children: new Map(), match: null });
          this.nodes[index].children.set(key, child);
        }
        index = child;
      }
      this.nodes[index].match = { priority, name: category };
    }
  }

  /**
   * Finds the category for a message (or any lookup key).
   *
   * @param {string} message - Text whose beginning is matched against the registered prefixes
   * @returns {CategoryMatch} The matching category, or the fallback
   */
  lookup(message: string): CategoryMatch {
    let index = 0;
    for (const char of message) {
      const child = this.nodes[index].children.get(char.toLowerCase());
      if (child === undefined) {
        return this.otherCategory;
      }

      const { match } = this.nodes[child];
      if (match !== null) {
        return match;
      }
      index = child;
    }

    return this.otherCategory;
  }

  [Symbol.iterator](): Iterator<CategoryGroup> {
    return this.groups[Symbol.iterator]();
  }
}
