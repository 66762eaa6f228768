import type { AuthorSet } from '@/author-set';
import type { GitHubCommit } from '@/types/github.types';

/**
 * Release note related types
 */

/**
 * Defines a commit category with its display properties and matching prefixes.
 */
export interface CategoryDefinition {
  /**
   * The display name of the category (e.g. "Features", "Fixes").
   */
  readonly name: string;

  /**
   * The emoji displayed in front of the category heading.
   */
  readonly emoji: string;

  /**
   * Section order. Lower values render first.
   */
  readonly priority: number;

  /**
   * Commit message prefixes (case-insensitive) that map to this category.
   */
  readonly prefixes: readonly string[];
}

/**
 * Category group as registered in the prefix index, in registration order.
 */
export interface CategoryGroup {
  readonly priority: number;
  readonly category: string;
  readonly prefixes: readonly string[];
}

/**
 * Result of a category lookup.
 */
export interface CategoryMatch {
  readonly priority: number;
  readonly name: string;
}

/**
 * A commit that has been assigned to a category with its extracted authors.
 */
export interface ClassifiedCommit {
  readonly commit: GitHubCommit;
  readonly category: string;
  readonly priority: number;
  readonly authors: AuthorSet;
}

/**
 * The commit range the release notes are generated for. A `null` base ref means no earlier release
 * exists and the whole history reachable from the head ref is in the window.
 */
export interface ReleaseWindow {
  baseRef: string | null;
  headRef: string;
}

/**
 * Options accepted by the release note generation.
 */
export interface ReleaseNotesOptions {
  owner: string;
  repo: string;

  /**
   * Base URL of the repository used for links (e.g. https://github.com/octo-org/octo-repo).
   */
  repoUrl: string;

  /**
   * Version label used in the "Full Changelog" link. Falls back to the resolved head ref.
   */
  version?: string | null;
  baseRef?: string | null;
  headRef?: string | null;
}

/**
 * Everything gathered for one generation run.
 */
export interface AggregationResult {
  window: ReleaseWindow;

  /**
   * Classified commits keyed by category name, iterated in ascending priority order.
   */
  groupedCommits: Map<string, ClassifiedCommit[]>;

  authorsInWindow: AuthorSet;
  authorsBeforeWindow: AuthorSet;
  newAuthors: AuthorSet;

  /**
   * Whether reading the history before the window stopped at the page cap, in which case
   * `authorsBeforeWindow` may be incomplete. The window itself is always read in full.
   */
  historyTruncated: boolean;
}

/**
 * The final result handed to the output sinks.
 */
export interface ReleaseNotes extends AggregationResult {
  /**
   * The rendered Markdown document.
   */
  body: string;
  fullChangelogUrl: string;
}
