import type { CategoryDefinition } from '@/types';

/**
 * Priority assigned to the fallback category. Sorts after every configured category.
 */
export const MAX_PRIORITY = Number.MAX_SAFE_INTEGER;

export const OTHER_CATEGORY = 'Other';

/**
 * Emoji used for a category name that has no configured emoji.
 */
export const UNKNOWN_CATEGORY_EMOJI = '🔹';

/**
 * The default set of commit categories. Prefixes are matched case-insensitively against the start of
 * the commit message, so `feat`, `Feat:` and `feature(ui)` all land in "Features".
 */
export const DEFAULT_CATEGORIES: readonly CategoryDefinition[] = [
  { name: 'Breaking Changes', emoji: '💥', priority: 1, prefixes: ['break'] },
  { name: 'Features', emoji: '✨', priority: 2, prefixes: ['feat'] },
  { name: 'Refactoring', emoji: '♻️', priority: 3, prefixes: ['refactor'] },
  { name: 'Fixes', emoji: '🐛', priority: 4, prefixes: ['fix', 'bug'] },
  { name: 'Performance', emoji: '⚡', priority: 5, prefixes: ['perf'] },
  { name: 'General Changes', emoji: '🧹', priority: 6, prefixes: ['housekeeping', 'chore', 'update'] },
  { name: 'Tests', emoji: '✅', priority: 7, prefixes: ['test'] },
  { name: 'Documentation', emoji: '📝', priority: 8, prefixes: ['doc'] },
  { name: 'Style Changes', emoji: '💅', priority: 9, prefixes: ['style'] },
  { name: 'Dependencies', emoji: '📦', priority: 10, prefixes: ['dep'] },
];

export const DEFAULT_OTHER_CATEGORY: CategoryDefinition = {
  name: OTHER_CATEGORY,
  emoji: '📌',
  priority: MAX_PRIORITY,
  prefixes: [],
};

/**
 * Logins whose commits are always classified through the given lookup key, regardless of message.
 * Keys are matched case-insensitively.
 */
export const DEFAULT_BOT_OVERRIDES: Readonly<Record<string, string>> = {
  'renovate[bot]': 'dep',
  'dependabot[bot]': 'dep',
  dependabot: 'dep',
};

export const BOT_MARKER = '[bot]';
export const UNKNOWN_AUTHOR = 'unknown';
export const CO_AUTHORED_BY = 'Co-authored-by:';

/**
 * Pagination limits for walking commit history.
 */
export const COMMIT_PAGE_SIZE = 100;
export const MAX_PAGINATION_PAGES = 500;

/**
 * Retry policy for GitHub API calls.
 */
export const RETRY_DEFAULTS = {
  MAX_RETRIES: 3,
  BASE_DELAY_MS: 2000,
  JITTER_MIN: 0.8,
  JITTER_MAX: 1.2,
  RATE_LIMIT_PADDING_MS: 1000,
} as const;

/**
 * Error codes and names that indicate a transient network failure or timeout.
 */
export const TRANSIENT_ERROR_CODES = ['ECONNRESET', 'ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE', 'ETIMEDOUT'];
export const TIMEOUT_ERROR_NAMES = ['AbortError', 'TimeoutError'];

export const DEFAULT_SERVER_URL = 'https://github.com';

/**
 * Allowed format of a step output name.
 */
export const OUTPUT_NAME_REGEX = /^[A-Za-z_][A-Za-z0-9_-]*$/;

/**
 * Outputs the action always sets. The release notes cannot be published under one of these names.
 */
export const RESERVED_OUTPUT_NAMES: readonly string[] = ['base-ref', 'head-ref', 'new-contributors'];

/**
 * Repository in the form `owner/name`.
 */
export const REPOSITORY_REGEX = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;

export const RELEASE_NOTES_HEADER = "## 🗺️ What's Changed";
export const CONTRIBUTIONS_HEADER = '### 🙌 Contributions';
