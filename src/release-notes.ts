import { AuthorSet } from '@/author-set';
import { getCommitAuthors } from '@/authors';
import { buildChangelogUrl, formatReleaseNotes } from '@/changelog';
import { CommitCategorizer } from '@/commit-categorizer';
import { toReleaseNotesError } from '@/errors';
import { withRetry } from '@/retry';
import type { RetryOptions } from '@/retry';
import type {
  AggregationResult,
  CommitHistoryProvider,
  GitHubCommit,
  ReleaseNotes,
  ReleaseNotesOptions,
  ReleaseWindow,
} from '@/types';
import { COMMIT_PAGE_SIZE, MAX_PAGINATION_PAGES } from '@/utils/constants';
import { trimToNull } from '@/utils/string';
import { debug, endGroup, info, startGroup, warning } from '@actions/core';

export interface ReleaseNotesDependencies {
  history: CommitHistoryProvider;
  categorizer?: CommitCategorizer;
  retry?: RetryOptions;
}

interface HistoryWalkResult {
  pages: number;
  truncated: boolean;
}

/**
 * Runs a remote call with retries and wraps any final failure in a `ReleaseNotesError`.
 */
async function callGitHub<T>(operation: string, call: () => Promise<T>, retry?: RetryOptions): Promise<T> {
  try {
    return await withRetry(call, operation, retry);
  } catch (error) {
    throw toReleaseNotesError(operation, error);
  }
}

/**
 * Determines the commit range of the release.
 *
 * An explicit base ref wins; otherwise the tag of the latest published release is used. A repository
 * without any release yields a `null` base. The head ref defaults to the repository's default branch.
 *
 * @param {ReleaseNotesOptions} options - Repository coordinates and optional explicit refs
 * @param {ReleaseNotesDependencies} dependencies - History provider and retry policy
 * @returns {Promise<ReleaseWindow>} The resolved window
 */
export async function resolveReleaseWindow(
  { owner, repo, baseRef, headRef }: ReleaseNotesOptions,
  { history, retry }: ReleaseNotesDependencies,
): Promise<ReleaseWindow> {
  console.time('Elapsed time resolving release window');
  startGroup('Resolving release window');

  try {
    const repository = await callGitHub(
      'fetch repository details',
      () => history.getRepository(owner, repo),
      retry,
    );

    let resolvedBase = trimToNull(baseRef);
    if (resolvedBase === null) {
      const latestRelease = await callGitHub(
        'fetch latest release',
        () => history.getLatestRelease(owner, repo),
        retry,
      );
      if (latestRelease.found) {
        resolvedBase = latestRelease.tagName;
      } else {
        info('No previous release found. Including the entire history.');
      }
    }

    const resolvedHead = trimToNull(headRef) ?? repository.defaultBranch;

    info(`Base ref: ${resolvedBase ?? '(none)'}`);
    info(`Head ref: ${resolvedHead}`);

    return { baseRef: resolvedBase, headRef: resolvedHead };
  } finally {
    console.timeEnd('Elapsed time resolving release window');
    endGroup();
  }
}

/**
 * Pages through the history reachable from `ref`, newest first, handing each page to `onPage`.
 *
 * The walk ends at the first page shorter than the page size, or after `maxPages` pages, which is
 * reported as `truncated`.
 */
async function walkHistory(
  owner: string,
  repo: string,
  ref: string,
  { history, retry }: ReleaseNotesDependencies,
  onPage: (commits: GitHubCommit[]) => void,
  maxPages = Number.POSITIVE_INFINITY,
): Promise<HistoryWalkResult> {
  let page = 1;
  for (; page <= maxPages; page++) {
    const commits = await callGitHub(
      `list commits of ${ref} (page ${page})`,
      () => history.listCommits(owner, repo, ref, page, COMMIT_PAGE_SIZE),
      retry,
    );
    onPage(commits);

    if (commits.length < COMMIT_PAGE_SIZE) {
      return { pages: page, truncated: false };
    }
  }

  return { pages: page - 1, truncated: true };
}

/**
 * Collects the commits in the release window, oldest first. Without a base ref this is the entire
 * history reachable from the head ref.
 */
export async function getWindowCommits(
  { owner, repo }: ReleaseNotesOptions,
  window: ReleaseWindow,
  dependencies: ReleaseNotesDependencies,
): Promise<GitHubCommit[]> {
  console.time('Elapsed time fetching release commits');
  startGroup('Fetching release commits');

  try {
    const { baseRef, headRef } = window;
    if (baseRef !== null) {
      const commits = await callGitHub(
        `compare ${baseRef}...${headRef}`,
        () => dependencies.history.compareRefs(owner, repo, baseRef, headRef),
        dependencies.retry,
      );
      info(`Found ${commits.length} commits between ${baseRef} and ${headRef}`);
      return commits;
    }

    const commits: GitHubCommit[] = [];
    await walkHistory(owner, repo, headRef, dependencies, (page) => commits.push(...page));
    commits.reverse();
    info(`Found ${commits.length} commits reachable from ${headRef}`);

    return commits;
  } finally {
    console.timeEnd('Elapsed time fetching release commits');
    endGroup();
  }
}

/**
 * Collects everyone credited in the history reachable from the base ref.
 */
export async function getAuthorsBeforeWindow(
  { owner, repo }: ReleaseNotesOptions,
  baseRef: string | null,
  dependencies: ReleaseNotesDependencies,
): Promise<{ authors: AuthorSet; truncated: boolean }> {
  const authors = new AuthorSet();
  if (baseRef === null) {
    return { authors, truncated: false };
  }

  console.time('Elapsed time fetching previous contributors');
  startGroup('Fetching previous contributors');

  try {
    const { pages, truncated } = await walkHistory(
      owner,
      repo,
      baseRef,
      dependencies,
      (page) => {
        for (const commit of page) {
          authors.addAll(getCommitAuthors(commit));
        }
      },
      MAX_PAGINATION_PAGES,
    );
    if (truncated) {
      warning(
        `Stopped reading the history of ${baseRef} after ${pages} pages. Earlier contributors may be reported as new.`,
      );
    }
    info(`Found ${authors.size} contributors in ${pages} page(s) of history before ${baseRef}`);

    return { authors, truncated };
  } finally {
    console.timeEnd('Elapsed time fetching previous contributors');
    endGroup();
  }
}

/**
 * Gathers and classifies everything needed for the release notes: the window, its commits grouped by
 * category, and the contributors before and within the window.
 *
 * @param {ReleaseNotesOptions} options - Repository coordinates and optional explicit refs
 * @param {ReleaseNotesDependencies} dependencies - History provider, categorizer and retry policy
 * @returns {Promise<AggregationResult>} The aggregated release data
 */
export async function aggregateRelease(
  options: ReleaseNotesOptions,
  dependencies: ReleaseNotesDependencies,
): Promise<AggregationResult> {
  const categorizer = dependencies.categorizer ?? new CommitCategorizer();

  const window = await resolveReleaseWindow(options, dependencies);
  const windowCommits = await getWindowCommits(options, window, dependencies);

  const authorsInWindow = new AuthorSet();
  for (const commit of windowCommits) {
    authorsInWindow.addAll(getCommitAuthors(commit));
  }

  const before = await getAuthorsBeforeWindow(options, window.baseRef, dependencies);
  const newAuthors = authorsInWindow.difference(before.authors);

  debug(`Contributors in window: ${authorsInWindow.toArray().join(', ')}`);
  debug(`New contributors: ${newAuthors.toArray().join(', ')}`);

  return {
    window,
    groupedCommits: categorizer.groupByCategory(windowCommits),
    authorsInWindow,
    authorsBeforeWindow: before.authors,
    newAuthors,
    historyTruncated: before.truncated,
  };
}

/**
 * Generates the categorized release notes for a repository.
 *
 * @param {ReleaseNotesOptions} options - Repository coordinates, optional refs and version label
 * @param {ReleaseNotesDependencies} dependencies - History provider, categorizer and retry policy
 * @returns {Promise<ReleaseNotes>} The aggregated data together with the rendered document
 */
export async function generateReleaseNotes(
  options: ReleaseNotesOptions,
  dependencies: ReleaseNotesDependencies,
): Promise<ReleaseNotes> {
  const categorizer = dependencies.categorizer ?? new CommitCategorizer();
  const result = await aggregateRelease(options, { ...dependencies, categorizer });

  const version = trimToNull(options.version) ?? result.window.headRef;
  const fullChangelogUrl = buildChangelogUrl(options.repoUrl, result.window.baseRef, version);

  const body = formatReleaseNotes({
    owner: options.owner,
    repo: options.repo,
    fullChangelogUrl,
    authors: result.authorsInWindow,
    newAuthors: result.newAuthors,
    groupedCommits: result.groupedCommits,
    categorizer,
  });

  return { ...result, body, fullChangelogUrl };
}
