import type { Api } from '@octokit/plugin-rest-endpoint-methods';

/**
 * GitHub API and repository related types
 */

/**
 * Octokit extended with the REST endpoint methods plugin
 */
export type OctokitRestApi = Api;

/**
 * Interface representing the repository structure of a GitHub repo in the form of the owner and name.
 */
export interface Repo {
  /**
   * The owner of the repository, typically a GitHub user or an organization.
   */
  owner: string;

  /**
   * The name of the repository.
   */
  repo: string;
}

/**
 * Repository details needed to resolve the comparison window.
 */
export interface RepositoryDetails {
  /**
   * The repository's default branch. E.g. `main`
   */
  defaultBranch: string;
}

/**
 * A commit as returned by the history provider. Logins come from the linked GitHub accounts and may be
 * missing when the commit email isn't associated with any account; names come from the git metadata.
 */
export interface GitHubCommit {
  /**
   * The SHA-1 hash of the commit.
   */
  sha: string;

  /**
   * The full commit message, including any trailers.
   */
  message: string;

  authorLogin: string | null;
  committerLogin: string | null;
  authorName: string | null;
  committerName: string | null;
}

/**
 * Outcome of looking up the latest published release. A repository without any release is an
 * expected state rather than a failure.
 */
export type LatestReleaseResult = { found: true; tagName: string } | { found: false };

/**
 * The capability the release aggregation consumes. Implementations decide the transport.
 */
export interface CommitHistoryProvider {
  getRepository(owner: string, repo: string): Promise<RepositoryDetails>;

  getLatestRelease(owner: string, repo: string): Promise<LatestReleaseResult>;

  /**
   * Commits reachable from `head` but not from `base`, oldest first.
   */
  compareRefs(owner: string, repo: string, base: string, head: string): Promise<GitHubCommit[]>;

  /**
   * One page of the history reachable from `ref`, newest first. An empty array marks the end.
   */
  listCommits(owner: string, repo: string, ref: string, page: number, pageSize: number): Promise<GitHubCommit[]>;
}
