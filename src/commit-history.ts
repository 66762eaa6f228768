import type {
  CommitHistoryProvider,
  GitHubCommit,
  LatestReleaseResult,
  OctokitRestApi,
  RepositoryDetails,
} from '@/types';
import { COMMIT_PAGE_SIZE, MAX_PAGINATION_PAGES } from '@/utils/constants';
import { debug } from '@actions/core';
import { RequestError } from '@octokit/request-error';
import type { RestEndpointMethodTypes } from '@octokit/plugin-rest-endpoint-methods';

type CommitItem = RestEndpointMethodTypes['repos']['listCommits']['response']['data'][number];

/**
 * Reads the login of a linked GitHub account. Commits whose email isn't tied to an account come back
 * with `null` or an empty object.
 */
function getLogin(account: unknown): string | null {
  if (typeof account === 'object' && account !== null && 'login' in account && typeof account.login === 'string') {
    return account.login;
  }

  return null;
}

/**
 * Maps a REST commit item to the transport-neutral commit shape.
 */
export function toGitHubCommit(item: CommitItem): GitHubCommit {
  return {
    sha: item.sha,
    message: item.commit.message,
    authorLogin: getLogin(item.author),
    committerLogin: getLogin(item.committer),
    authorName: item.commit.author?.name ?? null,
    committerName: item.commit.committer?.name ?? null,
  };
}

/**
 * Commit history backed by the GitHub REST API.
 */
export class OctokitCommitHistory implements CommitHistoryProvider {
  constructor(private readonly octokit: OctokitRestApi) {}

  async getRepository(owner: string, repo: string): Promise<RepositoryDetails> {
    const { data } = await this.octokit.rest.repos.get({ owner, repo });

    return { defaultBranch: data.default_branch };
  }

  /**
   * Looks up the latest published release. A 404 means the repository has no release yet and is
   * returned as `{ found: false }`; any other failure is thrown.
   */
  async getLatestRelease(owner: string, repo: string): Promise<LatestReleaseResult> {
    try {
      const { data } = await this.octokit.rest.repos.getLatestRelease({ owner, repo });
      return { found: true, tagName: data.tag_name };
    } catch (error) {
      if (error instanceof RequestError && error.status === 404) {
        debug(`No published release found for ${owner}/${repo}`);
        return { found: false };
      }
      throw error;
    }
  }

  /**
   * Returns the commits reachable from `head` but not from `base`, oldest first.
   *
   * The compare endpoint pages its `commits` array; pages are read until `total_commits` have been
   * collected or a page comes back empty.
   */
  async compareRefs(owner: string, repo: string, base: string, head: string): Promise<GitHubCommit[]> {
    const commits: GitHubCommit[] = [];

    for (let page = 1; page <= MAX_PAGINATION_PAGES; page++) {
      const { data } = await this.octokit.rest.repos.compareCommitsWithBasehead({
        owner,
        repo,
        basehead: `${base}...${head}`,
        page,
        per_page: COMMIT_PAGE_SIZE,
      });

      commits.push(...data.commits.map(toGitHubCommit));
      debug(`Compare ${base}...${head} page ${page}: ${data.commits.length} commits (total ${data.total_commits})`);

      if (data.commits.length === 0 || commits.length >= data.total_commits) {
        break;
      }
    }

    return commits;
  }

  async listCommits(owner: string, repo: string, ref: string, page: number, pageSize: number): Promise<GitHubCommit[]> {
    const { data } = await this.octokit.rest.repos.listCommits({ owner, repo, sha: ref, page, per_page: pageSize });

    return data.map(toGitHubCommit);
  }
}
