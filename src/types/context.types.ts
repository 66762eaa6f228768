import type { OctokitRestApi, Repo } from '@/types/github.types';

/**
 * Context and runtime related types
 */

/**
 * Interface representing the context required by this GitHub Action.
 * It contains the GitHub API client and the coordinates of the repository the notes are generated for.
 */
export interface Context {
  /**
   * The repository details (owner and name).
   */
  repo: Repo;

  /**
   * The URL of the repository. (e.g. https://github.com/octo-org/octo-repo)
   */
  repoUrl: string;

  /**
   * An instance of the Octokit class with the REST API plugin enabled.
   * This instance is authenticated using a GitHub token and is used to interact with GitHub's API.
   */
  octokit: OctokitRestApi;
}
