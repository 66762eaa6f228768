import { config } from '@/config';
import type { Context } from '@/types';
import { DEFAULT_SERVER_URL } from '@/utils/constants';
import { endGroup, info, startGroup } from '@actions/core';
import { Octokit } from '@octokit/core';
import { restEndpointMethods } from '@octokit/plugin-rest-endpoint-methods';
import { name, version } from '../package.json';

// The context object will be initialized lazily
let contextInstance: Context | null = null;

/**
 * Retrieves a required environment variable.
 * If it is missing or empty, an error is thrown to halt the workflow execution.
 *
 * @param {string} variable - The name of the environment variable to retrieve.
 * @returns {string} The value of the environment variable.
 * @throws {Error} If the environment variable is missing or empty.
 */
function getRequiredEnvironmentVar(variable: string): string {
  const value = process.env[variable];
  if (!value) {
    throw new Error(
      `The ${variable} environment variable is missing or invalid. This variable should be automatically set by GitHub for each workflow run. Either run this action inside a GitHub workflow or set the "repository" input.`,
    );
  }

  return value;
}

/**
 * Clears the cached context instance during testing.
 *
 * @remarks
 * - This function only works when NODE_ENV is set to 'test'
 * - Typically used in beforeEach() test setup or before testing different context variations
 */
export function clearContextForTesting(): void {
  if (process.env.NODE_ENV === 'test') {
    contextInstance = null;
  }
}

/**
 * Lazily initializes the context object with the repository coordinates and an authenticated
 * Octokit client. The context is only created once and reused for subsequent calls.
 *
 * The repository comes from the `repository` input, falling back to `GITHUB_REPOSITORY`.
 *
 * @returns {Context} The context object containing the GitHub client and repository information.
 * @throws {Error} If no repository can be determined.
 */
function initializeContext(): Context {
  if (contextInstance) {
    return contextInstance;
  }

  try {
    startGroup('Initializing Context');

    const repository = config.repository || getRequiredEnvironmentVar('GITHUB_REPOSITORY');
    const serverUrl = (process.env.GITHUB_SERVER_URL || DEFAULT_SERVER_URL).replace(/\/+$/, '');
    const apiUrl = process.env.GITHUB_API_URL;
    const [owner, repo] = repository.split('/');

    if (!owner || !repo) {
      throw new Error(`Unable to determine repository owner and name from '${repository}'`);
    }

    // Extend Octokit with REST API methods. History is paged by hand so each page is retried on its own.
    const OctokitRestApi = Octokit.plugin(restEndpointMethods);

    contextInstance = {
      repo: { owner, repo },
      repoUrl: `${serverUrl}/${owner}/${repo}`,
      octokit: new OctokitRestApi({
        auth: `token ${config.githubToken}`,
        userAgent: `[octokit] ${name}/${version}`,
        ...(apiUrl ? { baseUrl: apiUrl } : {}),
      }),
    };

    info(`Repository: ${owner}/${repo}`);
    info(`Repository URL: ${contextInstance.repoUrl}`);
    info(`API URL: ${apiUrl ?? '(default)'}`);

    return contextInstance;
  } finally {
    endGroup();
  }
}

// Create a getter for the context that initializes on first use
export const getContext = (): Context => {
  return initializeContext();
};

export const context: Context = new Proxy({} as Context, {
  get(_target, prop) {
    return getContext()[prop as keyof Context];
  },
});
