import { OctokitCommitHistory } from '@/commit-history';
import { getConfig } from '@/config';
import { getContext } from '@/context';
import { publishReleaseNotes } from '@/outputs';
import { generateReleaseNotes } from '@/release-notes';
import type { Config, Context } from '@/types';
import { info, setFailed } from '@actions/core';

/**
 * Initializes and returns the configuration and context objects.
 * Config must be initialized before context due to dependency constraints.
 *
 * @returns {{ config: Config; context: Context }} Initialized config and context objects.
 */
function initialize(): { config: Config; context: Context } {
  const configInstance = getConfig();
  const contextInstance = getContext();

  return { config: configInstance, context: contextInstance };
}

/**
 * Executes the release notes action.
 *
 * 1. Reads the inputs and builds the GitHub client
 * 2. Resolves the release window (base and head refs)
 * 3. Collects, classifies and attributes the commits in the window
 * 4. Compares contributors against the history before the window
 * 5. Renders the Markdown document and publishes it to the configured outputs
 *
 * @returns {Promise<void>} A promise that resolves when the process completes
 * @throws Will capture and report any errors through setFailed
 */
export async function run(): Promise<void> {
  try {
    const { config, context } = initialize();
    const {
      repo: { owner, repo },
    } = context;

    const notes = await generateReleaseNotes(
      {
        owner,
        repo,
        repoUrl: context.repoUrl,
        version: config.releaseVersion,
        baseRef: config.baseRef,
        headRef: config.headRef,
      },
      { history: new OctokitCommitHistory(context.octokit) },
    );

    if (notes.historyTruncated) {
      info('History was truncated; the list of new contributors may include returning contributors.');
    }

    await publishReleaseNotes(notes, config);
  } catch (error) {
    setFailed(error instanceof Error ? error.message : String(error));
  }
}
