/**
 * Configuration related types
 */

/**
 * Configuration interface used for defining key GitHub Action input configuration.
 */
export interface Config {
  /**
   * The GitHub token (`GITHUB_TOKEN`) used for API authentication.
   */
  githubToken: string;

  /**
   * Optional repository in the form `owner/name`. When empty, the repository running the
   * workflow (`GITHUB_REPOSITORY`) is used.
   */
  repository: string;

  /**
   * The ref to compare from. When empty, the tag of the latest published release is used, and if the
   * repository has no release yet the entire history reachable from the head ref is included.
   */
  baseRef: string;

  /**
   * The ref to compare to. When empty, the repository's default branch is used.
   */
  headRef: string;

  /**
   * Version label used in the "Full Changelog" link (e.g. `v2.1.0`). When empty, the resolved head ref
   * is used instead.
   */
  releaseVersion: string;

  /**
   * Optional path of a file the generated release notes are written to.
   */
  outputFile: string;

  /**
   * Whether the generated release notes are exposed as a step output.
   */
  githubOutput: boolean;

  /**
   * Name of the step output that receives the release notes when `githubOutput` is enabled.
   */
  outputName: string;
}
