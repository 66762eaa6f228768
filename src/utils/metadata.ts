import type { ActionInputMetadata, Config } from '@/types';
import { getBooleanInput, getInput } from '@actions/core';

/**
 * Factory functions to reduce duplication in ACTION_INPUTS metadata definitions.
 * These functions create standardized metadata objects for common input patterns.
 */
const requiredString = (configKey: keyof Config): ActionInputMetadata => ({
  configKey,
  required: true,
  type: 'string',
});

const requiredBoolean = (configKey: keyof Config): ActionInputMetadata => ({
  configKey,
  required: true,
  type: 'boolean',
});

const optionalString = (configKey: keyof Config): ActionInputMetadata => ({
  configKey,
  required: false,
  type: 'string',
});

/**
 * Complete mapping of all GitHub Action inputs to their metadata.
 * This is the single source of truth for input configuration.
 * Note: defaults come from action.yml at runtime
 */
export const ACTION_INPUTS: Record<string, ActionInputMetadata> = {
  github_token: requiredString('githubToken'),
  repository: optionalString('repository'),
  'base-ref': optionalString('baseRef'),
  'head-ref': optionalString('headRef'),
  'release-version': optionalString('releaseVersion'),
  'output-file': optionalString('outputFile'),
  'github-output': requiredBoolean('githubOutput'),
  'output-name': requiredString('outputName'),
} as const;

/**
 * Creates a config object by reading inputs using GitHub Actions API and converting them
 * according to the metadata definitions.
 *
 * @returns {Config} The config built from the action inputs.
 * @throws {Error} If a required input is missing or a boolean input cannot be parsed.
 */
export function createConfigFromInputs(): Config {
  const values: Partial<Record<keyof Config, string | boolean>> = {};

  for (const [inputName, metadata] of Object.entries(ACTION_INPUTS)) {
    const { configKey, required, type } = metadata;

    try {
      values[configKey] =
        type === 'boolean' ? getBooleanInput(inputName, { required }) : getInput(inputName, { required }).trim();
    } catch (error) {
      throw new Error(
        `Failed to process input '${inputName}': ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }

  return {
    githubToken: stringValue(values.githubToken),
    repository: stringValue(values.repository),
    baseRef: stringValue(values.baseRef),
    headRef: stringValue(values.headRef),
    releaseVersion: stringValue(values.releaseVersion),
    outputFile: stringValue(values.outputFile),
    githubOutput: values.githubOutput === true,
    outputName: stringValue(values.outputName),
  };
}

function stringValue(value: string | boolean | undefined): string {
  return typeof value === 'string' ? value : '';
}
