import type { Config } from '@/types';
import { vi } from 'vitest';

const INPUT_KEY = 'INPUT_';

/**
 * Type-safe mapping from input names to config keys.
 */
export const inputToConfigKeyMap: Record<string, keyof Config> = {
  github_token: 'githubToken',
  repository: 'repository',
  'base-ref': 'baseRef',
  'head-ref': 'headRef',
  'release-version': 'releaseVersion',
  'output-file': 'outputFile',
  'github-output': 'githubOutput',
  'output-name': 'outputName',
};

// Default inputs used for testing @actions/core behavior
export const defaultInputs: Record<string, string> = {
  github_token: 'test-token',
  repository: '',
  'base-ref': '',
  'head-ref': '',
  'release-version': '',
  'output-file': '',
  'github-output': 'true',
  'output-name': 'changelog',
};
export const requiredInputs = ['github_token', 'github-output', 'output-name'];
export const optionalInputs = Object.keys(defaultInputs).filter((key) => !requiredInputs.includes(key));
export const booleanInputs = ['github-output'];
export const stringInputs = Object.keys(defaultInputs).filter((key) => !booleanInputs.includes(key));

/**
 * Stubs environment variables with an `INPUT_` prefix using a set of default values,
 * while allowing specific overrides.
 *
 * Overrides can be provided as key-value pairs, where:
 * - A `string` value sets or replaces the environment variable.
 * - A `null` value skips the setting, leaving the input undefined.
 *
 * @param {Record<string, string | null>} inputs - Input overrides keyed by input name (without the `INPUT_` prefix).
 */
export function stubInputEnv(inputs: Record<string, string | null> = {}): void {
  const mergedInputs = { ...defaultInputs, ...inputs };

  for (const [key, value] of Object.entries(mergedInputs)) {
    if (value === null) {
      continue;
    }

    const prefixedKey = `${INPUT_KEY}${key.replace(/ /g, '_').toUpperCase()}`;
    vi.stubEnv(prefixedKey, value);
  }
}
