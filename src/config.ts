import type { Config } from '@/types';
import { OUTPUT_NAME_REGEX, REPOSITORY_REGEX, RESERVED_OUTPUT_NAMES } from '@/utils/constants';
import { createConfigFromInputs } from '@/utils/metadata';
import { endGroup, info, startGroup } from '@actions/core';

// Keep configInstance private to this module
let configInstance: Config | null = null;

/**
 * Clears the cached config instance during testing.
 *
 * This utility function is specifically designed for testing scenarios where
 * multiple different configurations need to be tested. It resets the singleton
 * instance to null, allowing the next config initialization to start fresh with
 * new mocked values.
 *
 * @remarks
 * - This function only works when NODE_ENV is set to 'test'
 * - Typically used in beforeEach() test setup or before testing different config variations
 */
export function clearConfigForTesting(): void {
  if (process.env.NODE_ENV === 'test') {
    configInstance = null;
  }
}

/**
 * Lazy-initialized configuration object. This is kept separate from the exported
 * config to allow testing utilities to be imported without triggering initialization.
 */
function initializeConfig(): Config {
  if (configInstance) {
    return configInstance;
  }

  try {
    startGroup('Initializing Config');

    const instance = createConfigFromInputs();

    if (instance.repository !== '' && !REPOSITORY_REGEX.test(instance.repository)) {
      throw new TypeError(`Repository must be in the format "owner/name". Got: '${instance.repository}'`);
    }

    if (!OUTPUT_NAME_REGEX.test(instance.outputName)) {
      throw new TypeError(
        `Output name must start with a letter or underscore and contain only letters, digits, "-" or "_". Got: '${instance.outputName}'`,
      );
    }

    if (RESERVED_OUTPUT_NAMES.includes(instance.outputName.toLowerCase())) {
      throw new TypeError(
        `Output name '${instance.outputName}' is reserved for a built-in output. Choose a name other than: ${RESERVED_OUTPUT_NAMES.join(', ')}`,
      );
    }

    configInstance = instance;

    info(`Repository: ${instance.repository || '(workflow repository)'}`);
    info(`Base Ref: ${instance.baseRef || '(latest release)'}`);
    info(`Head Ref: ${instance.headRef || '(default branch)'}`);
    info(`Release Version: ${instance.releaseVersion || '(head ref)'}`);
    info(`Output File: ${instance.outputFile || '(none)'}`);
    info(`GitHub Output: ${instance.githubOutput}`);
    info(`Output Name: ${instance.outputName}`);

    return instance;
  } finally {
    endGroup();
  }
}

// Create a getter for the config that initializes on first use
export function getConfig(): Config {
  return initializeConfig();
}

export const config: Config = new Proxy({} as Config, {
  get(_target, prop) {
    return getConfig()[prop as keyof Config];
  },
});
