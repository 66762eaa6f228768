import type { Config } from '@/types';

/**
 * Configuration interface with added utility methods
 */
interface ConfigWithMethods extends Config {
  set: (overrides: Partial<Config>) => void;
  resetDefaults: () => void;
}

/**
 * Default configuration object. Mirrors the action.yml defaults with every optional input empty.
 */
const defaultConfig: Config = {
  githubToken: 'test-token',
  repository: '',
  baseRef: '',
  headRef: '',
  releaseVersion: '',
  outputFile: '',
  githubOutput: true,
  outputName: 'changelog',
};

// Store the actual configuration data
let currentConfig: Config = { ...defaultConfig };

function isConfigKey(key: string): key is keyof Config {
  return key in defaultConfig;
}

/**
 * Config proxy handler.
 */
const configProxyHandler: ProxyHandler<ConfigWithMethods> = {
  set(_target: ConfigWithMethods, key: string | symbol, value: unknown): boolean {
    if (typeof key !== 'string' || !isConfigKey(key)) {
      throw new Error(`Invalid config key: ${String(key)}`);
    }

    if (typeof defaultConfig[key] !== typeof value) {
      throw new TypeError(`Invalid value type for config key: ${key}`);
    }

    currentConfig = { ...currentConfig, [key]: value };
    return true;
  },

  get(_target: ConfigWithMethods, prop: string | symbol): unknown {
    if (typeof prop !== 'string') {
      return undefined;
    }
    if (prop === 'set') {
      return (overrides: Partial<Config> = {}) => {
        currentConfig = { ...currentConfig, ...overrides };
      };
    }
    if (prop === 'resetDefaults') {
      return () => {
        currentConfig = { ...defaultConfig };
      };
    }

    return isConfigKey(prop) ? currentConfig[prop] : undefined;
  },
};

/**
 * Returns the current configuration.
 */
export function getConfig(): Config {
  return currentConfig;
}

export function clearConfigForTesting(): void {
  currentConfig = { ...defaultConfig };
}

/**
 * Create and export the config object directly with the proxy
 */
export const config: ConfigWithMethods = new Proxy({} as ConfigWithMethods, configProxyHandler);
