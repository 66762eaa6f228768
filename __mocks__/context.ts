import { createDefaultOctokitMock } from '@/tests/helpers/octokit';
import type { Context, OctokitRestApi, Repo } from '@/types';

/**
 * Default repository configuration
 */
const defaultRepo: Repo = {
  owner: 'octo-org',
  repo: 'octo-repo',
};

/**
 * Context interface with added utility methods
 */
export interface ContextWithMethods extends Context {
  set: (overrides?: Partial<Context>) => void;
  reset: () => void;
  useMockOctokit: () => OctokitRestApi;
}

function createDefaultContext(): Context {
  return {
    repo: { ...defaultRepo },
    repoUrl: 'https://github.com/octo-org/octo-repo',
    octokit: createDefaultOctokitMock(),
  };
}

// Store the current context configuration
let currentContext: Context = createDefaultContext();

function isContextKey(key: string): key is keyof Context {
  return key === 'repo' || key === 'repoUrl' || key === 'octokit';
}

/**
 * Context proxy handler
 */
const contextProxyHandler: ProxyHandler<ContextWithMethods> = {
  set(_target: ContextWithMethods, key: string | symbol, value: unknown): boolean {
    if (typeof key !== 'string' || !isContextKey(key)) {
      throw new Error(`Invalid context key: ${String(key)}`);
    }

    if (typeof currentContext[key] !== typeof value) {
      throw new TypeError(`Invalid value type for context key: ${key}`);
    }

    currentContext = { ...currentContext, [key]: value };
    return true;
  },

  get(_target: ContextWithMethods, prop: string | symbol): unknown {
    if (typeof prop !== 'string') {
      return undefined;
    }
    if (prop === 'set') {
      return (overrides: Partial<Context> = {}) => {
        currentContext = { ...currentContext, ...overrides };
      };
    }
    if (prop === 'reset') {
      return () => {
        currentContext = createDefaultContext();
      };
    }
    if (prop === 'useMockOctokit') {
      return () => {
        currentContext.octokit = createDefaultOctokitMock();
        return currentContext.octokit;
      };
    }

    return isContextKey(prop) ? currentContext[prop] : undefined;
  },
};

/**
 * Create and export the context mock directly with the proxy
 */
export const context = new Proxy({} as ContextWithMethods, contextProxyHandler);

/**
 * Returns the current context configuration
 */
export function getContext(): Context {
  return currentContext;
}

export function clearContextForTesting(): void {
  currentContext = createDefaultContext();
}
