import type { Config } from '@/types';

/**
 * Configuration interface with added utility methods
 */
interface ConfigWithMethods extends Config {
  set: (overrides: Partial<Config>) => void;
  resetDefaults: () => void;
}

/**
 * Default configuration object.
 */
const defaultConfig: Config = {
  types: 'conventional',
  bestEffort: false,
  validatePullRequestTitle: false,
  ignoreCommitPrefixes: ['Merge branch', 'Merge pull request', 'Merge remote-tracking branch'],
  disableComment: false,
  disableBranding: false,
  githubToken: 'test-token',
};

/**
 * Valid configuration keys.
 */
const validConfigKeys: ReadonlyArray<string> = Object.keys(defaultConfig);

// Store the actual configuration data
let currentConfig: Config = { ...defaultConfig };

/**
 * Config proxy handler.
 */
const configProxyHandler: ProxyHandler<ConfigWithMethods> = {
  set(_target: ConfigWithMethods, key: string | symbol, value: unknown): boolean {
    if (typeof key !== 'string' || !validConfigKeys.includes(key)) {
      throw new Error(`Invalid config key: ${String(key)}`);
    }

    const expectedValue: unknown = Reflect.get(defaultConfig, key);

    if ((Array.isArray(expectedValue) && Array.isArray(value)) || typeof expectedValue === typeof value) {
      currentConfig = Object.assign({ ...currentConfig }, { [key]: value });
      return true;
    }

    throw new TypeError(`Invalid value type for config key: ${key}`);
  },

  get(_target: ConfigWithMethods, prop: string | symbol): unknown {
    if (typeof prop === 'string') {
      if (prop === 'set') {
        return (overrides: Partial<Config> = {}) => {
          // Note: No need for deep merge
          currentConfig = { ...currentConfig, ...overrides };
        };
      }
      if (prop === 'resetDefaults') {
        return () => {
          currentConfig = { ...defaultConfig };
        };
      }

      return Reflect.get(currentConfig, prop);
    }
    return undefined;
  },
};

/**
 * Returns the current configuration.
 */
export function getConfig(): Config {
  return currentConfig;
}

/**
 * Create and export the config object directly with the proxy
 */
export const config: ConfigWithMethods = new Proxy({} as ConfigWithMethods, configProxyHandler);
