// SPDX-License-Identifier: Apache-2.0

/**
 * The shape of a value a configuration key accepts.
 */
export type ValueKind = 'string' | 'boolean' | 'stringArray';

/**
 * Every key the launcher understands, as written on the command line and in the static config file.
 */
export const CONFIG_KEYS = {
  'namespace': 'string',
  'kubeconfig': 'string',
  'context': 'stringArray',
  'service-account': 'string',
  'image': 'string',
  'admission-controller-image': 'string',
  'repo': 'string',
  'verbose': 'boolean',
  'docker-server': 'string',
  'docker-username': 'string',
  'docker-password': 'string',
  'storage-class': 'string',
  'collect-logs': 'boolean',
  'server-image': 'string',
  'server-upgrade-image': 'string',
  'sync-gateway-image': 'string',
  'suite': 'string',
  'test': 'stringArray',
  'runner-schema': 'string',
  'timeout': 'string',
  'dry-run': 'boolean',
} as const satisfies Record<string, ValueKind>;

export type ConfigKey = keyof typeof CONFIG_KEYS;

export type ConfigValue = string | boolean | string[];

export function isConfigKey(key: string): key is ConfigKey {
  return Object.hasOwn(CONFIG_KEYS, key);
}

/**
 * Checks that a raw value has the shape its key requires. No coercion is applied.
 */
export function matchesKind(key: ConfigKey, value: unknown): value is ConfigValue {
  switch (CONFIG_KEYS[key]) {
    case 'string': {
      return typeof value === 'string';
    }
    case 'boolean': {
      return typeof value === 'boolean';
    }
    case 'stringArray': {
      return Array.isArray(value) && value.every((item: unknown): boolean => typeof item === 'string');
    }
  }
}

export function describeKind(key: ConfigKey): string {
  switch (CONFIG_KEYS[key]) {
    case 'string': {
      return 'a string';
    }
    case 'boolean': {
      return 'a boolean';
    }
    case 'stringArray': {
      return 'a list of strings';
    }
  }
}

export const CONFIG_KEY_NAMES: readonly ConfigKey[] = Object.keys(CONFIG_KEYS).filter(isConfigKey);
