// SPDX-License-Identifier: Apache-2.0

/**
 * How the synthesized run configuration reaches the test runner.
 */
export type SynthesisStrategyName = 'flags' | 'config-file';

export type RunnerSchemaName = 'flags' | 'config-file' | 'config-file-legacy';

/**
 * The interface a version of the test runner accepts.
 */
export interface RunnerSchema {
  readonly name: RunnerSchemaName;
  readonly strategy: SynthesisStrategyName;

  /**
   * Extension, including the dot, of the cluster configuration file in the repository.
   */
  readonly clusterConfigExtension: string;

  readonly includesStorageClass: boolean;
  readonly includesMobileImage: boolean;
}

export const RUNNER_SCHEMAS: Readonly<Record<RunnerSchemaName, RunnerSchema>> = {
  'flags': {
    name: 'flags',
    strategy: 'flags',
    clusterConfigExtension: '.yaml',
    includesStorageClass: true,
    includesMobileImage: true,
  },
  'config-file': {
    name: 'config-file',
    strategy: 'config-file',
    clusterConfigExtension: '.yml',
    includesStorageClass: true,
    includesMobileImage: false,
  },
  'config-file-legacy': {
    name: 'config-file-legacy',
    strategy: 'config-file',
    clusterConfigExtension: '.yml',
    includesStorageClass: false,
    includesMobileImage: false,
  },
};

export const RUNNER_SCHEMA_NAMES: readonly RunnerSchemaName[] = Object.keys(RUNNER_SCHEMAS).filter(isRunnerSchemaName);

export function isRunnerSchemaName(value: string): value is RunnerSchemaName {
  return Object.hasOwn(RUNNER_SCHEMAS, value);
}
