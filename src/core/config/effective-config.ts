// SPDX-License-Identifier: Apache-2.0

import {type SuiteAlias} from '../../business/suite/suite-alias.js';
import {type RunnerSchemaName} from '../../business/run-config/runner-schema.js';

export interface DockerCredentials {
  readonly server: string;
  readonly username: string;
  readonly password: string;
}

/**
 * Which tests run: a built-in suite by alias, or an ad-hoc list of test names.
 */
export type SuiteSelection =
  | {readonly kind: 'alias'; readonly alias: SuiteAlias}
  | {readonly kind: 'tests'; readonly tests: readonly string[]};

/**
 * The run parameters after defaults, the static config file and the command line have been merged and validated.
 * Path-valued fields are absolute.
 */
export interface EffectiveConfig {
  readonly namespace: string;
  readonly kubeConfig: string;
  readonly contexts: readonly string[];
  readonly serviceAccount: string;
  readonly operatorImage: string;
  readonly admissionControllerImage: string;
  readonly serverImage: string;
  readonly serverUpgradeImage: string;
  readonly syncGatewayImage: string;
  readonly storageClass: string;
  readonly repository: string;
  readonly docker?: DockerCredentials;
  readonly selection: SuiteSelection;
  readonly verbose: boolean;
  readonly collectLogs: boolean;
  readonly runnerSchema: RunnerSchemaName;
  readonly timeout: string;
  readonly dryRun: boolean;
}

export const REDACTED: string = '******';

/**
 * A copy safe to log: the docker password is masked.
 */
export function redactEffectiveConfig(config: EffectiveConfig): EffectiveConfig {
  if (!config.docker) {
    return config;
  }
  return {...config, docker: {...config.docker, password: REDACTED}};
}
