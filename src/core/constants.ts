// SPDX-License-Identifier: Apache-2.0

import 'dotenv/config';
import os from 'node:os';
import {PathEx} from '../business/utils/path-ex.js';
import {type ConfigKey, type ConfigValue} from '../data/schema/model/launcher-config-schema.js';

export function getEnvironmentVariable(name: string): string | undefined {
  const value: string | undefined = process.env[name];
  return value ? value : undefined;
}

// -------------------- launcher related constants -----------------------------------------------------------------
export const LAUNCHER_HOME_DIR: string =
  getEnvironmentVariable('E2E_LAUNCHER_HOME') || PathEx.join(os.homedir(), '.e2e-launcher');
export const STATIC_CONFIG_FILE_NAME: string = 'config';

export const DEFAULT_CONFIG: Readonly<Partial<Record<ConfigKey, ConfigValue>>> = {
  'namespace': 'default',
  'kubeconfig': '~/.kube/config',
  'service-account': 'default',
  'image': 'couchbase/couchbase-operator:v1',
  'admission-controller-image': 'couchbase/couchbase-operator-admission:v1',
  'storage-class': 'standard',
  'server-image': 'couchbase/server:6.5.0',
  'server-upgrade-image': 'couchbase/server:6.5.1',
  'sync-gateway-image': 'couchbase/sync-gateway:2.7.0-enterprise',
  'runner-schema': 'flags',
  'timeout': '16h',
  'verbose': false,
  'collect-logs': false,
  'dry-run': false,
};

export const REQUIRED_CONFIG_KEYS: readonly ConfigKey[] = ['namespace', 'kubeconfig', 'service-account', 'image', 'repo'];
export const DOCKER_CONFIG_KEYS: readonly ConfigKey[] = ['docker-server', 'docker-username', 'docker-password'];

// -------------------- repository layout --------------------------------------------------------------------------
export const DEPLOYMENT_PATH_REL: string = PathEx.join('example', 'deployment.yaml');
export const CLUSTER_CONFIG_PATH_REL: string = PathEx.join('test', 'e2e', 'resources', 'cluster_conf');
export const SUITES_PATH_REL: string = PathEx.join('test', 'e2e', 'resources', 'suites');

// -------------------- test runner --------------------------------------------------------------------------------
export const RUNNER_EXECUTABLE: string = getEnvironmentVariable('E2E_RUNNER_EXECUTABLE') || 'go';
export const RUNNER_TEST_PACKAGE: string =
  getEnvironmentVariable('E2E_TEST_PACKAGE') || 'github.com/couchbase/couchbase-operator/test/e2e';
export const RUNNER_TEST_ENTRYPOINT: string = getEnvironmentVariable('E2E_TEST_ENTRYPOINT') || 'TestOperator';

/**
 * Tells the suite where the repository is so it can find its control executables.
 */
export const REPOSITORY_ENVIRONMENT_VARIABLE: string = 'TESTDIR';

// -------------------- synthesized documents ----------------------------------------------------------------------
export const TRANSIENT_SUITE_NAME: string = 'TestSingle';
export const TRANSIENT_SUITE_TIMEOUT: string = '240m';
export const TRANSIENT_SUITE_GROUP_NAME: string = 'Group1';
export const TRANSIENT_SUITE_CLUSTERS: readonly string[] = ['BasicCluster', 'NewCluster1'];
export const TRANSIENT_SUITE_FILE_PREFIX: string = 'tmp';
export const RUN_CONFIG_FILE_PREFIX: string = 'e2e-run-';

export const RUN_DURATION_DAYS: number = 7;
export const SKIP_TEARDOWN: boolean = false;
export const PLATFORM_TYPE: string = 'kubernetes';
export const PLATFORM_VERSION: string = 'v1.18';

export const REMOTE_CLUSTER_NAMESPACE: string = 'remote';
