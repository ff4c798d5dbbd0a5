// SPDX-License-Identifier: Apache-2.0

import * as constants from '../../core/constants.js';
import {type EffectiveConfig} from '../../core/config/effective-config.js';
import {type RunnerSchema} from './runner-schema.js';
import {type ClusterEndpoint} from './cluster-endpoint.js';
import {PathEx} from '../utils/path-ex.js';

export interface ClusterEndpointDocument {
  name: string;
  config: string;
  context?: string;
}

export interface DockerDocument {
  server: string;
  username: string;
  password: string;
}

/**
 * Everything the test runner needs to know about one run.
 */
export interface RunConfigDocument {
  operatorImage: string;
  admissionControllerImage: string;
  serverImage: string;
  serverImageUpgrade: string;
  mobileImage?: string;
  namespace: string;
  deploymentSpec: string;
  clusterConfig: string;
  kubeConfig: ClusterEndpointDocument[];
  durationDays: number;
  skipTeardown: boolean;
  suite: string;
  platformType: string;
  platformVersion: string;
  serviceAccountName: string;
  storageClassName?: string;
  docker?: DockerDocument;
}

export function deploymentSpecPath(repository: string): string {
  return PathEx.join(repository, constants.DEPLOYMENT_PATH_REL);
}

export function clusterConfigPath(repository: string, schema: RunnerSchema): string {
  return PathEx.join(repository, constants.CLUSTER_CONFIG_PATH_REL + schema.clusterConfigExtension);
}

/**
 * Assembles the run configuration. Fields the schema does not carry, and docker credentials that were not
 * configured, are left out.
 */
export function buildRunConfigDocument(
  config: EffectiveConfig,
  suiteIdentifier: string,
  schema: RunnerSchema,
  endpoints: readonly ClusterEndpoint[],
): RunConfigDocument {
  const document: RunConfigDocument = {
    operatorImage: config.operatorImage,
    admissionControllerImage: config.admissionControllerImage,
    serverImage: config.serverImage,
    serverImageUpgrade: config.serverUpgradeImage,
    namespace: config.namespace,
    deploymentSpec: deploymentSpecPath(config.repository),
    clusterConfig: clusterConfigPath(config.repository, schema),
    kubeConfig: endpoints.map(
      (endpoint: ClusterEndpoint): ClusterEndpointDocument => ({
        name: endpoint.role.name,
        config: endpoint.kubeConfig,
        ...(endpoint.context === undefined ? {} : {context: endpoint.context}),
      }),
    ),
    durationDays: constants.RUN_DURATION_DAYS,
    skipTeardown: constants.SKIP_TEARDOWN,
    suite: suiteIdentifier,
    platformType: constants.PLATFORM_TYPE,
    platformVersion: constants.PLATFORM_VERSION,
    serviceAccountName: config.serviceAccount,
  };

  if (schema.includesMobileImage && config.syncGatewayImage) {
    document.mobileImage = config.syncGatewayImage;
  }
  if (schema.includesStorageClass && config.storageClass) {
    document.storageClassName = config.storageClass;
  }
  if (config.docker) {
    document.docker = {...config.docker};
  }

  return document;
}
