// SPDX-License-Identifier: Apache-2.0

import * as constants from '../../core/constants.js';

/**
 * A position the test framework fills with a cluster. Indexes start at 1.
 */
export interface ClusterRole {
  readonly name: string;
  readonly index: number;

  /**
   * Fixed namespace for the role; when absent the configured namespace is used.
   */
  readonly namespace?: string;
}

export const CLUSTER_ROLES: readonly ClusterRole[] = [
  {name: 'local', index: 1},
  {name: 'remote', index: 2, namespace: constants.REMOTE_CLUSTER_NAMESPACE},
];

export interface ClusterEndpoint {
  readonly role: ClusterRole;
  readonly kubeConfig: string;
  readonly namespace: string;
  readonly context?: string;
}

/**
 * One endpoint per role. Contexts fill the roles in order and a short list repeats its last entry.
 * Contexts beyond the number of roles are not used.
 */
export function resolveClusterEndpoints(
  kubeConfig: string,
  contexts: readonly string[],
  namespace: string,
  roles: readonly ClusterRole[] = CLUSTER_ROLES,
): ClusterEndpoint[] {
  return roles.map((role: ClusterRole, position: number): ClusterEndpoint => {
    const context: string | undefined =
      contexts.length > 0 ? contexts[Math.min(position, contexts.length - 1)] : undefined;
    return {
      role,
      kubeConfig,
      namespace: role.namespace ?? namespace,
      ...(context === undefined ? {} : {context}),
    };
  });
}
