// SPDX-License-Identifier: Apache-2.0

import {type RunnerRequest} from './runner-request.js';
import {type RunnerExecutionBuilder} from '../execution/runner-execution-builder.js';
import {type ClusterEndpoint} from '../../../business/run-config/cluster-endpoint.js';

/**
 * Numbered kube config, namespace and context options, one set per cluster role.
 */
export class ClusterEndpointsRequest implements RunnerRequest {
  public constructor(private readonly endpoints: readonly ClusterEndpoint[]) {}

  public apply(builder: RunnerExecutionBuilder): void {
    for (const endpoint of this.endpoints) {
      builder
        .argument(`kubeconfig${endpoint.role.index}`, endpoint.kubeConfig)
        .argument(`namespace${endpoint.role.index}`, endpoint.namespace);
    }

    for (const endpoint of this.endpoints) {
      builder.optionalArgument(`context${endpoint.role.index}`, endpoint.context);
    }
  }
}
