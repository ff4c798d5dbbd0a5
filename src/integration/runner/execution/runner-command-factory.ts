// SPDX-License-Identifier: Apache-2.0

import {RunnerExecutionBuilder} from './runner-execution-builder.js';
import {type RunnerCommand} from './runner-command.js';
import {type RunnerRequest} from '../request/runner-request.js';
import {TestRunRequest} from '../request/test-run-request.js';
import {ClusterEndpointsRequest} from '../request/cluster-endpoints-request.js';
import {LogCollectionRequest} from '../request/log-collection-request.js';
import {type EffectiveConfig} from '../../../core/config/effective-config.js';
import {type RunConfiguration} from '../../../business/run-config/run-config-synthesizer.js';
import * as constants from '../../../core/constants.js';

export interface RunnerTarget {
  readonly executable: string;
  readonly testPackage: string;
  readonly entrypoint: string;
}

export const DEFAULT_RUNNER_TARGET: RunnerTarget = {
  executable: constants.RUNNER_EXECUTABLE,
  testPackage: constants.RUNNER_TEST_PACKAGE,
  entrypoint: constants.RUNNER_TEST_ENTRYPOINT,
};

/**
 * Assembles the runner invocation. Requests are applied in order: the shared test run options, the run
 * configuration, the cluster endpoints, and log collection last.
 */
export class RunnerCommandFactory {
  public constructor(private readonly target: RunnerTarget = DEFAULT_RUNNER_TARGET) {}

  public create(config: EffectiveConfig, runConfiguration: RunConfiguration): RunnerCommand {
    const builder: RunnerExecutionBuilder = new RunnerExecutionBuilder().executable(this.target.executable);

    const requests: RunnerRequest[] = [
      new TestRunRequest({
        testPackage: this.target.testPackage,
        entrypoint: this.target.entrypoint,
        timeout: config.timeout,
        repository: config.repository,
      }),
      runConfiguration.request,
      new ClusterEndpointsRequest(runConfiguration.endpoints),
      new LogCollectionRequest(config.collectLogs),
    ];
    for (const request of requests) {
      request.apply(builder);
    }

    return builder.build();
  }
}
