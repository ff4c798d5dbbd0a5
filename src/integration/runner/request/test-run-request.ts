// SPDX-License-Identifier: Apache-2.0

import {type RunnerRequest} from './runner-request.js';
import {type RunnerExecutionBuilder} from '../execution/runner-execution-builder.js';
import * as constants from '../../../core/constants.js';

export interface TestRunOptions {
  readonly testPackage: string;
  readonly entrypoint: string;
  readonly timeout: string;
  readonly repository: string;
}

/**
 * The part of the invocation every runner schema shares: the test package, the entry test, race detection,
 * verbose output, the timeout and the repository location.
 */
export class TestRunRequest implements RunnerRequest {
  public constructor(private readonly options: TestRunOptions) {}

  public apply(builder: RunnerExecutionBuilder): void {
    builder
      .subcommands('test')
      .positional(this.options.testPackage)
      .argument('run', this.options.entrypoint)
      .flag('v')
      .flag('race')
      .argument('timeout', this.options.timeout)
      .environmentVariable(constants.REPOSITORY_ENVIRONMENT_VARIABLE, this.options.repository);
  }
}
