// SPDX-License-Identifier: Apache-2.0

import {type RunnerRequest} from './runner-request.js';
import {type RunnerExecutionBuilder} from '../execution/runner-execution-builder.js';

/**
 * Points the runner at a run configuration file.
 */
export class ConfigFileRunConfigRequest implements RunnerRequest {
  public constructor(private readonly configFilePath: string) {}

  public apply(builder: RunnerExecutionBuilder): void {
    builder.argument('config', this.configFilePath);
  }
}
