// SPDX-License-Identifier: Apache-2.0

import {type RunnerRequest} from './runner-request.js';
import {type RunnerExecutionBuilder} from '../execution/runner-execution-builder.js';

export class LogCollectionRequest implements RunnerRequest {
  public constructor(private readonly collectLogs: boolean) {}

  public apply(builder: RunnerExecutionBuilder): void {
    if (this.collectLogs) {
      builder.flag('collect-logs');
    }
  }
}
