// SPDX-License-Identifier: Apache-2.0

import {type RunnerExecutionBuilder} from '../execution/runner-execution-builder.js';

/**
 * Interface for runner request parameters that can be applied to a RunnerExecutionBuilder.
 */
export interface RunnerRequest {
  /**
   * Applies this request's parameters to the given builder.
   * @param builder The builder to apply the parameters to
   */
  apply(builder: RunnerExecutionBuilder): void;
}
