// SPDX-License-Identifier: Apache-2.0

import {type RunConfigDocument} from '../run-config-document.js';
import {type ResourceScope} from '../../../core/resource-scope.js';
import {type RunnerRequest} from '../../../integration/runner/request/runner-request.js';
import {type TransientFile} from '../../../core/transient-file.js';
import {type SynthesisStrategyName} from '../runner-schema.js';

export interface SynthesisResult {
  /**
   * Adds the run configuration to the runner invocation.
   */
  readonly request: RunnerRequest;

  /**
   * The file the runner reads, when the strategy writes one. It is owned by the scope passed to synthesize.
   */
  readonly configFile?: TransientFile;
}

/**
 * Delivers a run configuration to the runner in the form its schema accepts.
 */
export interface SynthesisStrategy {
  readonly name: SynthesisStrategyName;

  synthesize(document: RunConfigDocument, scope: ResourceScope): Promise<SynthesisResult>;
}
