// SPDX-License-Identifier: Apache-2.0

import {type SynthesisResult, type SynthesisStrategy} from './synthesis-strategy.js';
import {type RunConfigDocument} from '../run-config-document.js';
import {FlagsRunConfigRequest} from '../../../integration/runner/request/flags-run-config-request.js';
import {type SynthesisStrategyName} from '../runner-schema.js';

export class FlagsSynthesisStrategy implements SynthesisStrategy {
  public get name(): SynthesisStrategyName {
    return 'flags';
  }

  public async synthesize(document: RunConfigDocument): Promise<SynthesisResult> {
    return {request: new FlagsRunConfigRequest(document)};
  }
}
