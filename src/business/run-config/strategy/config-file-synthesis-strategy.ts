// SPDX-License-Identifier: Apache-2.0

import {type SynthesisResult, type SynthesisStrategy} from './synthesis-strategy.js';
import {type RunConfigDocument} from '../run-config-document.js';
import {type ResourceScope} from '../../../core/resource-scope.js';
import {type ObjectCodec} from '../../../data/codec/api/object-codec.js';
import {type LauncherLogger} from '../../../core/logging/launcher-logger.js';
import {TransientFile} from '../../../core/transient-file.js';
import {ConfigFileRunConfigRequest} from '../../../integration/runner/request/config-file-run-config-request.js';
import {REDACTED} from '../../../core/config/effective-config.js';
import {type SynthesisStrategyName} from '../runner-schema.js';
import * as constants from '../../../core/constants.js';

/**
 * Writes the run configuration to a private transient file and passes its path.
 */
export class ConfigFileSynthesisStrategy implements SynthesisStrategy {
  private static readonly FILE_MODE: number = 0o600;

  public constructor(
    private readonly codec: ObjectCodec,
    private readonly directory: string,
    private readonly logger: LauncherLogger,
  ) {}

  public get name(): SynthesisStrategyName {
    return 'config-file';
  }

  public async synthesize(document: RunConfigDocument, scope: ResourceScope): Promise<SynthesisResult> {
    const loggable: RunConfigDocument = document.docker
      ? {...document, docker: {...document.docker, password: REDACTED}}
      : document;
    this.logger.debug(`Run configuration:\n${this.codec.encode(loggable)}`);

    const configFile: TransientFile = await scope.adopt(
      TransientFile.create({
        directory: this.directory,
        prefix: constants.RUN_CONFIG_FILE_PREFIX,
        extension: this.codec.extension,
        contents: this.codec.encode(document),
        mode: ConfigFileSynthesisStrategy.FILE_MODE,
      }),
    );

    return {request: new ConfigFileRunConfigRequest(configFile.path), configFile};
  }
}
