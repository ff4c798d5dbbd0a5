// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type LauncherLogger} from '../../core/logging/launcher-logger.js';
import {type ObjectCodec} from '../../data/codec/api/object-codec.js';
import {type EffectiveConfig} from '../../core/config/effective-config.js';
import {type ResourceScope} from '../../core/resource-scope.js';
import {TransientFile} from '../../core/transient-file.js';
import {PathEx} from '../utils/path-ex.js';
import * as constants from '../../core/constants.js';
import {SUITE_ALIASES} from './suite-alias.js';
import {type SuiteDefinitionDocument, transientSuiteDefinition} from './suite-definition.js';

export interface SelectedSuite {
  /**
   * The identifier the runner is told to run.
   */
  readonly identifier: string;

  /**
   * Present when the suite was synthesized for this run.
   */
  readonly suiteFile?: TransientFile;
}

@injectable()
export class SuiteSelector {
  private readonly logger: LauncherLogger;
  private readonly codec: ObjectCodec;

  public constructor(
    @inject(InjectTokens.LauncherLogger) logger?: LauncherLogger,
    @inject(InjectTokens.ObjectCodec) codec?: ObjectCodec,
  ) {
    this.logger = patchInject(logger, InjectTokens.LauncherLogger, this.constructor.name);
    this.codec = patchInject(codec, InjectTokens.ObjectCodec, this.constructor.name);
  }

  /**
   * Resolves the suite to run. Ad-hoc test lists are written as a transient suite into the suites directory,
   * which the runner scans, and the suite file is adopted by the scope.
   *
   * @throws {ResourceCreationError} if the suite file cannot be written
   */
  public async select(config: EffectiveConfig, scope: ResourceScope): Promise<SelectedSuite> {
    if (config.selection.kind === 'alias') {
      const identifier: string = SUITE_ALIASES[config.selection.alias];
      this.logger.debug(`Suite alias ${config.selection.alias} selects ${identifier}`);
      return {identifier};
    }

    const definition: SuiteDefinitionDocument = transientSuiteDefinition(config.selection.tests);
    const contents: string = this.codec.encode(definition);
    this.logger.debug(`Transient suite:\n${contents}`);

    const suiteFile: TransientFile = await scope.adopt(
      TransientFile.create({
        directory: SuiteSelector.suitesDirectory(config.repository),
        prefix: constants.TRANSIENT_SUITE_FILE_PREFIX,
        extension: this.codec.extension,
        contents,
      }),
    );

    this.logger.info(`Created transient suite ${suiteFile.baseName} for ${config.selection.tests.join(', ')}`);
    return {identifier: suiteFile.baseName, suiteFile};
  }

  public static suitesDirectory(repository: string): string {
    return PathEx.join(repository, constants.SUITES_PATH_REL);
  }
}
