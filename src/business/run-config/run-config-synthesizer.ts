// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type LauncherLogger} from '../../core/logging/launcher-logger.js';
import {type ObjectCodec} from '../../data/codec/api/object-codec.js';
import {type EffectiveConfig} from '../../core/config/effective-config.js';
import {type ResourceScope} from '../../core/resource-scope.js';
import {type TransientFile} from '../../core/transient-file.js';
import {type RunnerRequest} from '../../integration/runner/request/runner-request.js';
import {RUNNER_SCHEMAS, type RunnerSchema, type SynthesisStrategyName} from './runner-schema.js';
import {CLUSTER_ROLES, type ClusterEndpoint, resolveClusterEndpoints} from './cluster-endpoint.js';
import {buildRunConfigDocument, type RunConfigDocument} from './run-config-document.js';
import {type SynthesisResult, type SynthesisStrategy} from './strategy/synthesis-strategy.js';
import {FlagsSynthesisStrategy} from './strategy/flags-synthesis-strategy.js';
import {ConfigFileSynthesisStrategy} from './strategy/config-file-synthesis-strategy.js';

export interface RunConfiguration {
  readonly schema: RunnerSchema;
  readonly endpoints: readonly ClusterEndpoint[];
  readonly document: RunConfigDocument;
  readonly request: RunnerRequest;
  readonly configFile?: TransientFile;
}

/**
 * Builds the run configuration for the selected runner schema and hands it to that schema's strategy.
 */
@injectable()
export class RunConfigSynthesizer {
  private readonly logger: LauncherLogger;
  private readonly strategies: ReadonlyMap<SynthesisStrategyName, SynthesisStrategy>;

  public constructor(
    @inject(InjectTokens.LauncherLogger) logger?: LauncherLogger,
    @inject(InjectTokens.ObjectCodec) codec?: ObjectCodec,
    @inject(InjectTokens.TempDirectory) tempDirectory?: string,
  ) {
    this.logger = patchInject(logger, InjectTokens.LauncherLogger, this.constructor.name);
    const objectCodec: ObjectCodec = patchInject(codec, InjectTokens.ObjectCodec, this.constructor.name);
    const directory: string = patchInject(tempDirectory, InjectTokens.TempDirectory, this.constructor.name);

    const strategies: SynthesisStrategy[] = [
      new FlagsSynthesisStrategy(),
      new ConfigFileSynthesisStrategy(objectCodec, directory, this.logger),
    ];
    this.strategies = new Map<SynthesisStrategyName, SynthesisStrategy>(
      strategies.map((strategy: SynthesisStrategy): [SynthesisStrategyName, SynthesisStrategy] => [
        strategy.name,
        strategy,
      ]),
    );
  }

  /**
   * @throws {ResourceCreationError} if the strategy writes a file and it cannot be created
   */
  public async synthesize(
    config: EffectiveConfig,
    suiteIdentifier: string,
    scope: ResourceScope,
  ): Promise<RunConfiguration> {
    const schema: RunnerSchema = RUNNER_SCHEMAS[config.runnerSchema];

    if (config.contexts.length > CLUSTER_ROLES.length) {
      this.logger.warn(
        `${config.contexts.length} contexts given but only ${CLUSTER_ROLES.length} cluster roles exist, ` +
          `ignoring: ${config.contexts.slice(CLUSTER_ROLES.length).join(', ')}`,
      );
    }
    const endpoints: ClusterEndpoint[] = resolveClusterEndpoints(config.kubeConfig, config.contexts, config.namespace);
    const document: RunConfigDocument = buildRunConfigDocument(config, suiteIdentifier, schema, endpoints);

    const strategy: SynthesisStrategy | undefined = this.strategies.get(schema.strategy);
    if (!strategy) {
      throw new Error(`no synthesis strategy registered for ${schema.strategy}`);
    }
    this.logger.debug(`Synthesizing run configuration for runner schema ${schema.name} (${strategy.name})`);

    const result: SynthesisResult = await strategy.synthesize(document, scope);
    return {schema, endpoints, document, request: result.request, configFile: result.configFile};
  }
}
