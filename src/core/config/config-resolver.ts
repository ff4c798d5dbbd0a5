// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type LauncherLogger} from '../logging/launcher-logger.js';
import {LayeredConfig} from '../../data/configuration/impl/layered-config.js';
import {type ConfigSource} from '../../data/configuration/spi/config-source.js';
import {ValidationError} from '../../data/configuration/api/validation-error.js';
import {
  CONFIG_KEY_NAMES,
  type ConfigKey,
  type ConfigValue,
} from '../../data/schema/model/launcher-config-schema.js';
import {type DockerCredentials, type EffectiveConfig, REDACTED, type SuiteSelection} from './effective-config.js';
import {isSuiteAlias, SUITE_ALIAS_NAMES} from '../../business/suite/suite-alias.js';
import {isRunnerSchemaName, RUNNER_SCHEMA_NAMES} from '../../business/run-config/runner-schema.js';
import {DOCKER_CONFIG_KEYS, REQUIRED_CONFIG_KEYS} from '../constants.js';
import {PathEx} from '../../business/utils/path-ex.js';

/**
 * Turns the layered configuration into a validated {@link EffectiveConfig}.
 *
 * Every problem is collected before anything is reported, so a single run lists all of them.
 */
@injectable()
export class ConfigResolver {
  private readonly logger: LauncherLogger;
  private readonly homeDirectory: string;

  public constructor(
    @inject(InjectTokens.LauncherLogger) logger?: LauncherLogger,
    @inject(InjectTokens.HomeDirectory) homeDirectory?: string,
  ) {
    this.logger = patchInject(logger, InjectTokens.LauncherLogger, this.constructor.name);
    this.homeDirectory = patchInject(homeDirectory, InjectTokens.HomeDirectory, this.constructor.name);
  }

  /**
   * @throws {ValidationError} when a required option is missing, the suite selection is not exactly one of
   * alias or test names, the docker credentials are incomplete, or a source held a value of the wrong type
   */
  public resolve(config: LayeredConfig): EffectiveConfig {
    const problems: string[] = config.problems();

    const selection: SuiteSelection | undefined = this.resolveSelection(config, problems);

    for (const key of REQUIRED_CONFIG_KEYS) {
      if (ConfigResolver.isBlank(config.asString(key))) {
        problems.push(`required option "${key}" is unset`);
      }
    }

    if (ConfigResolver.isBlank(config.asString('timeout'))) {
      problems.push('required option "timeout" is unset');
    }

    if ((config.asStringArray('context') ?? []).some((context: string): boolean => ConfigResolver.isBlank(context))) {
      problems.push('option "context" must not contain empty context names');
    }

    const docker: DockerCredentials | undefined = this.resolveDocker(config, problems);

    const runnerSchema: string = config.asString('runner-schema') ?? '';
    if (!isRunnerSchemaName(runnerSchema)) {
      problems.push(`unknown runner schema "${runnerSchema}", expected one of: ${RUNNER_SCHEMA_NAMES.join(', ')}`);
    }

    if (problems.length > 0 || !selection || !isRunnerSchemaName(runnerSchema)) {
      throw new ValidationError(problems);
    }

    this.logProvenance(config);

    return {
      namespace: ConfigResolver.string(config, 'namespace'),
      kubeConfig: PathEx.expandHome(ConfigResolver.string(config, 'kubeconfig'), this.homeDirectory),
      contexts: config.asStringArray('context') ?? [],
      serviceAccount: ConfigResolver.string(config, 'service-account'),
      operatorImage: ConfigResolver.string(config, 'image'),
      admissionControllerImage: ConfigResolver.string(config, 'admission-controller-image'),
      serverImage: ConfigResolver.string(config, 'server-image'),
      serverUpgradeImage: ConfigResolver.string(config, 'server-upgrade-image'),
      syncGatewayImage: ConfigResolver.string(config, 'sync-gateway-image'),
      storageClass: ConfigResolver.string(config, 'storage-class'),
      repository: PathEx.expandHome(ConfigResolver.string(config, 'repo'), this.homeDirectory),
      docker,
      selection,
      verbose: config.asBoolean('verbose') ?? false,
      collectLogs: config.asBoolean('collect-logs') ?? false,
      runnerSchema,
      timeout: ConfigResolver.string(config, 'timeout'),
      dryRun: config.asBoolean('dry-run') ?? false,
    };
  }

  /**
   * Builds the layered configuration from its sources and resolves it.
   */
  public resolveSources(...sources: ConfigSource[]): EffectiveConfig {
    return this.resolve(new LayeredConfig(sources));
  }

  /**
   * The suite alias and the test list are one logical option: the highest-ordinal source that names
   * either of them decides the selection on its own.
   */
  private resolveSelection(config: LayeredConfig, problems: string[]): SuiteSelection | undefined {
    const deciding: ConfigSource | undefined = config.sources
      .reverse()
      .find((source: ConfigSource): boolean => source.properties().has('suite') || source.properties().has('test'));

    if (!deciding) {
      problems.push('one of the options "suite" or "test" is required');
      return undefined;
    }

    const properties: Map<ConfigKey, ConfigValue> = deciding.properties();
    const suite: ConfigValue | undefined = properties.get('suite');
    const tests: ConfigValue | undefined = properties.get('test');

    if (suite !== undefined && tests !== undefined) {
      problems.push(`options "suite" and "test" are mutually exclusive (both set by ${deciding.name})`);
      return undefined;
    }

    if (typeof suite === 'string') {
      if (!isSuiteAlias(suite)) {
        problems.push(`unknown suite alias "${suite}", expected one of: ${SUITE_ALIAS_NAMES.join(', ')}`);
        return undefined;
      }
      return {kind: 'alias', alias: suite};
    }

    if (Array.isArray(tests)) {
      if (tests.length === 0) {
        problems.push('option "test" requires at least one test name');
        return undefined;
      }
      if (tests.some((test: string): boolean => ConfigResolver.isBlank(test))) {
        problems.push('option "test" must not contain empty test names');
        return undefined;
      }
      return {kind: 'tests', tests};
    }

    return undefined;
  }

  /**
   * Docker credentials are all-or-nothing: once any of them is set, each missing one is a problem.
   */
  private resolveDocker(config: LayeredConfig, problems: string[]): DockerCredentials | undefined {
    const missing: ConfigKey[] = DOCKER_CONFIG_KEYS.filter((key: ConfigKey): boolean =>
      ConfigResolver.isBlank(config.asString(key)),
    );
    if (missing.length === DOCKER_CONFIG_KEYS.length) {
      return undefined;
    }
    if (missing.length > 0) {
      for (const key of missing) {
        problems.push(`option "${key}" is required when docker credentials are set`);
      }
      return undefined;
    }
    return {
      server: ConfigResolver.string(config, 'docker-server'),
      username: ConfigResolver.string(config, 'docker-username'),
      password: ConfigResolver.string(config, 'docker-password'),
    };
  }

  private logProvenance(config: LayeredConfig): void {
    for (const key of CONFIG_KEY_NAMES) {
      const source: ConfigSource | undefined = config.sourceOf(key);
      if (!source) {
        continue;
      }
      const value: ConfigValue | undefined = source.properties().get(key);
      const shown: string = key === 'docker-password' ? REDACTED : JSON.stringify(value);
      this.logger.debug(`option ${key}=${shown} (from ${source.name})`);
    }
  }

  private static string(config: LayeredConfig, key: ConfigKey): string {
    return config.asString(key) ?? '';
  }

  private static isBlank(value: string | undefined): boolean {
    return value === undefined || value.trim().length === 0;
  }
}
