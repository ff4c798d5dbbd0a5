// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {type LauncherLogger} from '../core/logging/launcher-logger.js';
import {type ObjectCodec} from '../data/codec/api/object-codec.js';
import {type ConfigResolver} from '../core/config/config-resolver.js';
import {type EffectiveConfig, redactEffectiveConfig} from '../core/config/effective-config.js';
import {LayeredConfig} from '../data/configuration/impl/layered-config.js';
import {DefaultConfigSource} from '../data/configuration/impl/default-config-source.js';
import {StaticFileConfigSource} from '../data/configuration/impl/static-file-config-source.js';
import {CliConfigSource} from '../data/configuration/impl/cli-config-source.js';
import {type SelectedSuite, type SuiteSelector} from '../business/suite/suite-selector.js';
import {type RunConfigSynthesizer, type RunConfiguration} from '../business/run-config/run-config-synthesizer.js';
import {ResourceScope} from '../core/resource-scope.js';
import {RunnerCommandFactory} from '../integration/runner/execution/runner-command-factory.js';
import {type RunnerCommand} from '../integration/runner/execution/runner-command.js';
import {type ProcessLauncher} from '../integration/process/process-launcher.js';
import {describeExitStatus, exitCodeOf, type ExitStatus} from '../integration/process/exit-status.js';
import {PathEx} from '../business/utils/path-ex.js';
import * as constants from '../core/constants.js';

/**
 * Resolves the configuration, prepares the suite and run configuration, and runs the test runner.
 *
 * Transient files live in a scope released on every way out of {@link execute}.
 */
@injectable()
export class RunCommand {
  private readonly logger: LauncherLogger;
  private readonly codec: ObjectCodec;
  private readonly configResolver: ConfigResolver;
  private readonly suiteSelector: SuiteSelector;
  private readonly runConfigSynthesizer: RunConfigSynthesizer;
  private readonly processLauncher: ProcessLauncher;
  private readonly launcherHomeDirectory: string;
  private readonly commandFactory: RunnerCommandFactory = new RunnerCommandFactory();

  public constructor(
    @inject(InjectTokens.LauncherLogger) logger?: LauncherLogger,
    @inject(InjectTokens.ObjectCodec) codec?: ObjectCodec,
    @inject(InjectTokens.ConfigResolver) configResolver?: ConfigResolver,
    @inject(InjectTokens.SuiteSelector) suiteSelector?: SuiteSelector,
    @inject(InjectTokens.RunConfigSynthesizer) runConfigSynthesizer?: RunConfigSynthesizer,
    @inject(InjectTokens.ProcessLauncher) processLauncher?: ProcessLauncher,
    @inject(InjectTokens.LauncherHomeDirectory) launcherHomeDirectory?: string,
  ) {
    this.logger = patchInject(logger, InjectTokens.LauncherLogger, this.constructor.name);
    this.codec = patchInject(codec, InjectTokens.ObjectCodec, this.constructor.name);
    this.configResolver = patchInject(configResolver, InjectTokens.ConfigResolver, this.constructor.name);
    this.suiteSelector = patchInject(suiteSelector, InjectTokens.SuiteSelector, this.constructor.name);
    this.runConfigSynthesizer = patchInject(
      runConfigSynthesizer,
      InjectTokens.RunConfigSynthesizer,
      this.constructor.name,
    );
    this.processLauncher = patchInject(processLauncher, InjectTokens.ProcessLauncher, this.constructor.name);
    this.launcherHomeDirectory = patchInject(
      launcherHomeDirectory,
      InjectTokens.LauncherHomeDirectory,
      this.constructor.name,
    );
  }

  /**
   * @returns the exit code for the launcher: the runner's own, or 0 for a dry run
   * @throws {ValidationError} if the merged configuration is invalid; nothing has been written at that point
   * @throws {ResourceCreationError} if a transient file cannot be created
   * @throws {RunnerLaunchError} if the runner cannot be started
   */
  public async execute(parsedArguments: Readonly<Record<string, unknown>>): Promise<number> {
    const config: EffectiveConfig = this.resolveConfig(parsedArguments);
    if (config.verbose) {
      this.logger.setLevel('debug');
    }
    this.logger.debug(`Effective configuration:\n${this.codec.encode(redactEffectiveConfig(config))}`);

    const scope: ResourceScope = new ResourceScope(this.logger);
    try {
      const suite: SelectedSuite = await this.suiteSelector.select(config, scope);
      const runConfiguration: RunConfiguration = await this.runConfigSynthesizer.synthesize(
        config,
        suite.identifier,
        scope,
      );
      const command: RunnerCommand = this.commandFactory.create(config, runConfiguration);

      if (config.dryRun) {
        this.showDryRun(command);
        return 0;
      }

      const status: ExitStatus = await this.processLauncher.launch(command);
      const exitCode: number = exitCodeOf(status);
      if (exitCode === 0) {
        this.logger.info('Test runner completed successfully');
      } else {
        this.logger.warn(`Test runner ${describeExitStatus(status)}`);
      }
      return exitCode;
    } finally {
      await scope.release();
    }
  }

  private resolveConfig(parsedArguments: Readonly<Record<string, unknown>>): EffectiveConfig {
    const staticFile: StaticFileConfigSource = new StaticFileConfigSource(
      PathEx.join(this.launcherHomeDirectory, constants.STATIC_CONFIG_FILE_NAME),
      this.codec,
      this.logger,
    );
    staticFile.load();

    return this.configResolver.resolve(
      new LayeredConfig([
        new DefaultConfigSource(constants.DEFAULT_CONFIG),
        staticFile,
        new CliConfigSource(parsedArguments),
      ]),
    );
  }

  private showDryRun(command: RunnerCommand): void {
    this.logger.showUser(chalk.cyan('Dry run, the test runner is not started'));
    this.logger.showList(
      'Environment',
      Object.entries(command.environmentOverlay).map(([name, value]): string => `${name}=${value}`),
    );
    this.logger.showUser(command.toString());
  }
}
