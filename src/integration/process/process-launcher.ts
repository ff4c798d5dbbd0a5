// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type LauncherLogger} from '../../core/logging/launcher-logger.js';
import {type RunnerCommand} from '../runner/execution/runner-command.js';
import {RunnerLaunchError} from '../runner/errors/runner-launch-error.js';
import {type ChildHandle, type SpawnFunction} from './child-handle.js';
import {RunnerExecution} from './runner-execution.js';
import {describeExitStatus, type ExitStatus} from './exit-status.js';
import {type SignalRelay} from './signal-relay.js';

/**
 * Runs the test runner in the foreground with the launcher's terminal and waits for it.
 */
@injectable()
export class ProcessLauncher {
  private readonly logger: LauncherLogger;
  private readonly spawn: SpawnFunction;
  private readonly signalRelay: SignalRelay;

  public constructor(
    @inject(InjectTokens.LauncherLogger) logger?: LauncherLogger,
    @inject(InjectTokens.SpawnFunction) spawn?: SpawnFunction,
    @inject(InjectTokens.SignalRelay) signalRelay?: SignalRelay,
  ) {
    this.logger = patchInject(logger, InjectTokens.LauncherLogger, this.constructor.name);
    this.spawn = patchInject(spawn, InjectTokens.SpawnFunction, this.constructor.name);
    this.signalRelay = patchInject(signalRelay, InjectTokens.SignalRelay, this.constructor.name);
  }

  /**
   * @throws {RunnerLaunchError} if the runner could not be started
   */
  public async launch(command: RunnerCommand): Promise<ExitStatus> {
    this.logger.info(`Executing command: ${command.toString()}`);

    let child: ChildHandle;
    try {
      child = this.spawn(command.executable, command.arguments, {
        stdio: 'inherit',
        env: command.environment(),
        shell: false,
      });
    } catch (error) {
      throw new RunnerLaunchError(command.executable, error);
    }

    const execution: RunnerExecution = new RunnerExecution(child, command.executable);
    this.signalRelay.attach(child);
    try {
      const status: ExitStatus = await execution.waitFor();
      this.logger.debug(`Test runner (pid ${execution.pid ?? 'unknown'}) ${describeExitStatus(status)}`);
      return status;
    } finally {
      this.signalRelay.detach();
    }
  }
}
