// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {type LauncherLogger} from './logging/launcher-logger.js';
import {UserBreak} from './errors/user-break.js';

@injectable()
export class ErrorHandler {
  private readonly logger: LauncherLogger;

  public constructor(@inject(InjectTokens.LauncherLogger) logger?: LauncherLogger) {
    this.logger = patchInject(logger, InjectTokens.LauncherLogger, this.constructor.name);
  }

  /**
   * Reports an error that ended the run and sets the exit code. A {@link UserBreak} is not a failure.
   *
   * @returns the exit code that was set
   */
  public handle(error: unknown): number {
    if (error instanceof UserBreak) {
      this.logger.info(error.message);
      process.exitCode = 0;
      return 0;
    }

    this.logger.showUserError(error);
    process.exitCode = 1;
    return 1;
  }
}
