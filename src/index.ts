// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import 'dotenv/config';
import 'reflect-metadata';
import {container} from 'tsyringe-neo';

import {type LauncherLogger} from './core/logging/launcher-logger.js';
import {Container} from './core/dependency-injection/container-init.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {LauncherError} from './core/errors/launcher-error.js';
import {UserBreak} from './core/errors/user-break.js';
import {getLauncherVersion} from '../version.js';
import {ArgumentProcessor, type ParsedArguments} from './argument-processor.js';
import {type RunCommand} from './commands/run-command.js';

export interface LauncherContext {
  logger?: LauncherLogger;
}

/**
 * Runs the launcher for the given process arguments.
 *
 * @returns the exit code: the test runner's own, or 0 for a dry run
 */
export async function main(argv: string[], context?: LauncherContext): Promise<number> {
  try {
    Container.getInstance().init();
  } catch (error) {
    throw new LauncherError('Error initializing container', error);
  }

  const logger: LauncherLogger = container.resolve<LauncherLogger>(InjectTokens.LauncherLogger);

  if (context) {
    // save the logger so that the entry point can report through it
    context.logger = logger;
  }
  process.on('unhandledRejection', (reason: unknown): void => {
    logger.showUserError(new LauncherError('Unhandled Rejection', reason));
  });
  process.on('uncaughtException', (error: Error, origin: string): void => {
    logger.showUserError(new LauncherError(`Uncaught Exception, origin: ${origin}`, error));
  });

  logger.debug('Initializing launcher');
  if (argv.slice(2).includes('--version')) {
    logger.showUser(chalk.cyan('\n************************* Operator E2E Launcher *************************'));
    logger.showUser(chalk.cyan('Version\t\t\t:'), chalk.yellow(getLauncherVersion()));
    logger.showUser(chalk.cyan('*************************************************************************'));
    throw new UserBreak('displayed version information, exiting');
  }

  const parsedArguments: ParsedArguments = ArgumentProcessor.process(argv);
  const runCommand: RunCommand = container.resolve<RunCommand>(InjectTokens.RunCommand);
  return runCommand.execute(parsedArguments);
}
