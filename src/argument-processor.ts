// SPDX-License-Identifier: Apache-2.0

import yargs, {type Argv} from 'yargs';
import {hideBin} from 'yargs/helpers';
import {container} from 'tsyringe-neo';
import {LauncherError} from './core/errors/launcher-error.js';
import {UserBreak} from './core/errors/user-break.js';
import {Flags as flags} from './commands/flags.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {type LauncherLogger} from './core/logging/launcher-logger.js';

export type ParsedArguments = Readonly<Record<string, unknown>>;

export class ArgumentProcessor {
  /**
   * Parses the command line. Values are only present for options the user typed.
   *
   * @throws {LauncherError} on an unknown option, an invalid choice, or conflicting options
   * @throws {UserBreak} after help was shown
   */
  public static process(argv: string[]): ParsedArguments {
    const logger: LauncherLogger = container.resolve<LauncherLogger>(InjectTokens.LauncherLogger);

    logger.debug('Setting up flags');
    const rootCmd: Argv = yargs(hideBin(argv))
      .scriptName('e2e-launcher')
      .usage('Usage:\n  e2e-launcher (--suite <alias> | --test <name>...) --repo <path> [options]')
      .help(false)
      .version(false)
      .strict()
      .exitProcess(false);

    flags.setCommandFlags(rootCmd, ...flags.allFlags);

    // Expand the terminal width to the maximum available
    rootCmd.wrap(null);

    rootCmd.fail((message: string | null, error: Error | undefined): void => {
      if (message) {
        logger.showUser(message);
        rootCmd.showHelp((output: string): void => logger.showUser(output));
      }
      throw new LauncherError(message ?? 'Failed to parse the command line', error);
    });

    logger.debug('Parsing command line');
    const parsed: ParsedArguments = rootCmd.parseSync();

    if (parsed.help === true) {
      rootCmd.showHelp((output: string): void => logger.showUser(output));
      throw new UserBreak('displayed help, exiting');
    }

    if (parsed.verbose === true) {
      logger.setLevel('debug');
    }
    if (parsed.dev === true) {
      logger.setDevMode(true);
    }
    return parsed;
  }
}
