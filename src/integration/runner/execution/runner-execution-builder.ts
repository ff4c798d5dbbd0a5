// SPDX-License-Identifier: Apache-2.0

import {RunnerCommand} from './runner-command.js';

/**
 * A builder for creating a test runner command.
 *
 * Options are written the way the runner's flag parser expects them: a single dash, the name, and the value as
 * the next argument. They keep the order in which they were added.
 */
export class RunnerExecutionBuilder {
  private static readonly NAME_MUST_NOT_BE_NULL: string = 'name must not be null';
  private static readonly VALUE_MUST_NOT_BE_NULL: string = 'value must not be null';

  /**
   * The path to the runner executable.
   */
  private runnerExecutable?: string;

  /**
   * The list of subcommands to be used when executing the runner.
   */
  private readonly _subcommands: string[] = [];

  /**
   * The positional arguments, placed after the subcommands and before any option.
   */
  private readonly _positionals: string[] = [];

  /**
   * Options and flags in the order they were added.
   */
  private readonly _options: string[] = [];

  /**
   * Option values that are not shown when the command is rendered.
   */
  private readonly _secrets: string[] = [];

  /**
   * The environment variables to be set when executing the runner.
   */
  private readonly _environmentVariables: Map<string, string> = new Map<string, string>();

  public executable(runnerExecutable: string): RunnerExecutionBuilder {
    if (!runnerExecutable) {
      throw new Error('runnerExecutable must not be null');
    }
    this.runnerExecutable = runnerExecutable;
    return this;
  }

  /**
   * Adds the list of subcommands to the execution.
   * @param commands the list of subcommands to be added
   * @returns this builder
   */
  public subcommands(...commands: string[]): RunnerExecutionBuilder {
    if (commands.length === 0) {
      throw new Error('commands must not be null');
    }
    this._subcommands.push(...commands);
    return this;
  }

  /**
   * Adds a positional argument to the execution.
   * @param value the value of the positional argument
   * @returns this builder
   */
  public positional(value: string): RunnerExecutionBuilder {
    if (!value) {
      throw new Error(RunnerExecutionBuilder.VALUE_MUST_NOT_BE_NULL);
    }
    this._positionals.push(value);
    return this;
  }

  /**
   * Adds an option with a value.
   * @param name the name of the option, without the dash
   * @param value the value of the option
   * @returns this builder
   */
  public argument(name: string, value: string): RunnerExecutionBuilder {
    if (!name) {
      throw new Error(RunnerExecutionBuilder.NAME_MUST_NOT_BE_NULL);
    }
    if (!value) {
      throw new Error(RunnerExecutionBuilder.VALUE_MUST_NOT_BE_NULL);
    }
    this._options.push(`-${name}`, value);
    return this;
  }

  /**
   * Adds an option whose value is masked when the command is rendered.
   */
  public secretArgument(name: string, value: string): RunnerExecutionBuilder {
    this.argument(name, value);
    this._secrets.push(value);
    return this;
  }

  /**
   * Adds an option only when it has a value.
   */
  public optionalArgument(name: string, value: string | undefined): RunnerExecutionBuilder {
    if (value) {
      this.argument(name, value);
    }
    return this;
  }

  /**
   * Adds a flag that takes no value.
   * @param flag the flag to be added, without the dash
   * @returns this builder
   */
  public flag(flag: string): RunnerExecutionBuilder {
    if (!flag) {
      throw new Error('flag must not be null');
    }
    this._options.push(`-${flag}`);
    return this;
  }

  /**
   * Adds an environment variable to the execution.
   * @param name the name of the environment variable
   * @param value the value of the environment variable
   * @returns this builder
   */
  public environmentVariable(name: string, value: string): RunnerExecutionBuilder {
    if (!name) {
      throw new Error(RunnerExecutionBuilder.NAME_MUST_NOT_BE_NULL);
    }
    if (!value) {
      throw new Error(RunnerExecutionBuilder.VALUE_MUST_NOT_BE_NULL);
    }
    this._environmentVariables.set(name, value);
    return this;
  }

  /**
   * Builds the command.
   */
  public build(): RunnerCommand {
    if (!this.runnerExecutable) {
      throw new Error('runnerExecutable must not be null');
    }
    return new RunnerCommand(
      this.runnerExecutable,
      [...this._subcommands, ...this._positionals, ...this._options],
      Object.fromEntries(this._environmentVariables),
      this._secrets,
    );
  }
}
