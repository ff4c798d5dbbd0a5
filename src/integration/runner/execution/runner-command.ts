// SPDX-License-Identifier: Apache-2.0

const SHELL_SAFE: RegExp = /^[\w./:=@%+,-]+$/;
const MASK: string = '******';

/**
 * A fully constructed test runner invocation. Immutable once built.
 */
export class RunnerCommand {
  public readonly arguments: readonly string[];
  public readonly environmentOverlay: Readonly<Record<string, string>>;
  private readonly secrets: ReadonlySet<string>;

  /**
   * @param secrets argument values masked when the command is rendered
   */
  public constructor(
    public readonly executable: string,
    arguments_: readonly string[],
    environmentOverlay: Readonly<Record<string, string>>,
    secrets: readonly string[] = [],
  ) {
    this.arguments = Object.freeze([...arguments_]);
    this.environmentOverlay = Object.freeze({...environmentOverlay});
    this.secrets = new Set<string>(secrets);
  }

  /**
   * The environment for the child: a copy of the base environment with the overlay applied.
   * The base environment is never modified.
   */
  public environment(base: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
    return {...base, ...this.environmentOverlay};
  }

  /**
   * Shell-style rendering for display, with unsafe arguments single-quoted and secrets masked.
   */
  public toString(): string {
    return [this.executable, ...this.arguments.map((argument: string): string => this.mask(argument))]
      .map(RunnerCommand.quote)
      .join(' ');
  }

  private mask(argument: string): string {
    return this.secrets.has(argument) ? MASK : argument;
  }

  private static quote(value: string): string {
    if (SHELL_SAFE.test(value)) {
      return value;
    }
    return `'${value.replaceAll("'", String.raw`'\''`)}'`;
  }
}
