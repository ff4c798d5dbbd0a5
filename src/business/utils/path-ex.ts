// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';
import os from 'node:os';

export class PathEx {
  private constructor() {}

  public static join(...paths: string[]): string {
    return path.join(...paths);
  }

  public static resolve(...paths: string[]): string {
    return path.resolve(...paths);
  }

  /**
   * Expands a leading `~` (alone or followed by a separator) to the home directory and makes the path absolute.
   *
   * `~user` forms are left alone apart from being resolved against the working directory.
   */
  public static expandHome(input: string, homeDirectory: string = os.homedir()): string {
    if (input === '~') {
      return path.resolve(homeDirectory);
    }
    if (input.startsWith('~/') || input.startsWith(`~${path.sep}`)) {
      return path.resolve(homeDirectory, input.slice(2));
    }
    return path.resolve(input);
  }

  /**
   * The file name without its directory and final extension.
   */
  public static baseNameWithoutExtension(filePath: string): string {
    return path.basename(filePath, path.extname(filePath));
  }
}
