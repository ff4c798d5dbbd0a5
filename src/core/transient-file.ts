// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import {v4 as uuidv4} from 'uuid';
import {PathEx} from '../business/utils/path-ex.js';
import {type ScopedResource} from './resource-scope.js';
import {ResourceCreationError} from './errors/resource-creation-error.js';

export interface TransientFileOptions {
  readonly directory: string;
  readonly prefix: string;
  readonly extension: string;
  readonly contents: string;

  /**
   * Permission bits for the new file.
   */
  readonly mode?: number;
}

/**
 * A uniquely named file that exists until it is released.
 */
export class TransientFile implements ScopedResource {
  private static readonly MAX_NAME_ATTEMPTS: number = 10;

  private constructor(public readonly path: string) {}

  /**
   * Creates the file exclusively under a fresh random name and writes its contents.
   *
   * @throws {ResourceCreationError} if the file cannot be created or written
   */
  public static create(options: TransientFileOptions): TransientFile {
    let lastError: unknown;
    for (let attempt: number = 0; attempt < TransientFile.MAX_NAME_ATTEMPTS; attempt++) {
      const name: string = `${options.prefix}${TransientFile.randomToken()}${options.extension}`;
      const filePath: string = PathEx.join(options.directory, name);
      try {
        fs.writeFileSync(filePath, options.contents, {encoding: 'utf8', flag: 'wx', mode: options.mode ?? 0o644});
        return new TransientFile(filePath);
      } catch (error) {
        lastError = error;
        if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
          continue;
        }
        // the name is ours, so a partly written file can go
        fs.rmSync(filePath, {force: true});
        break;
      }
    }
    throw new ResourceCreationError(PathEx.join(options.directory, `${options.prefix}*${options.extension}`), lastError);
  }

  public get description(): string {
    return `transient file ${this.path}`;
  }

  public get baseName(): string {
    return PathEx.baseNameWithoutExtension(this.path);
  }

  public release(): void {
    fs.rmSync(this.path, {force: true});
  }

  private static randomToken(): string {
    return uuidv4().replaceAll('-', '').slice(0, 8);
  }
}
