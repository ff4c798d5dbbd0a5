// SPDX-License-Identifier: Apache-2.0

import {LauncherError} from './launcher-error.js';

/**
 * Raised when a transient file needed by the runner cannot be created or written.
 */
export class ResourceCreationError extends LauncherError {
  public constructor(
    public readonly path: string,
    cause?: unknown,
  ) {
    super(`Failed to create transient file: ${path}`, cause, {path});
  }
}
