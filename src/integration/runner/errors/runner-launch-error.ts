// SPDX-License-Identifier: Apache-2.0

import {LauncherError} from '../../../core/errors/launcher-error.js';

/**
 * The test runner could not be started, for example because its executable was not found.
 */
export class RunnerLaunchError extends LauncherError {
  public constructor(
    public readonly executable: string,
    cause?: unknown,
  ) {
    super(
      `Failed to start the test runner '${executable}'${cause instanceof Error ? `: ${cause.message}` : ''}`,
      cause,
      {executable},
    );
  }
}
