// SPDX-License-Identifier: Apache-2.0

import {LauncherError} from './launcher-error.js';

/**
 * Ends the run early without it being treated as a failure.
 */
export class UserBreak extends LauncherError {
  public constructor(message: string) {
    super(message);
  }
}
