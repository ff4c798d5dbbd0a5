// SPDX-License-Identifier: Apache-2.0

import {LauncherError} from './launcher-error.js';

export class IllegalArgumentError extends LauncherError {
  public constructor(message: string, value?: unknown) {
    super(message, undefined, {value});
  }
}
