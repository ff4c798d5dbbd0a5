// SPDX-License-Identifier: Apache-2.0

import {LauncherError} from '../../../core/errors/launcher-error.js';

export class CodecError extends LauncherError {
  public constructor(message: string, cause?: unknown) {
    super(message, cause);
  }
}
