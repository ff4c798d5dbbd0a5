// SPDX-License-Identifier: Apache-2.0

import {container} from 'tsyringe-neo';
import {LauncherError} from '../errors/launcher-error.js';

/**
 * Returns the parameter when it was supplied by the caller, otherwise resolves it from the container.
 *
 * Lets injectable classes be constructed directly (e.g. in tests) with some or all of their collaborators.
 */
export function patchInject<T>(parameter: T | undefined, injectToken: symbol, callingClass: string): T {
  if (parameter !== undefined) {
    return parameter;
  }
  if (!container.isRegistered(injectToken, true)) {
    throw new LauncherError(`${callingClass}: no registration for ${injectToken.description ?? 'token'}`);
  }
  return container.resolve<T>(injectToken);
}
