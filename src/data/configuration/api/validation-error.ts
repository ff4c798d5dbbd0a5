// SPDX-License-Identifier: Apache-2.0

import {ConfigurationError} from './configuration-error.js';

/**
 * Every problem found while resolving the effective configuration, reported together.
 */
export class ValidationError extends ConfigurationError {
  public constructor(public readonly problems: readonly string[]) {
    super(
      problems.length === 1
        ? `Invalid configuration: ${problems[0]}`
        : `Invalid configuration: ${problems.length} problems found`,
      undefined,
      {problems: [...problems]},
    );
  }
}
