// SPDX-License-Identifier: Apache-2.0

import {ConfigurationError} from './configuration-error.js';
import {type ConfigSource} from '../spi/config-source.js';

/**
 * Error indicating that a configuration source has already been registered.
 */
export class DuplicateConfigSourceError extends ConfigurationError {
  /**
   * @param source - The duplicate ConfigSource instance.
   */
  public constructor(source: ConfigSource) {
    super(`duplicate config source: ${source.name} (${source.ordinal})`, undefined, {
      name: source.name,
      ordinal: source.ordinal,
    });
  }
}
