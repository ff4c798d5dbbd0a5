// SPDX-License-Identifier: Apache-2.0

import {type ConfigKey, type ConfigValue} from '../../schema/model/launcher-config-schema.js';

/**
 * One layer of configuration. Layers with a higher ordinal override layers with a lower one.
 */
export interface ConfigSource {
  /**
   * Name of the configuration source.
   */
  readonly name: string;

  /**
   * Ordinal of the configuration source.
   */
  readonly ordinal: number;

  /**
   * Problems found while reading the source, such as a value of the wrong type.
   */
  readonly problems: readonly string[];

  /**
   * The keys this source explicitly supplies, with their values.
   */
  properties(): Map<ConfigKey, ConfigValue>;
}
