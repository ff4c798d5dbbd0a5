// SPDX-License-Identifier: Apache-2.0

import {MapConfigSource} from './map-config-source.js';
import {type ConfigKey, type ConfigValue, isConfigKey} from '../../schema/model/launcher-config-schema.js';

/**
 * A {@link ConfigSource} holding the built-in defaults.
 */
export class DefaultConfigSource extends MapConfigSource {
  public constructor(defaults: Partial<Record<ConfigKey, ConfigValue>>) {
    super();
    for (const [key, value] of Object.entries(defaults)) {
      if (isConfigKey(key) && value !== undefined) {
        this.data.set(key, value);
      }
    }
  }

  public get name(): string {
    return 'DefaultConfigSource';
  }

  public get ordinal(): number {
    return 0;
  }
}
