// SPDX-License-Identifier: Apache-2.0

import {type ConfigSource} from '../spi/config-source.js';
import {type ConfigKey, type ConfigValue} from '../../schema/model/launcher-config-schema.js';

/**
 * Base for sources whose values are held in memory once read.
 */
export abstract class MapConfigSource implements ConfigSource {
  protected readonly data: Map<ConfigKey, ConfigValue> = new Map<ConfigKey, ConfigValue>();
  protected readonly _problems: string[] = [];

  public abstract get name(): string;

  public abstract get ordinal(): number;

  public get problems(): readonly string[] {
    return [...this._problems];
  }

  public properties(): Map<ConfigKey, ConfigValue> {
    return new Map<ConfigKey, ConfigValue>(this.data);
  }
}
