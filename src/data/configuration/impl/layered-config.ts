// SPDX-License-Identifier: Apache-2.0

import {type ConfigSource} from '../spi/config-source.js';
import {DuplicateConfigSourceError} from '../api/duplicate-config-source-error.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';
import {type ConfigKey, type ConfigValue} from '../../schema/model/launcher-config-schema.js';

const byOrdinal = (a: ConfigSource, b: ConfigSource): number => a.ordinal - b.ordinal;

/**
 * Merges configuration sources by ordinal. A key present in a source replaces the value of every
 * lower-ordinal source outright; nested values are never merged.
 */
export class LayeredConfig {
  private readonly _sources: ConfigSource[];

  public constructor(sources: ConfigSource[] = []) {
    this._sources = [];
    for (const source of sources) {
      this.addSource(source);
    }
  }

  /**
   * The sources, lowest ordinal first.
   */
  public get sources(): ConfigSource[] {
    return [...this._sources];
  }

  public addSource(source: ConfigSource): void {
    if (!source) {
      throw new IllegalArgumentError('source cannot be null or undefined');
    }

    if (this._sources.includes(source)) {
      throw new DuplicateConfigSourceError(source);
    }

    if (this._sources.some((s: ConfigSource): boolean => s.name === source.name && s.ordinal === source.ordinal)) {
      throw new DuplicateConfigSourceError(source);
    }

    this._sources.push(source);
    this._sources.sort(byOrdinal);
  }

  public properties(): Map<ConfigKey, ConfigValue> {
    const finalMap: Map<ConfigKey, ConfigValue> = new Map<ConfigKey, ConfigValue>();

    for (const source of this._sources) {
      for (const [key, value] of source.properties()) {
        finalMap.set(key, value);
      }
    }

    return finalMap;
  }

  /**
   * The highest-ordinal source that supplies the key.
   */
  public sourceOf(key: ConfigKey): ConfigSource | undefined {
    return this._sources.findLast((source: ConfigSource): boolean => source.properties().has(key));
  }

  public asString(key: ConfigKey): string | undefined {
    const value: ConfigValue | undefined = this.value(key);
    return typeof value === 'string' ? value : undefined;
  }

  public asBoolean(key: ConfigKey): boolean | undefined {
    const value: ConfigValue | undefined = this.value(key);
    return typeof value === 'boolean' ? value : undefined;
  }

  public asStringArray(key: ConfigKey): string[] | undefined {
    const value: ConfigValue | undefined = this.value(key);
    return Array.isArray(value) ? [...value] : undefined;
  }

  /**
   * Problems reported by every source, lowest ordinal first.
   */
  public problems(): string[] {
    return this._sources.flatMap((source: ConfigSource): readonly string[] => source.problems);
  }

  private value(key: ConfigKey): ConfigValue | undefined {
    return this.sourceOf(key)?.properties().get(key);
  }
}
