// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import {MapConfigSource} from './map-config-source.js';
import {type ObjectCodec} from '../../codec/api/object-codec.js';
import {ConfigurationError} from '../api/configuration-error.js';
import {describeKind, isConfigKey, matchesKind} from '../../schema/model/launcher-config-schema.js';
import {type LauncherLogger} from '../../../core/logging/launcher-logger.js';

/**
 * A {@link ConfigSource} that reads the per-user static configuration file.
 *
 * The file is a flat mapping keyed by long option names; `snake_case` keys are accepted as their
 * `kebab-case` equivalent. A file that does not exist supplies nothing.
 */
export class StaticFileConfigSource extends MapConfigSource {
  private _loaded: boolean = false;

  public constructor(
    public readonly filePath: string,
    private readonly codec: ObjectCodec,
    private readonly logger: LauncherLogger,
  ) {
    super();
  }

  public get name(): string {
    return 'StaticFileConfigSource';
  }

  public get ordinal(): number {
    return 100;
  }

  /**
   * Whether a file was found and read by {@link load}.
   */
  public get loaded(): boolean {
    return this._loaded;
  }

  public load(): void {
    this.data.clear();
    this._problems.length = 0;
    this._loaded = false;

    let text: string;
    try {
      text = fs.readFileSync(this.filePath, 'utf8');
    } catch (error) {
      if (StaticFileConfigSource.isAbsent(error)) {
        this.logger.debug(`No static config file at ${this.filePath}`);
        return;
      }
      throw new ConfigurationError(`Failed to read static config file: ${this.filePath}`, error);
    }

    let document: unknown;
    try {
      document = this.codec.decode(text);
    } catch (error) {
      throw new ConfigurationError(`Failed to parse static config file: ${this.filePath}`, error);
    }

    this._loaded = true;
    if (document === null || document === undefined) {
      return;
    }
    if (typeof document !== 'object' || Array.isArray(document)) {
      throw new ConfigurationError(`Static config file must contain a mapping: ${this.filePath}`);
    }

    for (const [rawKey, value] of Object.entries(document)) {
      const key: string = rawKey.replaceAll('_', '-');
      if (!isConfigKey(key)) {
        this.logger.warn(`Ignoring unknown key "${rawKey}" in static config file ${this.filePath}`);
        continue;
      }
      if (value === null || value === undefined) {
        continue;
      }
      if (matchesKind(key, value)) {
        this.data.set(key, value);
      } else {
        this._problems.push(`static config option "${key}" must be ${describeKind(key)}`);
      }
    }
    this.logger.debug(`Loaded ${this.data.size} option(s) from static config file ${this.filePath}`);
  }

  private static isAbsent(error: unknown): boolean {
    if (!(error instanceof Error) || !('code' in error)) {
      return false;
    }
    return error.code === 'ENOENT' || error.code === 'ENOTDIR';
  }
}
