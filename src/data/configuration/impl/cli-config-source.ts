// SPDX-License-Identifier: Apache-2.0

import {MapConfigSource} from './map-config-source.js';
import {CONFIG_KEY_NAMES, describeKind, matchesKind} from '../../schema/model/launcher-config-schema.js';

/**
 * A {@link ConfigSource} holding only the options the user typed on the command line.
 *
 * The parser declares no defaults, so an option absent from the parsed arguments was not supplied.
 */
export class CliConfigSource extends MapConfigSource {
  public constructor(parsedArguments: Readonly<Record<string, unknown>>) {
    super();
    for (const key of CONFIG_KEY_NAMES) {
      const value: unknown = parsedArguments[key];
      if (value === undefined || value === null) {
        continue;
      }
      if (matchesKind(key, value)) {
        this.data.set(key, value);
      } else {
        this._problems.push(`command line option "${key}" must be ${describeKind(key)}`);
      }
    }
  }

  public get name(): string {
    return 'CliConfigSource';
  }

  public get ordinal(): number {
    return 200;
  }
}
