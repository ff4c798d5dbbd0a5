// SPDX-License-Identifier: Apache-2.0

import * as yaml from 'yaml';
import {injectable} from 'tsyringe-neo';
import {type ObjectCodec} from '../api/object-codec.js';
import {CodecError} from '../api/codec-error.js';

@injectable()
export class YamlObjectCodec implements ObjectCodec {
  public get extension(): string {
    return '.yaml';
  }

  public encode(data: object): string {
    return yaml.stringify(data);
  }

  public decode(text: string): unknown {
    try {
      return yaml.parse(text);
    } catch (error) {
      throw new CodecError('Failed to parse YAML document', error);
    }
  }
}
