// SPDX-License-Identifier: Apache-2.0

import {type SpawnOptions} from 'node:child_process';

/**
 * The part of a spawned child process the launcher relies on.
 */
export interface ChildHandle {
  readonly pid?: number;

  kill(signal?: NodeJS.Signals): boolean;

  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
}

/**
 * Starts a child process. `child_process.spawn` is the production implementation.
 */
export type SpawnFunction = (command: string, arguments_: readonly string[], options: SpawnOptions) => ChildHandle;
