// SPDX-License-Identifier: Apache-2.0

import os from 'node:os';

/**
 * How a child process ended: an exit code, or the signal that terminated it.
 */
export interface ExitStatus {
  readonly code: number | null;
  readonly signal: NodeJS.Signals | null;
}

const SIGNAL_EXIT_BASE: number = 128;

/**
 * The exit code a shell would report: the child's own code, or 128 plus the signal number.
 */
export function exitCodeOf(status: ExitStatus): number {
  if (status.code !== null) {
    return status.code;
  }
  if (status.signal !== null) {
    const signalNumber: number | undefined = Object.entries(os.constants.signals).find(
      ([name]): boolean => name === status.signal,
    )?.[1];
    if (signalNumber !== undefined) {
      return SIGNAL_EXIT_BASE + signalNumber;
    }
  }
  return 1;
}

export function describeExitStatus(status: ExitStatus): string {
  return status.code === null ? `terminated by ${status.signal ?? 'unknown signal'}` : `exited with code ${status.code}`;
}
