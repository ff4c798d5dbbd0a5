// SPDX-License-Identifier: Apache-2.0

import {type ChildHandle} from './child-handle.js';
import {type ExitStatus} from './exit-status.js';
import {RunnerLaunchError} from '../runner/errors/runner-launch-error.js';

/**
 * Represents one running test runner process.
 */
export class RunnerExecution {
  private readonly completion: Promise<ExitStatus>;

  public constructor(
    private readonly child: ChildHandle,
    private readonly executable: string,
  ) {
    // listeners are registered now so an early 'error' is not missed
    this.completion = new Promise<ExitStatus>((resolve, reject): void => {
      this.child.once('exit', (code: number | null, signal: NodeJS.Signals | null): void => {
        resolve({code, signal});
      });
      this.child.once('error', (error: Error): void => {
        reject(new RunnerLaunchError(this.executable, error));
      });
    });
  }

  public get pid(): number | undefined {
    return this.child.pid;
  }

  /**
   * Waits for the process to complete.
   *
   * @throws {RunnerLaunchError} if the process could not be started
   */
  public async waitFor(): Promise<ExitStatus> {
    return this.completion;
  }
}
