// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type LauncherLogger} from '../../core/logging/launcher-logger.js';

/**
 * Where interrupt signals are delivered; `process` in production.
 */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: NodeJS.SignalsListener): unknown;
  off(event: NodeJS.Signals, listener: NodeJS.SignalsListener): unknown;
}

export interface SignalTarget {
  kill(signal?: NodeJS.Signals): boolean;
}

export const RELAYED_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Forwards interrupt signals received by the launcher to the running child, so the child decides how to stop.
 * While attached the launcher itself is not terminated by those signals.
 */
@injectable()
export class SignalRelay {
  private readonly logger: LauncherLogger;
  private readonly source: SignalSource;
  private readonly _received: NodeJS.Signals[] = [];
  private target?: SignalTarget;

  public constructor(
    @inject(InjectTokens.LauncherLogger) logger?: LauncherLogger,
    @inject(InjectTokens.SignalSource) source?: SignalSource,
  ) {
    this.logger = patchInject(logger, InjectTokens.LauncherLogger, this.constructor.name);
    this.source = patchInject(source, InjectTokens.SignalSource, this.constructor.name);
  }

  public get attached(): boolean {
    return this.target !== undefined;
  }

  /**
   * Signals received since the relay was last attached.
   */
  public get received(): readonly NodeJS.Signals[] {
    return this._received;
  }

  public attach(target: SignalTarget): void {
    if (this.target) {
      throw new Error('signal relay is already attached');
    }
    this.target = target;
    this._received.length = 0;
    for (const signal of RELAYED_SIGNALS) {
      this.source.on(signal, this.handle);
    }
  }

  public detach(): void {
    if (!this.target) {
      return;
    }
    for (const signal of RELAYED_SIGNALS) {
      this.source.off(signal, this.handle);
    }
    this.target = undefined;
  }

  private readonly handle = (signal: NodeJS.Signals): void => {
    this._received.push(signal);
    if (!this.target) {
      return;
    }
    this.logger.warn(`Received ${signal}, forwarding to the test runner`);
    if (!this.target.kill(signal)) {
      this.logger.debug(`Could not deliver ${signal}, the test runner has already exited`);
    }
  };
}
