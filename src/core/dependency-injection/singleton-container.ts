// SPDX-License-Identifier: Apache-2.0

import {Lifecycle} from 'tsyringe-neo';

// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type ClassConstructor<T = object> = new (...arguments_: any[]) => T;

export class SingletonContainer {
  public lifecycle: Lifecycle;

  public constructor(
    public token: symbol,
    public useClass: ClassConstructor,
  ) {
    this.lifecycle = Lifecycle.Singleton;
  }
}
