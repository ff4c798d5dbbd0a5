// SPDX-License-Identifier: Apache-2.0

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LauncherLogger {
  /**
   * Change the level below which records are dropped.
   */
  setLevel(level: LogLevel): void;

  /**
   * When set, errors shown to the user include their stack traces and causes.
   */
  setDevMode(developmentMode: boolean): void;

  nextTraceId(): void;

  prepMeta(meta?: Record<string, unknown>): Record<string, unknown>;

  showUser(message: unknown, ...arguments_: unknown[]): void;

  showUserError(error: unknown): void;

  showList(title: string, items?: string[]): boolean;

  error(message: unknown, ...arguments_: unknown[]): void;

  warn(message: unknown, ...arguments_: unknown[]): void;

  info(message: unknown, ...arguments_: unknown[]): void;

  debug(message: unknown, ...arguments_: unknown[]): void;
}
