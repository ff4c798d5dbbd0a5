// SPDX-License-Identifier: Apache-2.0

import {type LauncherLogger} from './logging/launcher-logger.js';

/**
 * Something the run owns and must give back when it ends.
 */
export interface ScopedResource {
  readonly description: string;
  release(): void | Promise<void>;
}

/**
 * Owns the transient resources of one run and releases them, newest first, exactly once.
 */
export class ResourceScope {
  private readonly resources: ScopedResource[] = [];
  private released: boolean = false;

  public constructor(private readonly logger: LauncherLogger) {}

  public get size(): number {
    return this.resources.length;
  }

  public get isReleased(): boolean {
    return this.released;
  }

  /**
   * Registers a resource. Adopting into a scope that was already released releases the resource at once.
   */
  public async adopt<T extends ScopedResource>(resource: T): Promise<T> {
    if (this.released) {
      await this.releaseOne(resource);
      return resource;
    }
    this.resources.push(resource);
    this.logger.debug(`Acquired ${resource.description}`);
    return resource;
  }

  /**
   * Releases every resource. A failure is logged and does not stop the remaining releases.
   */
  public async release(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;

    while (this.resources.length > 0) {
      const resource: ScopedResource | undefined = this.resources.pop();
      if (resource) {
        await this.releaseOne(resource);
      }
    }
  }

  private async releaseOne(resource: ScopedResource): Promise<void> {
    try {
      await resource.release();
      this.logger.debug(`Released ${resource.description}`);
    } catch (error) {
      this.logger.warn(
        `Failed to release ${resource.description}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}
