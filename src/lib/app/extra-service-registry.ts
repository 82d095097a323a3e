import type { LifecycleNode } from '../supervision/lifecycle-node';
import type { ServiceSpawnOptions } from '../supervision/types';
import type { ExtraServiceEntry } from './types';
import { isServiceClass } from './types';

/**
 * One-shot materialization of extra services.
 *
 * The first call to `materialize()` turns every entry into a node: classes
 * are instantiated with the spawn options, instances are used unmodified.
 * Later calls return null, across restarts included.
 */
export class ExtraServiceRegistry {
  private materialized: LifecycleNode[] | null = null;

  public get isMaterialized(): boolean {
    return this.materialized !== null;
  }

  /** The materialized services, null until the first materialization */
  public get services(): readonly LifecycleNode[] | null {
    return this.materialized ? [...this.materialized] : null;
  }

  /**
   * @returns The new services, or null if they were materialized before
   */
  public materialize(
    entries: readonly ExtraServiceEntry[],
    spawnOptions: () => ServiceSpawnOptions,
  ): LifecycleNode[] | null {
    if (this.materialized) {
      return null;
    }

    const services = entries.map((entry) =>
      isServiceClass(entry) ? new entry(spawnOptions()) : entry,
    );

    this.materialized = services;
    return [...services];
  }
}
