import type { SerializedSocket } from '../types/topology.js';
import type { Core } from './core.js';

/**
 * A physical CPU package and its cores, ordered by core id
 */
export class Socket {
  public readonly cores: ReadonlyMap<number, Core>;

  constructor(
    public readonly socketId: number,
    cores: Iterable<Core> = []
  ) {
    const sorted = [...cores].sort((a, b) => a.coreId - b.coreId);
    this.cores = new Map(sorted.map(core => [core.coreId, core]));
  }

  hasIsolatedCores(): boolean {
    for (const core of this.cores.values()) {
      if (core.isIsolated()) {
        return true;
      }
    }
    return false;
  }

  getCores(): Core[] {
    return [...this.cores.values()];
  }

  getIsolatedCores(): Core[] {
    return this.getCores().filter(core => core.isIsolated());
  }

  /**
   * Cores left to the general OS scheduler
   */
  getSharedCores(): Core[] {
    return this.getCores().filter(core => !core.isIsolated());
  }

  getCoresFromPool(pool: string | null): Core[] {
    return this.getCores().filter(core => core.pool === pool);
  }

  toObject(includePool: boolean = true): SerializedSocket {
    return {
      id: this.socketId,
      cores: this.getCores().map(core => core.toObject(includePool)),
    };
  }

  json(includePool: boolean = true): string {
    return JSON.stringify(this.toObject(includePool), null, 2);
  }
}
