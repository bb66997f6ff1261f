import type { SerializedCore } from '../types/topology.js';
import type { Cpu } from './cpu.js';

/**
 * A physical core and its logical CPUs (SMT siblings), ordered by CPU id
 */
export class Core {
  public readonly cpus: ReadonlyMap<number, Cpu>;

  /**
   * Label set by an external pool allocator. Never written by this package.
   */
  public pool: string | null = null;

  constructor(
    public readonly coreId: number,
    cpus: Iterable<Cpu> = []
  ) {
    const sorted = [...cpus].sort((a, b) => a.cpuId - b.cpuId);
    this.cpus = new Map(sorted.map(cpu => [cpu.cpuId, cpu]));
  }

  cpuIds(): number[] {
    return [...this.cpus.keys()];
  }

  /**
   * True when the core has CPUs and all of them are isolated
   */
  isIsolated(): boolean {
    if (this.cpus.size === 0) {
      return false;
    }

    for (const cpu of this.cpus.values()) {
      if (!cpu.isolated) {
        return false;
      }
    }

    return true;
  }

  toObject(includePool: boolean = true): SerializedCore {
    const result: SerializedCore = {
      id: this.coreId,
      cpus: [...this.cpus.values()].map(cpu => cpu.toObject()),
    };

    if (includePool) {
      result.pool = this.pool;
    }

    return result;
  }
}
