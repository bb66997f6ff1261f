import type { SerializedCpu } from '../types/topology.js';

/**
 * A logical CPU (hardware thread) as numbered by the kernel
 */
export class Cpu {
  constructor(
    public readonly cpuId: number,
    public readonly isolated: boolean = false
  ) {}

  toObject(): SerializedCpu {
    return {
      id: this.cpuId,
      isolated: this.isolated,
    };
  }
}
