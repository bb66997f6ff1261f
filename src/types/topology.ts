/**
 * CPU topology type definitions
 */

import { z } from 'zod';

export const AllocationModeSchema = z.enum(['packed', 'spread']);

/**
 * packed: exhaust one socket before moving to the next
 * spread: one core per socket per round
 */
export type AllocationMode = z.infer<typeof AllocationModeSchema>;

export interface SerializedCpu {
  id: number;
  isolated: boolean;
}

export interface SerializedCore {
  id: number;
  cpus: SerializedCpu[];
  pool?: string | null;
}

export interface SerializedSocket {
  id: number;
  cores: SerializedCore[];
}

/**
 * Supplies the raw text the topology is built from
 */
export interface TopologySource {
  /** `lscpu -p` style output: CPU,Core,Socket,... per line */
  readTopology(): Promise<string>;
  /** Kernel boot parameters, as found in /proc/cmdline */
  readKernelCmdline(): Promise<string>;
}
