/**
 * Test utilities and helper functions
 */

import { Core } from '../topology/core.js';
import { Cpu } from '../topology/cpu.js';
import { Platform } from '../topology/platform.js';
import { Socket } from '../topology/socket.js';
import type { TopologySource } from '../types/topology.js';

/**
 * socket id -> core id -> cpu ids
 */
export type PlatformLayout = Array<[number, Array<[number, number[]]>]>;

/**
 * Build a Platform directly from a layout, bypassing the lscpu parser
 */
export function createPlatform(layout: PlatformLayout, isolatedCpus: number[] = []): Platform {
  const isolated = new Set(isolatedCpus);
  return new Platform(
    layout.map(
      ([socketId, cores]) =>
        new Socket(
          socketId,
          cores.map(([coreId, cpuIds]) => new Core(coreId, cpuIds.map(id => new Cpu(id, isolated.has(id)))))
        )
    )
  );
}

/**
 * Render lscpu -p output for [cpu, core, socket] rows
 */
export function lscpuOutput(rows: Array<[number, number, number]>): string {
  const header = [
    '# The following is the parsable format, which can be fed to other',
    '# programs. Each different item in every column has an unique ID',
    '# starting from zero.',
    '# CPU,Core,Socket,Node,,L1d,L1i,L2,L3',
  ];
  const lines = rows.map(([cpu, core, socket]) => `${cpu},${core},${socket},${socket},,${core},${core},${core},${socket}`);
  return [...header, ...lines].join('\n') + '\n';
}

/**
 * In-memory topology source that records how often each read happened
 */
export class StaticTopologySource implements TopologySource {
  public topologyReads = 0;
  public cmdlineReads = 0;

  constructor(
    private readonly topology: string,
    private readonly cmdline: string = ''
  ) {}

  async readTopology(): Promise<string> {
    this.topologyReads++;
    return this.topology;
  }

  async readKernelCmdline(): Promise<string> {
    this.cmdlineReads++;
    return this.cmdline;
  }
}

/**
 * Mock environment variables for an async test
 */
export async function withEnvAsync<T>(
  envVars: Record<string, string | undefined>,
  fn: () => Promise<T>
): Promise<T> {
  const originalEnv = { ...process.env };
  for (const [key, value] of Object.entries(envVars)) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
  try {
    return await fn();
  } finally {
    process.env = originalEnv;
  }
}
