/**
 * Topology module exports
 */

export { Cpu } from './cpu.js';
export { Core } from './core.js';
export { Socket } from './socket.js';
export { Platform } from './platform.js';
export { allocatePacked, allocateSpread } from './allocation.js';
export { parseCpuList, parseIsolatedCpus } from './isolation.js';
export { parseTopology } from './parser.js';
export { HostTopologySource } from './source.js';
export { discover } from './discover.js';
