/**
 * Topology builder for `lscpu -p` output
 */

import { getLogger } from '../logger/index.js';
import { Core } from './core.js';
import { Cpu } from './cpu.js';
import { Platform } from './platform.js';
import { Socket } from './socket.js';

const ID = /^\d+$/;

/**
 * Build a Platform from `lscpu -p` output:
 *
 *   # The following is the parsable format, which can be fed to other
 *   # programs. Each different item in every column has an unique ID
 *   # starting from zero.
 *   # CPU,Core,Socket,Node,,L1d,L1i,L2,L3
 *   0,0,0,0,,0,0,0,0
 *   1,1,0,0,,1,1,1,0
 *
 * Only the first three columns are read. Lines that do not carry three
 * integer ids within the safe integer range, and CPU ids already seen, are
 * skipped.
 */
export function parseTopology(lscpuOutput: string, isolatedCpus: Iterable<number> = []): Platform {
  const logger = getLogger();
  const isolated = new Set(isolatedCpus);
  const seen = new Set<number>();

  // socket id -> core id -> cpus, in first-seen order
  const sockets = new Map<number, Map<number, Cpu[]>>();

  for (const line of lscpuOutput.split('\n')) {
    if (line.trim() === '' || line.startsWith('#')) {
      continue;
    }

    const fields = line.split(',').map(field => field.trim());
    const [cpuField, coreField, socketField] = fields;
    if (
      cpuField === undefined || !ID.test(cpuField) ||
      coreField === undefined || !ID.test(coreField) ||
      socketField === undefined || !ID.test(socketField)
    ) {
      logger.debug('Skipping malformed topology line', { line });
      continue;
    }

    const cpuId = parseInt(cpuField, 10);
    const coreId = parseInt(coreField, 10);
    const socketId = parseInt(socketField, 10);
    if (![cpuId, coreId, socketId].every(id => Number.isSafeInteger(id))) {
      logger.debug('Skipping topology line with out-of-range id', { line });
      continue;
    }

    if (seen.has(cpuId)) {
      logger.debug('Skipping duplicate CPU id', { cpuId });
      continue;
    }
    seen.add(cpuId);

    let cores = sockets.get(socketId);
    if (!cores) {
      cores = new Map<number, Cpu[]>();
      sockets.set(socketId, cores);
    }

    let cpus = cores.get(coreId);
    if (!cpus) {
      cpus = [];
      cores.set(coreId, cpus);
    }

    cpus.push(new Cpu(cpuId, isolated.has(cpuId)));
  }

  return new Platform(
    [...sockets].map(
      ([socketId, cores]) =>
        new Socket(
          socketId,
          [...cores].map(([coreId, cpus]) => new Core(coreId, cpus))
        )
    )
  );
}
