/**
 * Topology discovery orchestrator
 */

import { getConfig } from '../config/index.js';
import { getLogger } from '../logger/index.js';
import type { TopologySource } from '../types/topology.js';
import { parseIsolatedCpus } from './isolation.js';
import { parseTopology } from './parser.js';
import type { Platform } from './platform.js';
import { HostTopologySource } from './source.js';

/**
 * Discover the CPU topology. Reads the kernel command line first, then the
 * topology listing; a failure of either read is logged and rejects with
 * ExternalToolError.
 */
export async function discover(
  source: TopologySource = new HostTopologySource(getConfig().topology)
): Promise<Platform> {
  const logger = getLogger();

  try {
    const isolated = parseIsolatedCpus(await source.readKernelCmdline());
    if (isolated.length > 0) {
      logger.info(`Isolated logical cores: ${isolated.join(',')}`);
    }

    return parseTopology(await source.readTopology(), isolated);
  } catch (error) {
    logger.error('Topology discovery failed', error instanceof Error ? error : undefined);
    throw error;
  }
}
