/**
 * cpu-topology: socket/core/CPU discovery and core allocation orders
 */

export {
  Cpu,
  Core,
  Socket,
  Platform,
  allocatePacked,
  allocateSpread,
  parseCpuList,
  parseIsolatedCpus,
  parseTopology,
  HostTopologySource,
  discover,
} from './topology/index.js';

export {
  AllocationModeSchema,
  type AllocationMode,
  type SerializedCpu,
  type SerializedCore,
  type SerializedSocket,
  type TopologySource,
} from './types/topology.js';

export { getConfig, resetConfig, ConfigLoader, type Config } from './config/index.js';
export { getLogger, resetLogger, Logger } from './logger/index.js';
export {
  TopologyError,
  ConfigurationError,
  ExternalToolError,
  ErrorCode,
  ErrorSeverity,
  type ErrorContext,
  type ErrorDetails,
} from './errors/index.js';
