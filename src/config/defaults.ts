import type { Config } from './schema.js';

/**
 * Default configuration values
 * Used when no environment variables or config file override them
 */
export const defaultConfig: Config = {
  logging: {
    level: 'info',
    format: 'simple',
    dir: undefined,
    maxFiles: 5,
    maxSize: '10m',
  },
  topology: {
    lscpuCommand: 'lscpu',
    lscpuSysfsPath: undefined,
    procfsPath: '/proc',
    commandTimeout: 30000,
  },
};
