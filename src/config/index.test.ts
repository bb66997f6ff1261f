/**
 * Unit tests for configuration loader
 */

import { describe, it, expect, jest, beforeAll, afterAll, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigLoader, getConfig, resetConfig } from './index.js';
import { ConfigurationError } from '../errors/index.js';

const ENV_KEYS = [
  'CPU_TOPOLOGY_LOG_LEVEL',
  'CPU_TOPOLOGY_LOG_FORMAT',
  'CPU_TOPOLOGY_LOG_DIR',
  'CPU_TOPOLOGY_LOG_MAX_FILES',
  'CPU_TOPOLOGY_LOG_MAX_SIZE',
  'CPU_TOPOLOGY_LSCPU_COMMAND',
  'CPU_TOPOLOGY_LSCPU_SYSFS',
  'CPU_TOPOLOGY_PROCFS',
  'CPU_TOPOLOGY_COMMAND_TIMEOUT',
];

describe('ConfigLoader', () => {
  let saved: Record<string, string | undefined> = {};
  let workDir: string;

  beforeAll(() => {
    workDir = mkdtempSync(join(tmpdir(), 'cpu-topology-config-'));
    mkdirSync(join(workDir, 'config'));
  });

  afterAll(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    resetConfig();
    saved = {};
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    // No .env or config/default.json is picked up from the repository
    jest.spyOn(process, 'cwd').mockReturnValue(workDir);
    rmSync(join(workDir, 'config', 'default.json'), { force: true });
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    jest.restoreAllMocks();
    resetConfig();
  });

  describe('constructor', () => {
    it('should create config with defaults', () => {
      const config = new ConfigLoader().getConfig();

      expect(config.logging.level).toBe('info');
      expect(config.logging.format).toBe('simple');
      expect(config.logging.dir).toBeUndefined();
      expect(config.logging.maxFiles).toBe(5);
      expect(config.logging.maxSize).toBe('10m');
      expect(config.topology).toEqual({
        lscpuCommand: 'lscpu',
        procfsPath: '/proc',
        commandTimeout: 30000,
      });
    });

    it('should load all logging config from env', () => {
      process.env['CPU_TOPOLOGY_LOG_LEVEL'] = 'warn';
      process.env['CPU_TOPOLOGY_LOG_FORMAT'] = 'pretty';
      process.env['CPU_TOPOLOGY_LOG_DIR'] = '/var/log/cpu-topology';
      process.env['CPU_TOPOLOGY_LOG_MAX_FILES'] = '3';
      process.env['CPU_TOPOLOGY_LOG_MAX_SIZE'] = '20m';

      const config = new ConfigLoader().getConfig();

      expect(config.logging).toEqual({
        level: 'warn',
        format: 'pretty',
        dir: '/var/log/cpu-topology',
        maxFiles: 3,
        maxSize: '20m',
      });
    });

    it('should load all topology config from env', () => {
      process.env['CPU_TOPOLOGY_LSCPU_COMMAND'] = '/usr/bin/lscpu';
      process.env['CPU_TOPOLOGY_LSCPU_SYSFS'] = '/snapshots/sys';
      process.env['CPU_TOPOLOGY_PROCFS'] = '/host/proc';
      process.env['CPU_TOPOLOGY_COMMAND_TIMEOUT'] = '5000';

      const config = new ConfigLoader().getConfig();

      expect(config.topology).toEqual({
        lscpuCommand: '/usr/bin/lscpu',
        lscpuSysfsPath: '/snapshots/sys',
        procfsPath: '/host/proc',
        commandTimeout: 5000,
      });
    });

    it('should load config/default.json from the working directory', () => {
      writeFileSync(
        join(workDir, 'config', 'default.json'),
        JSON.stringify({ logging: { level: 'debug' }, topology: { procfsPath: '/host/proc' } })
      );

      const config = new ConfigLoader().getConfig();

      expect(config.logging.level).toBe('debug');
      expect(config.logging.format).toBe('simple');
      expect(config.topology.procfsPath).toBe('/host/proc');
      expect(config.topology.lscpuCommand).toBe('lscpu');
    });

    it('should let env override the config file', () => {
      writeFileSync(join(workDir, 'config', 'default.json'), JSON.stringify({ topology: { procfsPath: '/host/proc' } }));
      process.env['CPU_TOPOLOGY_PROCFS'] = '/other/proc';

      expect(new ConfigLoader().getConfig().topology.procfsPath).toBe('/other/proc');
    });

    it('should warn and keep defaults for an invalid config file', () => {
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      writeFileSync(join(workDir, 'config', 'default.json'), JSON.stringify({ logging: { level: 'loud' } }));

      const config = new ConfigLoader().getConfig();

      expect(config.logging.level).toBe('info');
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it('should throw ConfigurationError on an invalid log level', () => {
      process.env['CPU_TOPOLOGY_LOG_LEVEL'] = 'verbose';

      expect(() => new ConfigLoader()).toThrow(ConfigurationError);
      expect(() => new ConfigLoader()).toThrow('Configuration validation failed');
    });

    it('should throw on a non-numeric timeout', () => {
      process.env['CPU_TOPOLOGY_COMMAND_TIMEOUT'] = 'soon';

      expect(() => new ConfigLoader()).toThrow(ConfigurationError);
    });

    it('should throw on a zero timeout', () => {
      process.env['CPU_TOPOLOGY_COMMAND_TIMEOUT'] = '0';

      expect(() => new ConfigLoader()).toThrow(ConfigurationError);
    });
  });

  describe('getConfig (singleton)', () => {
    it('should return same instance on multiple calls', () => {
      expect(getConfig()).toBe(getConfig());
    });

    it('should create new instance after reset', () => {
      const config1 = getConfig();
      resetConfig();
      const config2 = getConfig();

      expect(config1).not.toBe(config2);
      expect(config1).toEqual(config2);
    });
  });
});
