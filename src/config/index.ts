import { config as loadEnv } from 'dotenv';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import {
  ConfigSchema,
  ConfigFileSchema,
  LogFormatSchema,
  LogLevelSchema,
  type Config,
  type ConfigFile,
} from './schema.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError } from '../errors/index.js';

/**
 * Load configuration from environment variables and config files
 * Priority: Environment Variables > Config File > Defaults
 */
export class ConfigLoader {
  private config: Config;

  constructor() {
    // Load .env file if it exists
    loadEnv();

    try {
      // parse() returns fresh objects, so the defaults are never mutated
      this.config = ConfigSchema.parse(defaultConfig);
      this.loadFromFile();
      this.loadFromEnv();
      this.config = ConfigSchema.parse(this.config);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(
        `Configuration validation failed: ${message}`,
        undefined,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Load configuration from JSON file
   */
  private loadFromFile(): void {
    const configPath = join(process.cwd(), 'config', 'default.json');
    if (existsSync(configPath)) {
      try {
        const fileConfig = ConfigFileSchema.parse(JSON.parse(readFileSync(configPath, 'utf-8')));
        this.mergeConfig(fileConfig);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`Failed to load config file: ${message}`);
      }
    }
  }

  /**
   * Load configuration from environment variables
   */
  private loadFromEnv(): void {
    const env = process.env;
    const { logging, topology } = this.config;

    // Logging configuration
    if (env['CPU_TOPOLOGY_LOG_LEVEL']) {
      logging.level = LogLevelSchema.parse(env['CPU_TOPOLOGY_LOG_LEVEL']);
    }
    if (env['CPU_TOPOLOGY_LOG_FORMAT']) {
      logging.format = LogFormatSchema.parse(env['CPU_TOPOLOGY_LOG_FORMAT']);
    }
    if (env['CPU_TOPOLOGY_LOG_DIR']) {
      logging.dir = env['CPU_TOPOLOGY_LOG_DIR'];
    }
    if (env['CPU_TOPOLOGY_LOG_MAX_FILES']) {
      logging.maxFiles = parseInt(env['CPU_TOPOLOGY_LOG_MAX_FILES'], 10);
    }
    if (env['CPU_TOPOLOGY_LOG_MAX_SIZE']) {
      logging.maxSize = env['CPU_TOPOLOGY_LOG_MAX_SIZE'];
    }

    // Topology source configuration
    if (env['CPU_TOPOLOGY_LSCPU_COMMAND']) {
      topology.lscpuCommand = env['CPU_TOPOLOGY_LSCPU_COMMAND'];
    }
    if (env['CPU_TOPOLOGY_LSCPU_SYSFS']) {
      topology.lscpuSysfsPath = env['CPU_TOPOLOGY_LSCPU_SYSFS'];
    }
    if (env['CPU_TOPOLOGY_PROCFS']) {
      topology.procfsPath = env['CPU_TOPOLOGY_PROCFS'];
    }
    if (env['CPU_TOPOLOGY_COMMAND_TIMEOUT']) {
      topology.commandTimeout = parseInt(env['CPU_TOPOLOGY_COMMAND_TIMEOUT'], 10);
    }
  }

  /**
   * Shallow-merge each section of a config file into the current config
   */
  private mergeConfig(source: ConfigFile): void {
    if (source.logging) {
      Object.assign(this.config.logging, source.logging);
    }
    if (source.topology) {
      Object.assign(this.config.topology, source.topology);
    }
  }

  public getConfig(): Config {
    return this.config;
  }
}

// Singleton instance
let configInstance: ConfigLoader | null = null;

/**
 * Get configuration singleton
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = new ConfigLoader();
  }
  return configInstance.getConfig();
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

export type { Config } from './schema.js';
