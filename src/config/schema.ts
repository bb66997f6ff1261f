import { z } from 'zod';

/**
 * Configuration Schema using Zod for runtime validation
 */

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export const LogFormatSchema = z.enum(['json', 'simple', 'pretty']);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  format: LogFormatSchema.default('simple'),
  dir: z.string().optional(),
  maxFiles: z.number().int().min(1).default(5),
  maxSize: z.string().default('10m'),
});

export const TopologyConfigSchema = z.object({
  lscpuCommand: z.string().min(1).default('lscpu'),
  // Passed to `lscpu -s` to describe a captured sysfs tree instead of the host
  lscpuSysfsPath: z.string().min(1).optional(),
  procfsPath: z.string().min(1).default('/proc'),
  commandTimeout: z.number().int().min(1).default(30000),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  logging: LoggingConfigSchema,
  topology: TopologyConfigSchema,
});

/**
 * Shape accepted from config/default.json; every key is optional
 */
export const ConfigFileSchema = z.object({
  logging: LoggingConfigSchema.partial().optional(),
  topology: TopologyConfigSchema.partial().optional(),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogFormat = z.infer<typeof LogFormatSchema>;
