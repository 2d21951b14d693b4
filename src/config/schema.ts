import { z } from 'zod';

/**
 * Configuration Schema using Zod for runtime validation
 * Covers the ambient settings and every detection source the plugins read
 */

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export const LogFormatSchema = z.enum(['json', 'simple', 'pretty']);
export const CorrelationSchema = z.enum(['position', 'identifier']);

export const PluginConfigSchema = z.object({
  dirtyConfig: z.boolean().default(false),
  commandTimeout: z.number().int().min(0).default(0),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('warn'),
  format: LogFormatSchema.default('simple'),
  file: z.string().min(1).optional(),
  maxFiles: z.number().int().min(1).default(5),
  maxSize: z.string().default('10m'),
});

export const HardwareRaidConfigSchema = z.object({
  devicePattern: z.string().min(1).default('/dev/cciss/c*d0'),
  statusTool: z.string().min(1).default('/usr/bin/cciss_vol_status'),
  correlation: CorrelationSchema.default('position'),
});

export const ControllerConfigSchema = z.object({
  statusTool: z.string().min(1).default('/usr/sbin/mpt-status'),
  flag: z.string().min(1).default('-s'),
  identifier: z.string().min(1).default('mpt'),
});

export const SoftwareRaidConfigSchema = z.object({
  mdstatPath: z.string().min(1).default('/proc/mdstat'),
});

export const ScrubConfigSchema = z.object({
  mountsPath: z.string().min(1).default('/proc/mounts'),
  btrfsTool: z.string().min(1).default('/usr/bin/btrfs'),
  fsType: z.string().min(1).default('btrfs'),
});

export const ChronyConfigSchema = z.object({
  chronycPath: z.string().min(1).default('/usr/bin/chronyc'),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  plugin: PluginConfigSchema,
  logging: LoggingConfigSchema,
  hardwareRaid: HardwareRaidConfigSchema,
  controller: ControllerConfigSchema,
  softwareRaid: SoftwareRaidConfigSchema,
  scrub: ScrubConfigSchema,
  chrony: ChronyConfigSchema,
});

/**
 * Shape accepted from the optional JSON config file
 */
export const ConfigFileSchema = ConfigSchema.deepPartial();

export type Config = z.infer<typeof ConfigSchema>;
export type Correlation = z.infer<typeof CorrelationSchema>;
