import { config as loadEnv } from 'dotenv';
import { readFileSync, existsSync } from 'fs';
import { ConfigSchema, ConfigFileSchema, type Config } from './schema.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError } from '../errors/index.js';

/**
 * One layer of configuration: any subset of any section, validated only once
 * every layer has been merged
 */
type ConfigLayer = {
  [K in keyof Config]?: { [P in keyof Config[K]]?: unknown };
};

const ENV_PREFIX = 'HEALTH_PLUGINS_';

/**
 * Interpret a Munin-style flag ("1", "true", "yes")
 */
function parseFlag(value: string): boolean {
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Load configuration from environment variables and config files
 * Priority: Environment Variables > Config File > Defaults
 */
export class ConfigLoader {
  private config: Config;
  private readonly env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    // Load .env file if it exists
    loadEnv();
    this.env = env;

    const merged = [this.loadFromFile(), this.loadFromEnv()].reduce<ConfigLayer>(
      (target, layer) => this.mergeConfig(target, layer),
      structuredClone(defaultConfig)
    );

    this.config = this.validate(merged);
  }

  /**
   * Load configuration from the JSON file named by HEALTH_PLUGINS_CONFIG_FILE
   */
  private loadFromFile(): ConfigLayer {
    const configPath = this.env[`${ENV_PREFIX}CONFIG_FILE`];
    if (!configPath) {
      return {};
    }
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`, { configPath });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(configPath, 'utf-8'));
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ConfigurationError(`Failed to load config file: ${cause.message}`, { configPath }, cause);
    }

    const parsed = ConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid config file ${configPath}: ${parsed.error.message}`, {
        configPath,
      });
    }
    return parsed.data;
  }

  /**
   * Load configuration from environment variables
   */
  private loadFromEnv(): ConfigLayer {
    const env = (name: string): string | undefined => this.env[`${ENV_PREFIX}${name}`];
    const layer: Required<ConfigLayer> = {
      plugin: {},
      logging: {},
      hardwareRaid: {},
      controller: {},
      softwareRaid: {},
      scrub: {},
      chrony: {},
    };

    // Munin sets this itself when the master understands dirty config
    const dirtyConfig = this.env['MUNIN_CAP_DIRTYCONFIG'];
    if (dirtyConfig) {
      layer.plugin.dirtyConfig = parseFlag(dirtyConfig);
    }
    const timeout = env('COMMAND_TIMEOUT');
    if (timeout) {
      layer.plugin.commandTimeout = parseInt(timeout, 10);
    }

    // Logging configuration
    const logLevel = env('LOG_LEVEL');
    if (logLevel) {
      layer.logging.level = logLevel;
    }
    const logFormat = env('LOG_FORMAT');
    if (logFormat) {
      layer.logging.format = logFormat;
    }
    const logFile = env('LOG_FILE');
    if (logFile) {
      layer.logging.file = logFile;
    }

    // Hardware RAID status tool
    const devices = env('HWRAID_DEVICES');
    if (devices) {
      layer.hardwareRaid.devicePattern = devices;
    }
    const hwTool = env('HWRAID_TOOL');
    if (hwTool) {
      layer.hardwareRaid.statusTool = hwTool;
    }
    const correlation = env('HWRAID_CORRELATION');
    if (correlation) {
      layer.hardwareRaid.correlation = correlation;
    }

    // Vendor controller summary tool
    const controllerTool = env('CONTROLLER_TOOL');
    if (controllerTool) {
      layer.controller.statusTool = controllerTool;
    }
    const controllerFlag = env('CONTROLLER_FLAG');
    if (controllerFlag) {
      layer.controller.flag = controllerFlag;
    }

    // Pseudo-files and scrub tool
    const mdstat = env('MDSTAT_PATH');
    if (mdstat) {
      layer.softwareRaid.mdstatPath = mdstat;
    }
    const mounts = env('MOUNTS_PATH');
    if (mounts) {
      layer.scrub.mountsPath = mounts;
    }
    const btrfs = env('BTRFS_TOOL');
    if (btrfs) {
      layer.scrub.btrfsTool = btrfs;
    }

    const chronyc = env('CHRONYC_PATH');
    if (chronyc) {
      layer.chrony.chronycPath = chronyc;
    }

    return layer;
  }

  /**
   * Validate configuration using Zod schema
   */
  private validate(merged: ConfigLayer): Config {
    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      throw new ConfigurationError(`Configuration validation failed: ${result.error.message}`, {
        issues: result.error.issues,
      });
    }
    return result.data;
  }

  /**
   * Section-wise merge of two layers, later layer wins
   */
  private mergeConfig(target: ConfigLayer, source: ConfigLayer): ConfigLayer {
    return {
      plugin: { ...target.plugin, ...source.plugin },
      logging: { ...target.logging, ...source.logging },
      hardwareRaid: { ...target.hardwareRaid, ...source.hardwareRaid },
      controller: { ...target.controller, ...source.controller },
      softwareRaid: { ...target.softwareRaid, ...source.softwareRaid },
      scrub: { ...target.scrub, ...source.scrub },
      chrony: { ...target.chrony, ...source.chrony },
    };
  }

  /**
   * Get the current configuration
   */
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
