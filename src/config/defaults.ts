import type { Config } from './schema.js';

/**
 * Default configuration values
 * These are used when no environment variables or config files override them
 */
export const defaultConfig: Config = {
  plugin: {
    dirtyConfig: false,
    commandTimeout: 0,
  },
  logging: {
    level: 'warn',
    format: 'simple',
    file: undefined,
    maxFiles: 5,
    maxSize: '10m',
  },
  hardwareRaid: {
    devicePattern: '/dev/cciss/c*d0',
    statusTool: '/usr/bin/cciss_vol_status',
    correlation: 'position',
  },
  controller: {
    statusTool: '/usr/sbin/mpt-status',
    flag: '-s',
    identifier: 'mpt',
  },
  softwareRaid: {
    mdstatPath: '/proc/mdstat',
  },
  scrub: {
    mountsPath: '/proc/mounts',
    btrfsTool: '/usr/bin/btrfs',
    fsType: 'btrfs',
  },
  chrony: {
    chronycPath: '/usr/bin/chronyc',
  },
};
