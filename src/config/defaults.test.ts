/**
 * Unit tests for default configuration
 */

import { describe, it, expect } from '@jest/globals';
import { defaultConfig } from './defaults.js';
import { ConfigSchema } from './schema.js';

describe('Default Configuration', () => {
  it('should pass schema validation unchanged', () => {
    expect(ConfigSchema.parse(defaultConfig)).toEqual(defaultConfig);
  });

  it('should not emit values with config unless asked', () => {
    expect(defaultConfig.plugin.dirtyConfig).toBe(false);
  });

  it('should wait indefinitely for external tools', () => {
    expect(defaultConfig.plugin.commandTimeout).toBe(0);
  });

  it('should read the standard pseudo-files', () => {
    expect(defaultConfig.softwareRaid.mdstatPath).toBe('/proc/mdstat');
    expect(defaultConfig.scrub.mountsPath).toBe('/proc/mounts');
  });

  it('should correlate hardware RAID output by position', () => {
    expect(defaultConfig.hardwareRaid.correlation).toBe('position');
  });

  it('should report the controller under a fixed identifier', () => {
    expect(defaultConfig.controller.identifier).toBe('mpt');
    expect(defaultConfig.controller.flag).toBe('-s');
  });
});
