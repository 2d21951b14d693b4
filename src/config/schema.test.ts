/**
 * Unit tests for configuration schema
 */

import { describe, it, expect } from '@jest/globals';
import {
  ConfigFileSchema,
  CorrelationSchema,
  HardwareRaidConfigSchema,
  LogFormatSchema,
  LogLevelSchema,
  LoggingConfigSchema,
  PluginConfigSchema,
  ScrubConfigSchema,
} from './schema.js';

describe('Configuration Schema', () => {
  describe('LogLevelSchema', () => {
    it('should accept valid log levels', () => {
      expect(() => LogLevelSchema.parse('debug')).not.toThrow();
      expect(() => LogLevelSchema.parse('info')).not.toThrow();
      expect(() => LogLevelSchema.parse('warn')).not.toThrow();
      expect(() => LogLevelSchema.parse('error')).not.toThrow();
    });

    it('should reject invalid log levels', () => {
      expect(() => LogLevelSchema.parse('trace')).toThrow();
    });
  });

  describe('LogFormatSchema', () => {
    it('should reject invalid log formats', () => {
      expect(() => LogFormatSchema.parse('xml')).toThrow();
    });
  });

  describe('CorrelationSchema', () => {
    it('should accept position and identifier', () => {
      expect(CorrelationSchema.parse('position')).toBe('position');
      expect(CorrelationSchema.parse('identifier')).toBe('identifier');
    });

    it('should reject anything else', () => {
      expect(() => CorrelationSchema.parse('serial')).toThrow();
    });
  });

  describe('PluginConfigSchema', () => {
    it('should apply defaults', () => {
      expect(PluginConfigSchema.parse({})).toEqual({ dirtyConfig: false, commandTimeout: 0 });
    });

    it('should reject negative timeouts', () => {
      expect(() => PluginConfigSchema.parse({ commandTimeout: -1 })).toThrow();
    });
  });

  describe('LoggingConfigSchema', () => {
    it('should default to warnings only and no log file', () => {
      const result = LoggingConfigSchema.parse({});
      expect(result.level).toBe('warn');
      expect(result.file).toBeUndefined();
    });

    it('should reject an empty log file path', () => {
      expect(() => LoggingConfigSchema.parse({ file: '' })).toThrow();
    });
  });

  describe('HardwareRaidConfigSchema', () => {
    it('should apply defaults', () => {
      expect(HardwareRaidConfigSchema.parse({})).toEqual({
        devicePattern: '/dev/cciss/c*d0',
        statusTool: '/usr/bin/cciss_vol_status',
        correlation: 'position',
      });
    });
  });

  describe('ScrubConfigSchema', () => {
    it('should target btrfs by default', () => {
      expect(ScrubConfigSchema.parse({}).fsType).toBe('btrfs');
    });
  });

  describe('ConfigFileSchema', () => {
    it('should accept a partial file and leave missing keys out', () => {
      const result = ConfigFileSchema.parse({ softwareRaid: { mdstatPath: '/tmp/mdstat' } });
      expect(result).toEqual({ softwareRaid: { mdstatPath: '/tmp/mdstat' } });
    });

    it('should reject values of the wrong type', () => {
      expect(() => ConfigFileSchema.parse({ plugin: { commandTimeout: 'soon' } })).toThrow();
    });
  });
});
