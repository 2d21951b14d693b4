/**
 * Unit tests for command execution helpers
 */

import { describe, it, expect } from '@jest/globals';
import { executeCommand, isExecutable, parseKeyValue } from './exec.js';
import { ErrorCode } from '../errors/index.js';

describe('Command execution', () => {
  describe('executeCommand', () => {
    it('should report a missing tool instead of throwing', async () => {
      const result = await executeCommand('/nonexistent/health-tool', ['status']);

      expect(result.stdout).toBe('');
      expect(result.exitCode).toBe(127);
      expect(result.error?.code).toBe(ErrorCode.COMMAND_NOT_FOUND);
      expect(result.error?.message).toBe('/nonexistent/health-tool not found');
    });

    it('should return stdout exactly as printed', async () => {
      const result = await executeCommand(process.execPath, ['-e', "process.stdout.write('\\nstatus: OK\\n')"]);

      expect(result.error).toBeUndefined();
      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe('\nstatus: OK\n');
    });
  });

  describe('isExecutable', () => {
    it('should be false for a missing path', async () => {
      await expect(isExecutable('/nonexistent/health-tool')).resolves.toBe(false);
    });

    it('should be true for the running node binary', async () => {
      await expect(isExecutable(process.execPath)).resolves.toBe(true);
    });
  });

  describe('parseKeyValue', () => {
    it('should split on the first colon only', () => {
      const map = parseKeyValue('Ref time (UTC)  : Mon Oct 19 09:58:12 2026\nStratum         : 3');

      expect(map.get('Ref time (UTC)')).toBe('Mon Oct 19 09:58:12 2026');
      expect(map.get('Stratum')).toBe('3');
    });

    it('should skip blank lines and lines without a key', () => {
      const map = parseKeyValue('\n: orphan\nno separator here\nSkew : 0.1 ppm\n');

      expect([...map.entries()]).toEqual([['Skew', '0.1 ppm']]);
    });
  });
});
