/**
 * Unit tests for device node enumeration
 */

import { describe, it, expect, afterAll } from '@jest/globals';
import { dirname, join } from 'path';
import { writeFileSync } from 'fs';
import { findBlockDevices, patternToRegExp } from './devices.js';
import { writeFixture, removeFixtures } from '../__tests__/utils.js';

describe('device enumeration', () => {
  afterAll(removeFixtures);

  describe('patternToRegExp', () => {
    it('should expand * across any run of characters', () => {
      const matcher = patternToRegExp('c*d0');

      expect(matcher.test('c0d0')).toBe(true);
      expect(matcher.test('c12d0')).toBe(true);
      expect(matcher.test('c0d1')).toBe(false);
      expect(matcher.test('c0d0p1')).toBe(false);
    });

    it('should match ? against one character and escape the rest', () => {
      const matcher = patternToRegExp('sg?.dev');

      expect(matcher.test('sg1.dev')).toBe(true);
      expect(matcher.test('sg10.dev')).toBe(false);
      expect(matcher.test('sg1xdev')).toBe(false);
    });
  });

  describe('findBlockDevices', () => {
    it('should return nothing for a missing directory', async () => {
      await expect(findBlockDevices('/nonexistent/cciss/c*d0')).resolves.toEqual([]);
    });

    it('should ignore matching names that are not block devices', async () => {
      const dir = dirname(writeFixture('c0d0', ''));
      writeFileSync(join(dir, 'c1d0'), '');

      await expect(findBlockDevices(join(dir, 'c*d0'))).resolves.toEqual([]);
    });
  });
});
