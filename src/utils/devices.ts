/**
 * Device node enumeration for controller status tools
 */

import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * Translate the wildcard part of a pattern (`*`, `?`) into an anchored RegExp
 */
export function patternToRegExp(pattern: string): RegExp {
  const source = pattern
    .split('')
    .map((ch) => {
      if (ch === '*') return '.*';
      if (ch === '?') return '.';
      return ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    })
    .join('');
  return new RegExp(`^${source}$`);
}

/**
 * List block-special device files matching a pattern such as
 * `/dev/cciss/c*d0`, sorted lexically. Wildcards are honoured in the last
 * path segment only. Unreadable directories yield no devices.
 */
export async function findBlockDevices(pattern: string): Promise<string[]> {
  const dir = path.dirname(pattern);
  const matcher = patternToRegExp(path.basename(pattern));

  let names: string[];
  try {
    names = await fs.readdir(dir);
  } catch {
    return [];
  }

  const devices: string[] = [];
  for (const name of names.filter((entry) => matcher.test(entry))) {
    const candidate = path.join(dir, name);
    try {
      const stats = await fs.stat(candidate);
      if (stats.isBlockDevice()) {
        devices.push(candidate);
      }
    } catch {
      // vanished between readdir and stat
      continue;
    }
  }

  return devices.sort();
}
