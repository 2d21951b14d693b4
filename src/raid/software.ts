/**
 * Linux software RAID (md) detection from /proc/mdstat
 */

import type { DeviceStatus } from '../types/device-status.js';
import { readProcFile } from '../utils/proc-parser.js';
import type { DetectionContext } from './context.js';

/**
 * Array header, e.g. "md0 : active raid1 sda1[0] sdb1[1]". The
 * "Personalities :" line shares the layout but is not an array.
 */
const ARRAY_HEADER = /^(md[^\s:]*)\s+:\s/;

/**
 * One status per array header. Only the first non-blank line after the
 * header is consulted; an underscore in it ("[U_]") marks a missing member.
 */
export function parseMdstat(content: string): DeviceStatus[] {
  const arrays: DeviceStatus[] = [];
  let current: string | null = null;

  for (const line of content.split('\n')) {
    const name = ARRAY_HEADER.exec(line)?.[1];
    if (name) {
      current = name;
      continue;
    }
    if (current === null || line.trim() === '') continue;

    arrays.push({
      identifier: current,
      healthy: !line.includes('_'),
      description: `Software RAID device ${current}`,
      source: 'mdraid',
    });
    current = null;
  }

  return arrays;
}

export async function detectSoftwareRaid(mdstatPath: string, context: DetectionContext): Promise<DeviceStatus[]> {
  const content = await readProcFile(mdstatPath);
  if (content === null) {
    context.logger.debug('Software RAID status file unreadable', { path: mdstatPath });
    return [];
  }
  return parseMdstat(content);
}
