/**
 * BTRFS scrub results per mounted filesystem
 */

import type { DeviceStatus } from '../types/device-status.js';
import { executeCommand } from '../utils/exec.js';
import { parseMounts, readProcFile } from '../utils/proc-parser.js';
import type { DetectionContext } from './context.js';

export interface ScrubOptions {
  mountsPath: string;
  btrfsTool: string;
  fsType: string;
}

/** Present in both the old ("scrub started at") and new ("Scrub started:") reports */
const SCRUB_MARKER = /scrub started/i;

/** Counters from `btrfs scrub status -R` that must all be zero */
export const SCRUB_ERROR_FIELDS = [
  'read_errors',
  'verify_errors',
  'super_errors',
  'malloc_errors',
  'uncorrectable_errors',
  'unverified_errors',
] as const;

/**
 * Device to mount point for one filesystem type; a device mounted twice
 * keeps its first mount point
 */
export function mountsByDevice(content: string, fsType: string): Map<string, string> {
  const byDevice = new Map<string, string>();
  for (const entry of parseMounts(content)) {
    if (entry.fstype !== fsType || byDevice.has(entry.device)) continue;
    byDevice.set(entry.device, entry.mountpoint);
  }
  return byDevice;
}

/**
 * undefined when no scrub has run (or the tool printed nothing); otherwise
 * whether every error counter is present and zero
 */
export function classifyScrub(output: string): boolean | undefined {
  if (output === '' || !SCRUB_MARKER.test(output)) return undefined;
  return SCRUB_ERROR_FIELDS.every((field) => new RegExp(`\\b${field}:\\s*0\\b`).test(output));
}

export async function detectFilesystemScrub(
  options: ScrubOptions,
  context: DetectionContext
): Promise<DeviceStatus[]> {
  const { logger } = context;

  const content = await readProcFile(options.mountsPath);
  if (content === null) {
    logger.debug('Mount table unreadable', { path: options.mountsPath });
    return [];
  }

  const mountPoints = [...new Set(mountsByDevice(content, options.fsType).values())];
  const statuses: DeviceStatus[] = [];

  for (const mountPoint of mountPoints) {
    const result = await executeCommand(options.btrfsTool, ['scrub', 'status', '-R', mountPoint], {
      timeout: context.commandTimeout,
    });
    if (result.error) {
      logger.debug(`Scrub status unavailable: ${result.error.message}`, { mountPoint });
    }

    const healthy = classifyScrub(result.stdout);
    if (healthy === undefined) {
      logger.debug('No scrub recorded', { mountPoint });
      continue;
    }

    statuses.push({
      identifier: mountPoint,
      healthy,
      description: `BTRFS in ${mountPoint}`,
      source: 'btrfs',
    });
  }

  return statuses;
}
