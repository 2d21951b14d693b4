/**
 * Utilities for reading /proc pseudo-files
 */

import * as fs from 'fs/promises';

export interface MountEntry {
  device: string;
  mountpoint: string;
  fstype: string;
  options: string;
}

/**
 * Read a /proc or /sys file, or null when it cannot be opened
 */
export async function readProcFile(path: string): Promise<string | null> {
  try {
    return await fs.readFile(path, 'utf-8');
  } catch {
    return null;
  }
}

/**
 * Undo the octal escaping the kernel applies to spaces, tabs and
 * backslashes in mount table fields (e.g. "\040")
 */
export function unescapeMountField(field: string): string {
  return field.replace(/\\([0-7]{3})/g, (_, octal: string) => String.fromCharCode(parseInt(octal, 8)));
}

/**
 * Parse /proc/mounts (or /etc/mtab) content into entries, in file order
 */
export function parseMounts(content: string): MountEntry[] {
  const entries: MountEntry[] = [];

  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) continue;

    const [device, mountpoint, fstype, options = ''] = trimmed.split(/\s+/);
    if (!device || !mountpoint || !fstype) continue;

    entries.push({
      device: unescapeMountField(device),
      mountpoint: unescapeMountField(mountpoint),
      fstype,
      options,
    });
  }

  return entries;
}
