/**
 * Hardware RAID detection through vendor status tools
 */

import type { DeviceStatus } from '../types/device-status.js';
import type { Correlation } from '../config/schema.js';
import { executeCommand, isExecutable } from '../utils/exec.js';
import { findBlockDevices } from '../utils/devices.js';
import type { DetectionContext } from './context.js';

export interface HardwareRaidOptions {
  devicePattern: string;
  statusTool: string;
  correlation: Correlation;
}

export interface ControllerOptions {
  statusTool: string;
  flag: string;
  identifier: string;
}

/**
 * Classify one status-tool line: true for "status: OK", false for any
 * other status, undefined when the line carries no status at all
 */
export function classifyStatusLine(line: string): boolean | undefined {
  if (line.includes('status: OK')) return true;
  if (line.includes('status: ')) return false;
  return undefined;
}

/**
 * Line i describes device i; devices beyond the last line are skipped
 */
export function correlateByPosition(devices: string[], lines: string[]): Map<string, string> {
  const pairs = new Map<string, string>();
  devices.forEach((device, index) => {
    const line = lines[index];
    if (line !== undefined) {
      pairs.set(device, line);
    }
  });
  return pairs;
}

/**
 * Each device takes the first line that names it as a whole token
 */
export function correlateByIdentifier(devices: string[], lines: string[]): Map<string, string> {
  const pairs = new Map<string, string>();
  for (const device of devices) {
    const line = lines.find((candidate) =>
      candidate
        .split(/\s+/)
        .map((token) => token.replace(/[:,;]+$/, ''))
        .includes(device)
    );
    if (line !== undefined) {
      pairs.set(device, line);
    }
  }
  return pairs;
}

/**
 * Per-device status from a tool that takes every device path as an argument
 * and prints one status line per device
 */
export async function detectHardwareRaid(
  options: HardwareRaidOptions,
  context: DetectionContext
): Promise<DeviceStatus[]> {
  const { logger } = context;

  const devices = await findBlockDevices(options.devicePattern);
  if (devices.length === 0) {
    logger.debug('No hardware RAID device nodes', { pattern: options.devicePattern });
    return [];
  }
  if (!(await isExecutable(options.statusTool))) {
    logger.debug('Hardware RAID status tool not installed', { tool: options.statusTool });
    return [];
  }

  const result = await executeCommand(options.statusTool, devices, { timeout: context.commandTimeout });
  if (result.error) {
    logger.warn(`Hardware RAID status tool did not run: ${result.error.message}`, {
      tool: options.statusTool,
    });
    return [];
  }

  const lines = result.stdout === '' ? [] : result.stdout.split('\n');
  const pairs =
    options.correlation === 'identifier'
      ? correlateByIdentifier(devices, lines)
      : correlateByPosition(devices, lines);

  const statuses: DeviceStatus[] = [];
  for (const device of devices) {
    const line = pairs.get(device);
    const healthy = line === undefined ? undefined : classifyStatusLine(line);
    if (healthy === undefined) continue;

    statuses.push({
      identifier: device,
      healthy,
      description: `Hardware RAID device ${device}`,
      source: 'hwraid',
    });
  }

  return statuses;
}

/**
 * Whole-controller status from a tool whose brief summary is empty when
 * the controller is unhappy
 */
export async function detectControllerRaid(
  options: ControllerOptions,
  context: DetectionContext
): Promise<DeviceStatus[]> {
  const { logger } = context;

  if (!(await isExecutable(options.statusTool))) {
    logger.debug('Controller status tool not installed', { tool: options.statusTool });
    return [];
  }

  const result = await executeCommand(options.statusTool, [options.flag], { timeout: context.commandTimeout });
  if (result.error) {
    logger.warn(`Controller status tool did not run: ${result.error.message}`, { tool: options.statusTool });
  }

  return [
    {
      identifier: options.identifier,
      healthy: result.stdout.trim() !== '',
      description: `Hardware RAID device ${options.identifier}`,
      source: 'controller',
    },
  ];
}
