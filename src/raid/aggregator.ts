/**
 * Device Status Aggregator
 *
 * Runs every detection strategy in a fixed order and merges the results
 * into one list, then gives each entry a protocol field name that no other
 * entry shares.
 */

import type { Config } from '../config/schema.js';
import type { DeviceStatus, ReportedDevice, StrategyName } from '../types/device-status.js';
import { metricId } from '../protocol/index.js';
import { detectControllerRaid, detectHardwareRaid } from './hardware.js';
import { detectSoftwareRaid } from './software.js';
import { detectFilesystemScrub } from './btrfs.js';
import type { DetectionContext } from './context.js';

export type RaidConfig = Pick<Config, 'hardwareRaid' | 'controller' | 'softwareRaid' | 'scrub'>;

interface Strategy {
  name: StrategyName;
  detect: () => Promise<DeviceStatus[]>;
}

/**
 * Resolve field names; an entry whose name is already taken is namespaced
 * by its strategy (and numbered if that is taken too)
 */
export function assignMetricIds(devices: DeviceStatus[]): ReportedDevice[] {
  const taken = new Set<string>();

  return devices.map((device) => {
    let id = metricId(device.identifier);
    if (taken.has(id)) {
      const namespaced = `${device.source}_${id}`;
      id = namespaced;
      for (let n = 2; taken.has(id); n++) {
        id = `${namespaced}_${n}`;
      }
    }
    taken.add(id);
    return { ...device, metricId: id };
  });
}

export class DeviceStatusAggregator {
  private readonly strategies: Strategy[];

  constructor(
    config: RaidConfig,
    private readonly context: DetectionContext
  ) {
    this.strategies = [
      { name: 'hwraid', detect: () => detectHardwareRaid(config.hardwareRaid, context) },
      { name: 'controller', detect: () => detectControllerRaid(config.controller, context) },
      { name: 'mdraid', detect: () => detectSoftwareRaid(config.softwareRaid.mdstatPath, context) },
      { name: 'btrfs', detect: () => detectFilesystemScrub(config.scrub, context) },
    ];
  }

  /**
   * Concatenate every strategy's findings, strategies in fixed order
   */
  async aggregateAll(): Promise<DeviceStatus[]> {
    const devices: DeviceStatus[] = [];
    for (const strategy of this.strategies) {
      const found = await strategy.detect();
      this.context.logger.debug(`Strategy ${strategy.name} found ${found.length} device(s)`);
      devices.push(...found);
    }
    return devices;
  }

  /**
   * Aggregate and resolve field names in one step
   */
  async collect(): Promise<ReportedDevice[]> {
    const reported = assignMetricIds(await this.aggregateAll());
    for (const device of reported) {
      if (device.metricId !== metricId(device.identifier)) {
        this.context.logger.warn(`Duplicate field name for ${device.identifier}, reporting as ${device.metricId}`);
      }
    }
    return reported;
  }
}
