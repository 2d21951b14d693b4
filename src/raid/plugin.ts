import type { AutoconfResult, Plugin, PluginReport } from '../types/plugin.js';
import { DeviceStatusAggregator, type RaidConfig } from './aggregator.js';
import type { DetectionContext } from './context.js';

/**
 * raid_status: one 1/0 field per RAID device, array or scrubbed filesystem
 */
export class RaidStatusPlugin implements Plugin {
  readonly name = 'raid_status';
  private readonly aggregator: DeviceStatusAggregator;

  constructor(config: RaidConfig, context: DetectionContext) {
    this.aggregator = new DeviceStatusAggregator(config, context);
  }

  async autoconf(): Promise<AutoconfResult> {
    const devices = await this.aggregator.aggregateAll();
    return devices.length > 0 ? { supported: true } : { supported: false, reason: 'no RAID devices found' };
  }

  async report(): Promise<PluginReport> {
    const devices = await this.aggregator.collect();
    return {
      graph: {
        title: 'RAID status',
        vlabel: 'Status',
        category: 'disk',
        args: '--lower-limit 0 --upper-limit 1',
        info: 'Health of hardware RAID, software RAID and BTRFS scrub results. 1 = healthy, 0 = degraded.',
      },
      fields: devices.map((device) => ({
        id: device.metricId,
        label: device.description,
        warning: '1:',
        value: device.healthy ? 1 : 0,
      })),
    };
  }
}
