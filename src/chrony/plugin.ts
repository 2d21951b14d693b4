import type { AutoconfResult, Plugin, PluginReport } from '../types/plugin.js';
import type { TrackingField } from '../types/tracking.js';
import type { Logger } from '../logger/index.js';
import { DEFAULT_TRACKING_FIELDS, readTracking, sampleTracking, unitLabel } from './tracking.js';

export interface ChronyPluginOptions {
  chronycPath: string;
  commandTimeout: number;
  fields?: readonly TrackingField[];
}

/**
 * chrony_tracking: the NTP daemon's view of its own synchronisation
 */
export class ChronyTrackingPlugin implements Plugin {
  readonly name = 'chrony_tracking';
  private readonly fields: readonly TrackingField[];

  constructor(
    private readonly options: ChronyPluginOptions,
    private readonly logger: Logger
  ) {
    this.fields = options.fields ?? DEFAULT_TRACKING_FIELDS;
  }

  async autoconf(): Promise<AutoconfResult> {
    const state = await readTracking(this.options.chronycPath, this.options.commandTimeout, this.logger);
    switch (state.status) {
      case 'ok':
        return { supported: true };
      case 'missing':
        return { supported: false, reason: 'chronyc not found' };
      case 'failed':
        return { supported: false, reason: 'chronyd is not running' };
    }
  }

  async report(): Promise<PluginReport> {
    const state = await readTracking(this.options.chronycPath, this.options.commandTimeout, this.logger);
    const samples = new Map(
      sampleTracking(state, this.fields).map((sample): [string, number | undefined] => [sample.key, sample.value])
    );

    return {
      graph: {
        title: 'NTP tracking (chrony)',
        vlabel: 'ms / ppm / count',
        category: 'time',
        args: '--base 1000',
        info: 'Clock synchronisation state as reported by chronyc tracking.',
      },
      fields: this.fields.map((field) => {
        const unit = unitLabel(field);
        return {
          id: field.key,
          label: unit ? `${field.label} (${unit})` : field.label,
          info: field.info,
          value: samples.get(field.key),
        };
      }),
    };
  }
}
