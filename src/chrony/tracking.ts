/**
 * chrony tracking report collection
 */

import type { TrackingField, TrackingSample } from '../types/tracking.js';
import { executeCommand, isExecutable, parseKeyValue } from '../utils/exec.js';
import type { Logger } from '../logger/index.js';

/**
 * Fields reported by default. Offsets and delays are converted from
 * seconds to milliseconds.
 */
export const DEFAULT_TRACKING_FIELDS: readonly TrackingField[] = [
  {
    key: 'stratum',
    source: 'Stratum',
    label: 'Stratum',
    info: 'Number of hops to a reference clock',
    unit: 'count',
    scale: 1,
  },
  {
    key: 'systime',
    source: 'System time',
    label: 'System time offset',
    info: 'Offset of the system clock from NTP time; negative when slow',
    unit: 'seconds',
    scale: 1000,
    negateWhen: 'slow',
  },
  {
    key: 'lastoffset',
    source: 'Last offset',
    label: 'Last offset',
    info: 'Estimated local offset on the last clock update',
    unit: 'seconds',
    scale: 1000,
  },
  {
    key: 'rmsoffset',
    source: 'RMS offset',
    label: 'RMS offset',
    info: 'Long-term average of the offset value',
    unit: 'seconds',
    scale: 1000,
  },
  {
    key: 'frequency',
    source: 'Frequency',
    label: 'Frequency error',
    info: 'Rate at which the system clock would be wrong without correction; negative when slow',
    unit: 'ppm',
    scale: 1,
    negateWhen: 'slow',
  },
  {
    key: 'residualfreq',
    source: 'Residual freq',
    label: 'Residual frequency',
    info: 'Difference between the reference frequency and the one in use',
    unit: 'ppm',
    scale: 1,
  },
  {
    key: 'skew',
    source: 'Skew',
    label: 'Skew',
    info: 'Estimated error bound on the frequency',
    unit: 'ppm',
    scale: 1,
  },
  {
    key: 'rootdelay',
    source: 'Root delay',
    label: 'Root delay',
    info: 'Total network path delay to the stratum-1 source',
    unit: 'seconds',
    scale: 1000,
  },
  {
    key: 'rootdispersion',
    source: 'Root dispersion',
    label: 'Root dispersion',
    info: 'Total dispersion accumulated through all hops to the stratum-1 source',
    unit: 'seconds',
    scale: 1000,
  },
  {
    key: 'updateinterval',
    source: 'Update interval',
    label: 'Update interval',
    info: 'Interval between the last two clock updates',
    unit: 'seconds',
    scale: 1,
  },
];

/**
 * Unit shown after a field's label, after scaling
 */
export function unitLabel(field: TrackingField): string | undefined {
  switch (field.unit) {
    case 'seconds':
      return field.scale === 1000 ? 'ms' : 's';
    case 'ppm':
      return 'ppm';
    case 'count':
      return undefined;
  }
}

const NUMBER = /[-+]?\d+(?:\.\d+)?(?:e[-+]?\d+)?/i;

/**
 * First number in a tracking value, signed and scaled for the field
 */
export function parseTrackingValue(raw: string | undefined, field: TrackingField): number | undefined {
  if (raw === undefined) return undefined;
  const match = NUMBER.exec(raw);
  if (!match) return undefined;

  let value = parseFloat(match[0]);
  if (field.negateWhen && raw.split(/\s+/).includes(field.negateWhen)) {
    value = -value;
  }
  return value * field.scale;
}

export type TrackingState =
  | { status: 'ok'; values: Map<string, string> }
  | { status: 'missing' }
  | { status: 'failed'; message: string };

/**
 * Run `chronyc tracking` and split its report into label/value pairs
 */
export async function readTracking(chronycPath: string, timeout: number, logger: Logger): Promise<TrackingState> {
  if (!(await isExecutable(chronycPath))) {
    logger.debug('chronyc not installed', { path: chronycPath });
    return { status: 'missing' };
  }

  const result = await executeCommand(chronycPath, ['tracking'], { timeout });
  if (result.error || result.exitCode !== 0) {
    const message = result.error?.message ?? (result.stderr || `exit code ${result.exitCode}`);
    logger.warn(`chronyc tracking failed: ${message}`);
    return { status: 'failed', message };
  }

  return { status: 'ok', values: parseKeyValue(result.stdout) };
}

/**
 * Samples in field order; every field is unknown when chronyc gave nothing
 */
export function sampleTracking(state: TrackingState, fields: readonly TrackingField[]): TrackingSample[] {
  return fields.map((field) => ({
    key: field.key,
    value: state.status === 'ok' ? parseTrackingValue(state.values.get(field.source), field) : undefined,
  }));
}
