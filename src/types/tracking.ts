/**
 * chrony tracking type definitions
 */

export type TrackingUnit = 'seconds' | 'ppm' | 'count';

export interface TrackingField {
  /** Protocol field name */
  key: string;
  /** Label printed by `chronyc tracking`, left of the colon */
  source: string;
  label: string;
  info: string;
  unit: TrackingUnit;
  /** Multiplier applied to the parsed value */
  scale: number;
  /** Word in the value that flips the sign, e.g. "slow" */
  negateWhen?: string;
}

export interface TrackingSample {
  key: string;
  value: number | undefined;
}
