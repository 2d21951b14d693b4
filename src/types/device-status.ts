/**
 * Storage redundancy health type definitions
 */

/** Detection strategies, in the order the aggregator runs them */
export type StrategyName = 'hwraid' | 'controller' | 'mdraid' | 'btrfs';

export interface DeviceStatus {
  /** Device path, controller name, array name or mount point */
  identifier: string;
  healthy: boolean;
  description: string;
  source: StrategyName;
}

/**
 * A device with the protocol field name it is reported under
 */
export interface ReportedDevice extends DeviceStatus {
  metricId: string;
}
