/**
 * Munin plugin protocol type definitions
 */

export type PluginMode = 'autoconf' | 'config' | 'fetch';

export type AutoconfResult = { supported: true } | { supported: false; reason: string };

export interface GraphConfig {
  title: string;
  vlabel: string;
  category: string;
  args?: string;
  info?: string;
}

export interface FieldConfig {
  id: string;
  label: string;
  info?: string;
  /** Munin range syntax, e.g. "1:" */
  warning?: string;
  critical?: string;
}

export interface ReportField extends FieldConfig {
  /** undefined is reported as "U" (unknown) */
  value: number | undefined;
}

export interface PluginReport {
  graph: GraphConfig;
  fields: ReportField[];
}

export interface Plugin {
  readonly name: string;
  autoconf(): Promise<AutoconfResult>;
  /** Collect everything once; config and fetch are both rendered from it */
  report(): Promise<PluginReport>;
}

export interface RunOptions {
  /** Emit values alongside config (Munin "dirtyconfig" capability) */
  dirtyConfig: boolean;
}
