/**
 * Munin plugin protocol: field naming, line formatting and mode dispatch
 */

import type {
  AutoconfResult,
  FieldConfig,
  GraphConfig,
  Plugin,
  PluginMode,
  PluginReport,
  RunOptions,
} from '../types/plugin.js';

/**
 * Derive the protocol field name from a raw identifier
 */
export function metricId(identifier: string): string {
  if (identifier === '/') return 'root';
  return identifier.toLowerCase().replace(/[^a-z0-9]/g, '_');
}

/**
 * Anything other than autoconf/config (including no argument) fetches
 */
export function parseMode(arg: string | undefined): PluginMode {
  if (arg === 'autoconf' || arg === 'config') return arg;
  return 'fetch';
}

export function formatAutoconf(result: AutoconfResult): string {
  return result.supported ? 'yes' : `no (${result.reason})`;
}

export function formatGraph(graph: GraphConfig): string[] {
  const lines = [
    `graph_title ${graph.title}`,
    `graph_vlabel ${graph.vlabel}`,
    `graph_category ${graph.category}`,
  ];
  if (graph.args) lines.push(`graph_args ${graph.args}`);
  if (graph.info) lines.push(`graph_info ${graph.info}`);
  return lines;
}

export function formatFieldConfig(field: FieldConfig): string[] {
  const lines = [`${field.id}.label ${field.label}`];
  if (field.info) lines.push(`${field.id}.info ${field.info}`);
  if (field.warning) lines.push(`${field.id}.warning ${field.warning}`);
  if (field.critical) lines.push(`${field.id}.critical ${field.critical}`);
  return lines;
}

/**
 * Render a value line; floats are rounded to 12 significant digits to hide
 * binary noise from unit scaling
 */
export function formatValue(id: string, value: number | undefined): string {
  const rendered = value === undefined || !Number.isFinite(value) ? 'U' : String(Number(value.toPrecision(12)));
  return `${id}.value ${rendered}`;
}

export function renderConfig(report: PluginReport, options: RunOptions): string[] {
  const lines = formatGraph(report.graph);
  for (const field of report.fields) {
    lines.push(...formatFieldConfig(field));
    if (options.dirtyConfig) {
      lines.push(formatValue(field.id, field.value));
    }
  }
  return lines;
}

export function renderValues(report: PluginReport): string[] {
  return report.fields.map((field) => formatValue(field.id, field.value));
}

/**
 * Run one plugin invocation and return the lines to print
 */
export async function runPlugin(plugin: Plugin, mode: PluginMode, options: RunOptions): Promise<string[]> {
  switch (mode) {
    case 'autoconf':
      return [formatAutoconf(await plugin.autoconf())];
    case 'config':
      return renderConfig(await plugin.report(), options);
    case 'fetch':
      return renderValues(await plugin.report());
  }
}
