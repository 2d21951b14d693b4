#!/usr/bin/env node

/**
 * munin-health-plugins - Entry Point
 * Either symlinked under a plugin's name or called as
 * `munin-health-plugins <plugin> [autoconf|config]`
 */

import { PLUGIN_NAMES, resolveInvocation, runCli } from './cli.js';

async function main(): Promise<number> {
  const { plugin, args } = resolveInvocation(process.argv[1], process.argv.slice(2));

  if (plugin === 'list') {
    PLUGIN_NAMES.forEach((name) => console.log(name));
    return 0;
  }
  if (plugin === '' || plugin === 'help') {
    console.error('Usage: munin-health-plugins <plugin> [autoconf|config]\n');
    console.error(`Plugins: ${PLUGIN_NAMES.join(', ')}`);
    return plugin === '' ? 1 : 0;
  }

  return runCli(plugin, args);
}

void main().then((code) => {
  process.exitCode = code;
});
