/**
 * Command-line dispatch shared by every plugin entry point
 */

import { basename } from 'path';
import { getConfig, type Config } from './config/index.js';
import { defaultConfig } from './config/defaults.js';
import { Logger, getLogger } from './logger/index.js';
import { ErrorCode, PluginError } from './errors/index.js';
import { parseMode, runPlugin } from './protocol/index.js';
import { RaidStatusPlugin } from './raid/plugin.js';
import { ChronyTrackingPlugin } from './chrony/plugin.js';
import type { Plugin } from './types/plugin.js';

export const PLUGIN_NAMES = ['raid_status', 'chrony_tracking'] as const;
export type PluginName = (typeof PLUGIN_NAMES)[number];

export function isPluginName(name: string): name is PluginName {
  return PLUGIN_NAMES.some((candidate) => candidate === name);
}

export function createPlugin(name: PluginName, config: Config, logger: Logger): Plugin {
  const commandTimeout = config.plugin.commandTimeout;
  switch (name) {
    case 'raid_status':
      return new RaidStatusPlugin(config, { logger: logger.child({ plugin: name }), commandTimeout });
    case 'chrony_tracking':
      return new ChronyTrackingPlugin(
        { chronycPath: config.chrony.chronycPath, commandTimeout },
        logger.child({ plugin: name })
      );
  }
}

export interface Invocation {
  plugin: string;
  args: string[];
}

/**
 * Munin runs plugins through symlinks named after the plugin, so the
 * executable name wins; otherwise the first argument names the plugin
 */
export function resolveInvocation(scriptPath: string | undefined, args: string[]): Invocation {
  const invokedAs = scriptPath ? basename(scriptPath).replace(/\.[cm]?js$/, '') : '';
  if (isPluginName(invokedAs)) {
    return { plugin: invokedAs, args };
  }
  const [plugin = '', ...rest] = args;
  return { plugin, args: rest };
}

export type LineWriter = (line: string) => void;

const writeStdout: LineWriter = (line) => {
  process.stdout.write(`${line}\n`);
};

/**
 * Run one plugin invocation. Returns the process exit code; nothing reaches
 * stdout unless the plugin produced a complete answer.
 */
export async function runCli(pluginName: string, args: string[], write: LineWriter = writeStdout): Promise<number> {
  let logger = new Logger(defaultConfig.logging);

  try {
    const config = getConfig();
    logger = getLogger(config.logging);

    if (!isPluginName(pluginName)) {
      throw new PluginError(`Unknown plugin "${pluginName}"`, ErrorCode.PLUGIN_NOT_FOUND, undefined, {
        available: PLUGIN_NAMES,
      });
    }

    const mode = parseMode(args[0]);
    logger.debug(`Running ${pluginName} ${mode}`);

    const plugin = createPlugin(pluginName, config, logger);
    const lines = await runPlugin(plugin, mode, { dirtyConfig: config.plugin.dirtyConfig });
    lines.forEach((line) => write(line));
    return 0;
  } catch (error) {
    if (error instanceof PluginError) {
      logger.error(error.message, error);
    } else {
      logger.error('Fatal error', error instanceof Error ? error : new Error(String(error)));
    }
    return 1;
  }
}
