#!/usr/bin/env node

/**
 * raid_status - Munin plugin for hardware RAID, md RAID and BTRFS scrub health
 */

import { runCli } from '../cli.js';

void runCli('raid_status', process.argv.slice(2)).then((code) => {
  process.exitCode = code;
});
