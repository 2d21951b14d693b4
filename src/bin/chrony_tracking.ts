#!/usr/bin/env node

/**
 * chrony_tracking - Munin plugin for chronyd clock tracking
 */

import { runCli } from '../cli.js';

void runCli('chrony_tracking', process.argv.slice(2)).then((code) => {
  process.exitCode = code;
});
