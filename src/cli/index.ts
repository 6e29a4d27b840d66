#!/usr/bin/env node
/**
 * killfeed CLI
 * Operator access to the kill feed database. Connection settings come from
 * the KILLFEED_DB_* variables (see core/config).
 */

import { runCli } from './program.js';
import { loadConfig } from '../core/config.js';
import { RelationalStore } from '../db/relational-store.js';
import { createLogger } from '../platform/logger.js';

const log = createLogger('cli');

process.exitCode = await runCli(process.argv, {
  createStore: () => new RelationalStore(loadConfig().database),
  print: (line) => console.log(line),
  printError: (line) => console.error(line),
  log
});
