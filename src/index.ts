#!/usr/bin/env node
import 'dotenv/config';
import { runSync } from './cli.js';
import { readSyncConfig } from './config.js';
import { errorMessage } from './errors.js';

const cfg = readSyncConfig();

runSync(cfg).catch((e) => {
  console.error(`mc-sync: ${errorMessage(e)}`);
  process.exitCode = 1;
});
