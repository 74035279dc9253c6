#!/usr/bin/env node
/**
 * logverify CLI
 */

import { config as loadEnv } from 'dotenv';

import { runCli } from '../src/cli/index.js';
import { findEnvFile } from '../src/config/loader.js';

const envFile = findEnvFile();
if (envFile) {
  loadEnv({ path: envFile });
}

await runCli();
