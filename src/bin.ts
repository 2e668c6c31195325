#!/usr/bin/env node
/**
 * statement-store CLI entry point
 *
 * Usage:
 *   statement-store init statements "Household cards"
 *   statement-store summary statements 12
 *
 * @module bin
 */

import { loadEnvFile } from './config.js';
import { runCli } from './cli.js';

loadEnvFile();
process.exitCode = runCli(process.argv.slice(2));
