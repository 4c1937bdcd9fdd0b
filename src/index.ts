#!/usr/bin/env node

/**
 * CLI entry point
 */

import 'dotenv/config';
import { hideBin } from 'yargs/helpers';
import { runCli } from './cli.js';

process.exitCode = await runCli(hideBin(process.argv));
