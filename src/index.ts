#!/usr/bin/env node
/**
 * PR Comment Collector entry point
 */

import { runCli } from './cli.js';

// exitCode rather than exit(): "serve" keeps the stdio transport open
process.exitCode = await runCli(process.argv.slice(2));
