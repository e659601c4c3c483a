#!/usr/bin/env node

/**
 * enumkit CLI -- generate and expand enum reflection
 *
 * Usage:
 *   enumkit generate <spec.json> [--out file] [--verbose]
 *   enumkit expand <file.ts> [--verbose]
 */

import { runCli } from "./commands.js";

process.exitCode = runCli(process.argv.slice(2));
