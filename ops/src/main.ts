#!/usr/bin/env node
/**
 * main.ts - funcdeploy entry point
 *
 * Usage: npx tsx ops/src/main.ts <resourceGroup> <functionAppName>
 */

import { runCli } from "./cli.js";

const args = process.argv.slice(2);
void runCli(args).then(code => process.exit(code));
