#!/usr/bin/env node
/**
 * dagligvare-scraper entry point.
 */

// Load environment variables from .env file
import dotenv from 'dotenv';
dotenv.config();

import { runCli } from './cli.js';

async function main() {
  const code = await runCli(process.argv.slice(2));
  process.exit(code);
}

main().catch((error) => {
  console.error("Fatal error in main execution:", error);
  process.exit(1);
});
