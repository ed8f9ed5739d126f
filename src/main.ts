/**
 * Process entry point. Run with: npx tsx src/main.ts [options]
 */

import { config } from 'dotenv';
config();

import { runCli } from './cli';

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
