#!/usr/bin/env tsx
import { parseArgs } from './args';
import { runCommand } from './command';
import { loadConfig } from './config';
import { describeError } from './error';

const main = async (): Promise<number> => {
  const args = parseArgs();
  const config = await loadConfig(args.configPath);
  return await runCommand(args, config);
};

try {
  process.exitCode = await main();
} catch (e) {
  console.log();
  console.log(`Failed: ${describeError(e)} ❌`);
  process.exitCode = 1;
}
