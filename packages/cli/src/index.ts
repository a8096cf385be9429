#!/usr/bin/env tsx
import chalk from 'chalk';
import { runCli } from './commands';

async function main(): Promise<number> {
  const result = await runCli(process.argv.slice(2), { env: process.env });

  if (result.stdout) {
    process.stdout.write(`${result.stdout}\n`);
  }
  if (result.stderr) {
    const color = result.exitCode === 0 ? chalk.gray : chalk.red;
    process.stderr.write(`${color(result.stderr)}\n`);
  }
  return result.exitCode;
}

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((err: unknown) => {
    console.error(chalk.red(err instanceof Error ? err.message : String(err)));
    process.exitCode = 1;
  });
