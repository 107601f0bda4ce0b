import type { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { readStdin } from '../stdin.js';
import { loadConfig } from '../../shared/config.js';
import { createConsoleLogger, isLogLevel } from '../../shared/logger.js';
import { parseScenario, runScenario } from '../scenario.js';

export function registerRun(program: Command): void {
  program
    .command('run')
    .description('Replay a panel scenario against in-memory hosts and print the trace')
    .argument('[scenario]', 'Path to a scenario JSON file (reads stdin if omitted)')
    .option('-l, --log-level <level>', 'silent, error, warn, info or debug')
    .action(async (file: string | undefined, opts: { logLevel?: string }) => {
      const text = file ? readFileSync(resolve(file), 'utf-8') : await readStdin();
      if (!text) {
        console.error('Error: provide a scenario file or pipe one on stdin');
        process.exit(1);
      }

      const config = loadConfig(process.cwd());
      const level = isLogLevel(opts.logLevel) ? opts.logLevel : config.logLevel;
      const lines = runScenario(parseScenario(text), {
        logger: createConsoleLogger(level),
        dedupeSubscribers: config.dedupeSubscribers,
      });
      for (const line of lines) {
        console.log(line);
      }
    });
}
