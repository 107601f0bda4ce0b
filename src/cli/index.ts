import { Command } from 'commander';
import { registerRun } from './commands/run.js';
import { registerKey } from './commands/key.js';

const program = new Command();

program
  .name('paneldeck')
  .description('Panel registry and lifecycle controller')
  .version('0.1.0');

registerRun(program);
registerKey(program);

program.parseAsync(process.argv).catch((err: Error) => {
  console.error(err.message);
  process.exit(1);
});
