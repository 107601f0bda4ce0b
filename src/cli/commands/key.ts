import type { Command } from 'commander';
import { canonicalKey } from '../../core/identity.js';

export function registerKey(program: Command): void {
  program
    .command('key')
    .description('Print the canonical key for a panel identity')
    .argument('<kind>', 'Panel kind')
    .argument('[instance-id]', 'Instance discriminator')
    .action((kind: string, instanceId?: string) => {
      console.log(canonicalKey(kind, instanceId));
    });
}
