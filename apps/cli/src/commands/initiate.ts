import { Command } from 'commander';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { requireCaller, $try } from '../helpers.js';

export function createInitiateCommand(ctx: CliContext): Command {
  return new Command('initiate')
    .alias('add')
    .description('Record your objective (one per address)')
    .argument('<description>', 'What you commit to (1-100 characters)')
    .action((description: string, _opts: unknown, cmd: Command) => $try(() => {
      const caller = requireCaller(ctx.db, cmd);
      if (caller == null) return;

      out.printResult(ctx.registry.initiate(caller, description));
    }));
}
