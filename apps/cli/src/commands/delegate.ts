import { Command } from 'commander';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { requireCaller, isValidAddress, $try } from '../helpers.js';

export function createDelegateCommand(ctx: CliContext): Command {
  return new Command('delegate')
    .description('Record an objective for another address that has none')
    .argument('<address>', 'The address to record the objective for')
    .argument('<description>', 'What they commit to (1-100 characters)')
    .action((target: string, description: string, _opts: unknown, cmd: Command) => $try(() => {
      const caller = requireCaller(ctx.db, cmd);
      if (caller == null) return;

      if (!isValidAddress(target)) {
        out.error(`Invalid address '${target}'`);
        return;
      }

      out.printResult(ctx.registry.delegate(caller, target, description));
    }));
}
