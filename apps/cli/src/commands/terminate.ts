import { Command } from 'commander';
import { getPriority, getDeadline } from '@pledge/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { requireCaller, $try } from '../helpers.js';

export function createTerminateCommand(ctx: CliContext): Command {
  return new Command('terminate')
    .alias('delete')
    .description('Remove your objective')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const caller = requireCaller(ctx.db, cmd);
      if (caller == null) return;

      const result = ctx.registry.terminate(caller);
      out.printResult(result);

      if (result.type === 'success' && (getPriority(ctx.store, caller) || getDeadline(ctx.store, caller))) {
        out.warning('Priority and deadline records are kept and will apply to your next objective');
      }
    }));
}
