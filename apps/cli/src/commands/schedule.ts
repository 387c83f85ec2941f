import { Command } from 'commander';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { requireCaller, parseOffsetArg, $try } from '../helpers.js';

export function createScheduleCommand(ctx: CliContext): Command {
  return new Command('schedule')
    .description('Set a deadline a number of blocks from the current block')
    .argument('<offset>', 'Blocks from now (12 or +12)')
    .action((offsetArg: string, _opts: unknown, cmd: Command) => $try(() => {
      const caller = requireCaller(ctx.db, cmd);
      if (caller == null) return;

      const offset = parseOffsetArg(offsetArg);
      if (offset == null) {
        out.error(`Could not parse offset: ${offsetArg}`);
        return;
      }

      out.printResult(ctx.registry.schedule(caller, offset));
    }));
}
