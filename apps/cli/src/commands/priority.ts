import { Command } from 'commander';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { requireCaller, parsePriorityArg, $try } from '../helpers.js';

export function createPriorityCommand(ctx: CliContext): Command {
  return new Command('priority')
    .description("Set your objective's priority")
    .argument('<level>', 'Priority level (high, medium, low, 1, 2, 3, p1, p2, p3)')
    .action((level: string, _opts: unknown, cmd: Command) => $try(() => {
      const caller = requireCaller(ctx.db, cmd);
      if (caller == null) return;

      const value = parsePriorityArg(level);
      if (value == null) {
        out.error(`Unknown priority level: ${level}`);
        return;
      }

      out.printResult(ctx.registry.classify(caller, value));
    }));
}
