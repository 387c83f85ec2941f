import { Command } from 'commander';
import { getObjective } from '@pledge/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { requireCaller, parseCompletedArg, $try } from '../helpers.js';

export function createModifyCommand(ctx: CliContext): Command {
  return new Command('modify')
    .description('Replace your objective and its completion state')
    .argument('<description>', 'New description (1-100 characters)')
    .argument('<completed>', 'Completion state (true/false, yes/no, done/pending)')
    .action((description: string, completedArg: string, _opts: unknown, cmd: Command) => $try(() => {
      const caller = requireCaller(ctx.db, cmd);
      if (caller == null) return;

      const completed = parseCompletedArg(completedArg);
      if (completed == null) {
        out.error(`Could not parse completion state: ${completedArg}`);
        return;
      }

      out.printResult(ctx.registry.modify(caller, description, completed));
    }));
}

/** check/uncheck keep the stored description and only flip the flag */
function createCompletionCommand(ctx: CliContext, name: string, completed: boolean): Command {
  return new Command(name)
    .description(completed ? 'Mark your objective as completed' : 'Mark your objective as not completed')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const caller = requireCaller(ctx.db, cmd);
      if (caller == null) return;

      const objective = getObjective(ctx.store, caller);
      if (!objective) {
        out.printResult({ type: 'not-found', address: caller });
        return;
      }
      if (objective.completed === completed) {
        out.info(completed ? 'Objective is already completed' : 'Objective is already open');
        return;
      }

      out.printResult(ctx.registry.modify(caller, objective.description, completed));
    }));
}

export function createCheckCommand(ctx: CliContext): Command {
  return createCompletionCommand(ctx, 'check', true);
}

export function createUncheckCommand(ctx: CliContext): Command {
  return createCompletionCommand(ctx, 'uncheck', false);
}
