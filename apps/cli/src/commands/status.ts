import { Command } from 'commander';
import { getRecordSet } from '@pledge/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { requireCaller, $try } from '../helpers.js';

export function createStatusCommand(ctx: CliContext): Command {
  return new Command('status')
    .description('Show your objective, priority and deadline')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const caller = requireCaller(ctx.db, cmd);
      if (caller == null) return;

      const status = ctx.registry.inspect(caller);
      const { objective, priority, deadline } = getRecordSet(ctx.store, caller);
      const current = ctx.counter.current();

      if (!status.present || !objective) {
        out.info(`No objective recorded for ${caller}`);
        if (priority) out.warning(`Orphaned priority: ${out.formatPriorityName(priority.urgency)}`);
        if (deadline) out.warning(`Orphaned deadline: block ${deadline.targetPoint}`);
        return;
      }

      out.info(`${out.formatCheckbox(status.completed)} ${out.formatPriority(priority?.urgency ?? null)} ${objective.description}${out.formatDeadline(deadline, current, status.completed)}`);
      out.info(`  ${out.plural(status.descriptionLength, 'character')}, current block ${current}`);
    }));
}
