import { Command } from 'commander';
import chalk from 'chalk';
import { getStats, getOrphans, getCounterSource } from '@pledge/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createSystemCommand(ctx: CliContext): Command {
  const systemCommand = new Command('system')
    .description('System information and diagnostics');

  systemCommand.addCommand(
    new Command('status')
      .description('Show record counts across all addresses and list orphaned records')
      .action(() => $try(() => {
        const stats = getStats(ctx.store);

        console.log(chalk.bold.underline('Records'));
        console.log();
        console.log(`  Objectives: ${chalk.bold(String(stats.objectives))} (${chalk.green(`${stats.completed} completed`)})`);
        console.log(`  Priorities: ${chalk.bold(String(stats.priorities))}`);
        console.log(`  Deadlines: ${chalk.bold(String(stats.deadlines))}`);
        console.log(`  Block: ${chalk.bold(String(ctx.counter.current()))} (${getCounterSource(ctx.db)})`);

        const orphans = getOrphans(ctx.store);
        if (orphans.priorities.length === 0 && orphans.deadlines.length === 0) return;

        console.log();
        console.log(chalk.bold.underline('Orphans'));
        console.log();
        for (const address of orphans.priorities) out.warning(`  priority: ${address}`);
        for (const address of orphans.deadlines) out.warning(`  deadline: ${address}`);
      })),
  );

  return systemCommand;
}
