import { Command } from 'commander';
import {
  CounterSource, isCounterSource, getCounterSource, switchCounterSource, createLedgerCounter,
} from '@pledge/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { parseCountArg, $try } from '../helpers.js';

export function createBlockCommand(ctx: CliContext): Command {
  const blockCommand = new Command('block')
    .description('Inspect and control the block counter used for deadlines');

  blockCommand.addCommand(
    new Command('show')
      .description('Show the current block')
      .action(() => $try(() => {
        out.info(`Current block: ${ctx.counter.current()} (${getCounterSource(ctx.db)})`);
      })),
    { isDefault: true },
  );

  blockCommand.addCommand(
    new Command('advance')
      .description('Advance the ledger counter')
      .argument('[count]', 'Number of blocks', '1')
      .action((countArg: string) => $try(() => {
        if (getCounterSource(ctx.db) !== CounterSource.Ledger) {
          out.error('Only the ledger counter can be advanced');
          return;
        }

        const count = parseCountArg(countArg);
        if (count == null) {
          out.error(`Could not parse block count: ${countArg}`);
          return;
        }

        const height = createLedgerCounter(ctx.db).advance(count);
        out.success(`Advanced to block ${height}`);
      })),
  );

  blockCommand.addCommand(
    new Command('source')
      .description('Show or set the counter source (ledger or clock)')
      .argument('[source]', 'ledger or clock')
      .action((source: string | undefined) => $try(() => {
        if (source === undefined) {
          out.info(getCounterSource(ctx.db));
          return;
        }
        if (!isCounterSource(source)) {
          out.error(`Unknown counter source: ${source}`);
          return;
        }

        const height = switchCounterSource(ctx.db, source, ctx.clock);
        out.success(`Counter source set to ${source} (block ${height})`);
      })),
  );

  return blockCommand;
}
