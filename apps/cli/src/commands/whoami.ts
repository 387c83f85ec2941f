import { Command } from 'commander';
import { setDefaultAddress } from '@pledge/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { resolveCaller, isValidAddress, reportInvalidAddress, $try } from '../helpers.js';

export function createWhoamiCommand(ctx: CliContext): Command {
  return new Command('whoami')
    .description('Show the acting address, or set the default one')
    .argument('[address]', 'New default address')
    .action((address: string | undefined, _opts: unknown, cmd: Command) => $try(() => {
      if (address === undefined) {
        const g = cmd.optsWithGlobals<{ as?: string }>();
        const caller = resolveCaller(ctx.db, g.as);
        if (caller == null) out.info('No address set');
        else if (!isValidAddress(caller)) reportInvalidAddress(caller);
        else out.info(caller);
        return;
      }

      if (!isValidAddress(address)) {
        reportInvalidAddress(address);
        return;
      }

      setDefaultAddress(ctx.db, address);
      out.success(`Default address set to ${address}`);
    }));
}
