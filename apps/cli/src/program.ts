import { Command } from 'commander';
import type { CliContext } from './context.js';

import { createInitiateCommand } from './commands/initiate.js';
import { createModifyCommand, createCheckCommand, createUncheckCommand } from './commands/modify.js';
import { createTerminateCommand } from './commands/terminate.js';
import { createPriorityCommand } from './commands/priority.js';
import { createScheduleCommand } from './commands/schedule.js';
import { createDelegateCommand } from './commands/delegate.js';
import { createStatusCommand } from './commands/status.js';
import { createWhoamiCommand } from './commands/whoami.js';
import { createBlockCommand } from './commands/block.js';
import { createSystemCommand } from './commands/system.js';

/** Build the CLI program around an already-open context */
export function createProgram(ctx: CliContext): Command {
  const program = new Command()
    .name('pledge')
    .description('Personal commitment registry')
    .version('1.0.0')
    .option('--as <address>', 'Act as this address (overrides PLEDGE_ADDRESS and the default)')
    .showHelpAfterError();

  program.addCommand(createInitiateCommand(ctx));
  program.addCommand(createModifyCommand(ctx));
  program.addCommand(createCheckCommand(ctx));
  program.addCommand(createUncheckCommand(ctx));
  program.addCommand(createTerminateCommand(ctx));
  program.addCommand(createPriorityCommand(ctx));
  program.addCommand(createScheduleCommand(ctx));
  program.addCommand(createDelegateCommand(ctx));
  program.addCommand(createStatusCommand(ctx));
  program.addCommand(createWhoamiCommand(ctx));
  program.addCommand(createBlockCommand(ctx));
  program.addCommand(createSystemCommand(ctx));

  return program;
}
