/**
 * knit CLI - check and convert knit configuration files
 */

import { Command } from 'commander';
import { checkCommand } from './commands/check.js';
import { fromJsonCommand, printCommand, toJsonCommand } from './commands/convert.js';

const program = new Command();

program
  .name('knit')
  .description('Check and convert knit configuration files')
  .version('0.1.0');

// Register commands
program.addCommand(checkCommand);
program.addCommand(printCommand);
program.addCommand(toJsonCommand);
program.addCommand(fromJsonCommand);

// Parse arguments
program.parse();
