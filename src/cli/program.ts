import { Command } from 'commander';
import { emitCommand } from './commands/emit.js';
import { levelsCommand } from './commands/levels.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('logfacade')
    .description('Inspect and exercise the shared logger')
    .version('1.0.0');

  program
    .command('levels')
    .description('List every valid log level, most severe first')
    .action(levelsCommand);

  program
    .command('emit')
    .description('Log a message through the shared logger')
    .argument('<level>', 'Level to log at (fatal, error, warn, info, debug, trace)')
    .argument('<message...>', 'Message text')
    .option('-l, --log-level <level>', 'Minimum level to emit')
    .option('-c, --sub-command <tag>', 'Sub-command label to prefix the line with')
    .action(emitCommand);

  return program;
}
