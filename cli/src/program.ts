import { Command } from 'commander';
import { registerClassifyCommand } from './commands/classify.js';
import { registerRunCommand } from './commands/run.js';
import { registerValidateCommand } from './commands/validate.js';
import { processIO, type CliIO } from './utils/io.js';

export const CLI_VERSION = '0.1.0';

export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  program
    .name('gridplan')
    .description('Run structured plans for operational scenarios')
    .version(CLI_VERSION, '-v, --version', 'Show version number')
    .helpOption('-h, --help', 'Show help');

  registerValidateCommand(program, io);
  registerClassifyCommand(program, io);
  registerRunCommand(program, io);

  return program;
}
