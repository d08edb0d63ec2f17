/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { createDecideCommand } from './commands/decide.js';
import { createValidateCommand } from './commands/validate.js';
import { createPathCommand } from './commands/path.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Ranked, explainable action decisions from rules over a knowledge graph')
    .option('-v, --verbose', 'Pretty debug logs on stderr')
    .option('-d, --dir <directory>', 'Project directory holding .decision-copilot.yaml', '.');

  program.addCommand(createDecideCommand());
  program.addCommand(createValidateCommand());
  program.addCommand(createPathCommand());

  return program;
}

export async function main(argv: readonly string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`\nError: ${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    } else {
      console.error(`\nError: ${String(error)}\n`);
    }
    process.exit(1);
  }
}
