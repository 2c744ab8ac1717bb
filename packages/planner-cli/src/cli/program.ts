/**
 * commander program for the planner
 */

import { Command, CommanderError } from 'commander';
import type { ZodType } from 'zod';
import { analyzeFlags, globalFlags, planFlags, showFlags, type FlagSet } from '@commit-planner/contracts';
import { EXIT_INVALID_PARAMETERS } from '@commit-planner/core';
import { runAnalyze, runPlan, runReset, runShow } from './commands';
import type { CommandContext } from './context';
import { AnalyzeOptionsSchema, GlobalOptionsSchema, PlanOptionsSchema, ShowOptionsSchema } from './options';

const HELP_CODES = new Set(['commander.helpDisplayed', 'commander.version']);

/**
 * Register flag definitions as commander options. Values stay strings;
 * the command parses them.
 */
export function addFlags(command: Command, flags: FlagSet): Command {
  for (const [name, flag] of Object.entries(flags)) {
    const short = flag.alias ? `-${flag.alias}, ` : '';
    const value = flag.type === 'boolean' ? '' : ` <${flag.argName ?? 'value'}>`;
    const description = flag.choices ? `${flag.description} (${flag.choices.join(', ')})` : flag.description;
    command.option(`${short}--${name}${value}`, description);
  }
  return command;
}

/**
 * Build the program. Each action stores its exit code through `onExit`.
 */
export function createProgram(context: CommandContext, onExit: (code: number) => void): Command {
  const program = addFlags(
    new Command('commit-planner')
      .description('Plan atomic, dependency-ordered commits from working tree changes')
      .version('0.1.0'),
    globalFlags
  );

  // Set before the subcommands are added so they inherit it
  program.exitOverride();
  program.configureOutput({
    writeOut: (text) => context.write(text),
    writeErr: (text) => context.createLogger(false).error(text.trimEnd()),
  });

  const action =
    <T>(schema: ZodType<T>, run: (context: CommandContext, options: T) => Promise<number>) =>
    async (_options: unknown, command: Command): Promise<void> => {
      onExit(await run(context, schema.parse(command.optsWithGlobals())));
    };

  addFlags(program.command('analyze').description('Classify changes and report whether to split them'), analyzeFlags)
    .action(action(AnalyzeOptionsSchema, runAnalyze));

  addFlags(program.command('plan').description('Build an ordered commit plan'), planFlags)
    .action(action(PlanOptionsSchema, runPlan));

  addFlags(program.command('show').description('Render the saved plan'), showFlags)
    .action(action(ShowOptionsSchema, runShow));

  program
    .command('reset')
    .description('Delete the saved plan')
    .action(action(GlobalOptionsSchema, runReset));

  return program;
}

/**
 * Parse `argv` (as in process.argv) and run the selected command
 *
 * @returns Process exit code
 */
export async function runCli(argv: readonly string[], context: CommandContext): Promise<number> {
  let exitCode = 0;
  const program = createProgram(context, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      return HELP_CODES.has(error.code) ? 0 : EXIT_INVALID_PARAMETERS;
    }
    throw error;
  }
  return exitCode;
}
