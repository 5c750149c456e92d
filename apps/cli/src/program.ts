/**
 * Command tree
 *
 * @module @libforge/cli/program
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigurationError, toExitCode, wrapError } from '@libforge/core';
import { createCliContext, interruptOnSignals, type CliContext, type GlobalOptions } from './context.js';
import { buildCommand } from './commands/build.js';
import { doctorCommand } from './commands/doctor.js';
import { matrixCommand, type MatrixCommandOptions } from './commands/matrix.js';
import { packageCommand, type PackageCommandOptions } from './commands/package.js';
import { cleanCommand } from './commands/clean.js';

/**
 * Print an error the way every command reports it and return its exit code
 */
export function reportError(error: unknown): number {
  const wrapped = wrapError(error);
  console.error(chalk.red('Error:'), wrapped.message);
  if (wrapped instanceof ConfigurationError && wrapped.fieldErrors) {
    for (const [field, message] of Object.entries(wrapped.fieldErrors)) {
      console.error(chalk.dim(`  ${field}: ${message}`));
    }
  }
  return toExitCode(wrapped);
}

/**
 * Run one command with interrupt handling; sets process.exitCode
 */
async function execute(command: Command, run: (ctx: CliContext) => Promise<number>): Promise<void> {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const interrupt = interruptOnSignals();
  let exitCode: number;

  try {
    exitCode = await run(createCliContext(globals, interrupt.signal));
  } catch (error) {
    exitCode = reportError(error);
  } finally {
    interrupt.dispose();
  }

  process.exitCode = exitCode;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('libforge')
    .description('Build, cross-compile and release the native SDK libraries')
    .version('0.1.0')
    .option('--root <dir>', 'Project root (default: current directory)')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Show debug output');

  program
    .command('build', { isDefault: true })
    .description('Verify toolchains, build the SDK, collect native libraries, build bindings and run tests')
    .action(async (_options: object, command: Command) => {
      await execute(command, buildCommand);
    });

  program
    .command('doctor')
    .description('Check the environment for building and releasing')
    .action(async (_options: object, command: Command) => {
      await execute(command, doctorCommand);
    });

  program
    .command('matrix')
    .description('Build the native library for each platform target')
    .option('-t, --target <rid...>', 'Runtime identifiers to build (default: all)')
    .option('--host', 'Build only the target matching this machine')
    .option('-x, --exclude <step...>', 'Cell steps to skip: clone, crypto, sdk, dll')
    .option('-p, --max-parallel <n>', 'Cells to run at once')
    .action(async (options: MatrixCommandOptions, command: Command) => {
      await execute(command, (ctx) => matrixCommand(ctx, options));
    });

  program
    .command('package')
    .description('Archive platform outputs into release assets')
    .option('--tag <tag>', 'Release tag (default: from GITHUB_REF)')
    .option('--notes <file>', 'Release notes file')
    .option('--publish', 'Create the GitHub release and upload the assets')
    .action(async (options: PackageCommandOptions, command: Command) => {
      await execute(command, (ctx) => packageCommand(ctx, options));
    });

  program
    .command('clean')
    .description('Remove build outputs and release archives')
    .action(async (_options: object, command: Command) => {
      await execute(command, cleanCommand);
    });

  program.addHelpText(
    'after',
    `
Exit codes:
  0    Success (advisory warnings do not change this)
  20   Required tool missing          21  Managed runtime too old
  22   Unparseable runtime version
  30   SDK directory missing          31  Managed build failed
  32   No native libraries found      33  Workspace build failed
  34   Other fatal step failed
  40   Matrix cell critical           41  Release directory missing
  42   Publishing failed              50  Configuration error
  130  Interrupted

Environment:
  LIBFORGE_SDK_DIR, LIBFORGE_OUTPUT_DIR, LIBFORGE_LOG_LEVEL,
  LIBFORGE_MAX_PARALLEL_CELLS    Override config values
  GITHUB_TOKEN                   Token for package --publish
  GITHUB_REPOSITORY, GITHUB_REF  Release repository and tag ref
`
  );

  return program;
}
