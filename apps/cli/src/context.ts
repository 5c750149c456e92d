/**
 * CLI context
 *
 * Builds the config, logger, command runner and interrupt signal every
 * command runs with.
 *
 * @module @libforge/cli/context
 */

import chalk from 'chalk';
import {
  createLogger,
  loadConfig,
  NodeCommandRunner,
  type ForgeConfig,
  type LogEntry,
  type LogSink,
  type StageContext,
} from '@libforge/core';

/**
 * Options shared by every command
 */
export interface GlobalOptions {
  root?: string;
  json?: boolean;
  verbose?: boolean;
}

export interface CliContext extends StageContext {
  json: boolean;
  verbose: boolean;
}

/**
 * Human-readable console sink: ✓ for notices, ! for warnings, ✗ for errors
 */
export function consoleSink(options: { verbose?: boolean } = {}): LogSink {
  return (entry: LogEntry) => {
    const message = entry.eventName === 'step.start' ? chalk.bold(`→ ${entry.message}`) : entry.message;

    switch (entry.severity) {
      case 'DEBUG':
        console.log(chalk.dim(`  ${message}`));
        break;
      case 'INFO':
        console.log(`  ${message}`);
        break;
      case 'NOTICE':
        console.log(`${chalk.green('✓')} ${message}`);
        break;
      case 'WARNING':
        console.log(`${chalk.yellow('!')} ${message}`);
        if (typeof entry.reason === 'string') {
          console.log(chalk.dim(`    ${entry.reason}`));
        }
        break;
      case 'ERROR':
      case 'CRITICAL':
        console.error(`${chalk.red('✗')} ${message}`);
        if (options.verbose && entry.error?.stack) {
          console.error(chalk.dim(entry.error.stack));
        }
        break;
    }
  };
}

/**
 * JSON lines on stderr, leaving stdout for the command's report
 */
export const jsonSink: LogSink = (entry) => {
  console.error(JSON.stringify(entry));
};

/**
 * Build the context for one command invocation
 */
export function createCliContext(globals: GlobalOptions, signal?: AbortSignal): CliContext {
  const config: ForgeConfig = loadConfig({ rootDir: globals.root });
  const json = globals.json ?? false;
  const verbose = globals.verbose ?? false;

  const logger = createLogger('libforge', {
    minSeverity: verbose ? 'DEBUG' : config.logLevel,
    sink: json ? jsonSink : consoleSink({ verbose }),
  });

  const runner = new NodeCommandRunner({
    onOutput: json
      ? undefined
      : (chunk, stream) => {
          (stream === 'stdout' ? process.stdout : process.stderr).write(chunk);
        },
  });

  return { config, logger, runner, signal, json, verbose };
}

/**
 * Turn SIGINT/SIGTERM into an aborted signal; a second interrupt exits at once
 */
export function interruptOnSignals(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();

  const onSignal = (name: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    controller.abort(name);
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    },
  };
}
