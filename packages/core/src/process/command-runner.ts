/**
 * Command Runner
 *
 * The single narrow interface through which the pipeline touches external
 * toolchains: run a command, stream its output, return exit code and
 * captured text. Everything platform-specific stays behind it.
 *
 * @module @libforge/core/process
 */

import { spawn } from 'node:child_process';

/**
 * External command invocation
 */
export interface CommandSpec {
  /** Executable name or path */
  command: string;
  /** Arguments, passed without a shell */
  args: string[];
  /** Working directory override */
  cwd?: string;
  /** Extra environment merged over process.env */
  env?: Record<string, string>;
}

/**
 * Captured result of one invocation
 */
export interface CommandOutput {
  /** Exit code, or null when the process never started or died by signal */
  exitCode: number | null;
  /** Terminating signal, if any */
  signal: NodeJS.Signals | null;
  /** Captured output; long output keeps only its most recent part */
  stdout: string;
  stderr: string;
  durationMs: number;
  /** Set when the executable could not be spawned (e.g. ENOENT) */
  spawnError?: Error;
  /** Set when the run was cut short by the abort signal */
  interrupted: boolean;
}

export interface RunOptions {
  /** Aborting kills the child and resolves with interrupted = true */
  signal?: AbortSignal;
  /** Suppress live output even when the runner echoes by default */
  quiet?: boolean;
}

/**
 * Runs external commands
 */
export interface CommandRunner {
  run(spec: CommandSpec, options?: RunOptions): Promise<CommandOutput>;
}

/**
 * Receives live output chunks
 */
export type OutputListener = (chunk: string, stream: 'stdout' | 'stderr') => void;

export interface NodeCommandRunnerOptions {
  /** Live output listener; omit to capture silently */
  onOutput?: OutputListener;
  /** Signal sent to the child on abort */
  killSignal?: NodeJS.Signals;
  /** Characters of stdout and of stderr kept per run (default 64 KiB) */
  maxCaptureChars?: number;
}

const DEFAULT_MAX_CAPTURE_CHARS = 64 * 1024;

/**
 * Format a command for display
 */
export function formatCommand(spec: CommandSpec): string {
  return [spec.command, ...spec.args]
    .map((part) => (/\s/.test(part) ? `"${part}"` : part))
    .join(' ');
}

/**
 * child_process-backed runner
 */
export class NodeCommandRunner implements CommandRunner {
  private readonly onOutput?: OutputListener;
  private readonly killSignal: NodeJS.Signals;
  private readonly maxCaptureChars: number;

  constructor(options: NodeCommandRunnerOptions = {}) {
    this.onOutput = options.onOutput;
    this.killSignal = options.killSignal ?? 'SIGTERM';
    this.maxCaptureChars = options.maxCaptureChars ?? DEFAULT_MAX_CAPTURE_CHARS;
  }

  run(spec: CommandSpec, options: RunOptions = {}): Promise<CommandOutput> {
    const start = Date.now();
    const listener = options.quiet ? undefined : this.onOutput;

    return new Promise((resolve) => {
      if (options.signal?.aborted) {
        resolve({
          exitCode: null,
          signal: null,
          stdout: '',
          stderr: '',
          durationMs: 0,
          interrupted: true,
        });
        return;
      }

      const proc = spawn(spec.command, spec.args, {
        cwd: spec.cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
        env: { ...process.env, ...spec.env },
      });

      let stdout = '';
      let stderr = '';
      let interrupted = false;
      let settled = false;

      const onAbort = (): void => {
        interrupted = true;
        proc.kill(this.killSignal);
      };
      options.signal?.addEventListener('abort', onAbort, { once: true });

      const finish = (output: Omit<CommandOutput, 'stdout' | 'stderr' | 'durationMs' | 'interrupted'>): void => {
        if (settled) return;
        settled = true;
        options.signal?.removeEventListener('abort', onAbort);
        resolve({
          ...output,
          stdout,
          stderr,
          durationMs: Date.now() - start,
          interrupted,
        });
      };

      // Decoded per stream so multibyte characters split across chunks survive
      proc.stdout?.setEncoding('utf8');
      proc.stderr?.setEncoding('utf8');

      proc.stdout?.on('data', (text: string) => {
        stdout = keepTail(stdout + text, this.maxCaptureChars);
        listener?.(text, 'stdout');
      });

      proc.stderr?.on('data', (text: string) => {
        stderr = keepTail(stderr + text, this.maxCaptureChars);
        listener?.(text, 'stderr');
      });

      proc.on('close', (code, signal) => {
        finish({ exitCode: code, signal });
      });

      proc.on('error', (err) => {
        finish({ exitCode: null, signal: null, spawnError: err });
      });
    });
  }
}

/**
 * Last `limit` characters of `text`, never starting inside a surrogate pair
 */
function keepTail(text: string, limit: number): string {
  if (text.length <= limit) return text;
  const start = text.length - limit;
  const code = text.charCodeAt(start);
  return text.slice(code >= 0xdc00 && code <= 0xdfff ? start + 1 : start);
}

/**
 * True when the command ran and exited 0
 */
export function succeeded(output: CommandOutput): boolean {
  return output.exitCode === 0 && !output.spawnError && !output.interrupted;
}
