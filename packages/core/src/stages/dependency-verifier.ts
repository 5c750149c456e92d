/**
 * Dependency Verifier
 *
 * Entry gate of the pipeline. Probes each required toolchain through its
 * version command and enforces the minimum managed-runtime version.
 * Any failure here is fatal.
 *
 * @module @libforge/core/stages/dependency-verifier
 */

import type { ToolProbe } from '../config/index.js';
import { succeeded } from '../process/command-runner.js';
import {
  ForgeError,
  InterruptedError,
  ToolMissingError,
  VersionTooLowError,
} from '../reliability/errors.js';
import { inProcessResult, interruptSignal } from '../pipeline/step-runner.js';
import type { PipelineStage, Result, StageContext, StageReport } from '../pipeline/types.js';

export const VERIFY_STEP_NAME = 'Checking dependencies';

export interface ToolVersion {
  tool: string;
  /** Version string as reported, e.g. "9.0.100" */
  raw: string;
  /** `major * 10 + minor`, for gated tools */
  value?: number;
}

export type ToolVersions = Record<string, ToolVersion>;

/**
 * Extract `major.minor` from version output such as "9.0.100" or "cargo 1.80.0 (...)"
 */
export function parseVersion(output: string): { major: number; minor: number; text: string } | undefined {
  const match = /(\d+)\.(\d+)[^\s]*/.exec(output);
  if (!match) return undefined;
  return { major: Number(match[1]), minor: Number(match[2]), text: match[0] };
}

export function versionValue(major: number, minor: number): number {
  return major * 10 + minor;
}

export class DependencyVerifier implements PipelineStage {
  readonly state = 'checking_deps';
  private readonly probes: ToolProbe[];

  constructor(
    private readonly ctx: StageContext,
    probes?: ToolProbe[]
  ) {
    const { toolchain } = ctx.config;
    this.probes = probes ?? [toolchain.managedRuntime, toolchain.systems];
  }

  async verify(): Promise<Result<ToolVersions, ForgeError>> {
    const versions: ToolVersions = {};

    for (const probe of this.probes) {
      const checked = await this.probe(probe);
      if (!checked.ok) {
        this.ctx.logger.error(checked.error.message, checked.error, { tool: probe.name });
        return checked;
      }
      versions[probe.name] = checked.value;
      this.ctx.logger.info(`${probe.name} ${checked.value.raw} found`, { tool: probe.name });
    }

    return { ok: true, value: versions };
  }

  async execute(): Promise<StageReport> {
    const startedAt = Date.now();
    this.ctx.logger.stepStart(VERIFY_STEP_NAME);
    const verified = await this.verify();
    const result = inProcessResult(VERIFY_STEP_NAME, startedAt, verified.ok ? undefined : verified.error);
    this.ctx.logger.stepEnd(VERIFY_STEP_NAME, verified.ok ? 'success' : 'fatal', result.durationMs);
    return { results: [result] };
  }

  private async probe(probe: ToolProbe): Promise<Result<ToolVersion, ForgeError>> {
    const output = await this.ctx.runner.run(
      { command: probe.command, args: probe.versionArgs, cwd: this.ctx.config.rootDir },
      { signal: this.ctx.signal, quiet: true }
    );

    if (output.interrupted) {
      return { ok: false, error: new InterruptedError(interruptSignal(this.ctx.signal)) };
    }

    if (!succeeded(output)) {
      return {
        ok: false,
        error: new ToolMissingError(probe.name, {
          cause: output.spawnError,
          context: { exitCode: output.exitCode },
        }),
      };
    }

    const firstLine = output.stdout.trim().split('\n')[0] ?? '';

    if (probe.minimumVersion === undefined) {
      return { ok: true, value: { tool: probe.name, raw: firstLine } };
    }

    const parsed = parseVersion(firstLine);
    if (!parsed) {
      return {
        ok: false,
        error: new ForgeError(`Could not parse ${probe.name} version from "${firstLine}"`, {
          code: 'VERSION_UNPARSEABLE',
          context: { tool: probe.name, output: firstLine },
        }),
      };
    }

    const value = versionValue(parsed.major, parsed.minor);
    if (value < probe.minimumVersion) {
      return {
        ok: false,
        error: new VersionTooLowError(probe.name, parsed.text, value, probe.minimumVersion),
      };
    }

    return { ok: true, value: { tool: probe.name, raw: parsed.text, value } };
  }
}
