/**
 * Error taxonomy tests
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  FatalStepError,
  ForgeError,
  InterruptedError,
  ToolMissingError,
  toExitCode,
  VersionTooLowError,
  wrapError,
} from '../errors.js';

describe('ForgeError', () => {
  it('carries code, context and cause', () => {
    const cause = new Error('disk full');
    const error = new ForgeError('Copy failed', { code: 'STEP_FAILED', context: { file: 'a.dll' }, cause });

    expect(error.code).toBe('STEP_FAILED');
    expect(error.context).toEqual({ file: 'a.dll' });
    expect(error.cause).toBe(cause);
    expect(error.timestamp).toBeInstanceOf(Date);
  });

  it('serializes for logging', () => {
    const error = new ForgeError('Copy failed', { code: 'STEP_FAILED', cause: new Error('disk full') });
    expect(error.toJSON()).toMatchObject({
      name: 'ForgeError',
      code: 'STEP_FAILED',
      message: 'Copy failed',
      cause: 'disk full',
    });
  });
});

describe('specific errors', () => {
  it('names the missing tool', () => {
    const error = new ToolMissingError('cargo');
    expect(error.message).toBe('cargo is not installed or not in PATH');
    expect(error.code).toBe('TOOL_MISSING');
    expect(error.context).toEqual({ tool: 'cargo' });
  });

  it('reports the found and required version', () => {
    const error = new VersionTooLowError('dotnet', '8.9.100', 89, 90);
    expect(error.message).toBe('dotnet version is 8.9.100 (89), which is below the required 90');
  });

  it('formats fatal step failures with and without an exit code', () => {
    expect(new FatalStepError('WORKSPACE_BUILD_FAILED', 'Building workspace', 101).message).toBe(
      'Failed: Building workspace (exit code: 101)'
    );
    expect(new FatalStepError('STEP_FAILED', 'Publishing', null).message).toBe('Failed: Publishing');
  });

  it('defaults interrupts to SIGINT', () => {
    expect(new InterruptedError().message).toBe('Build interrupted by SIGINT');
    expect(new InterruptedError('SIGTERM').signal).toBe('SIGTERM');
  });
});

describe('toExitCode', () => {
  it('maps each error class to its exit code', () => {
    expect(toExitCode(new ToolMissingError('dotnet'))).toBe(20);
    expect(toExitCode(new VersionTooLowError('dotnet', '8.0', 80, 90))).toBe(21);
    expect(toExitCode(new ForgeError('x', { code: 'VERSION_UNPARSEABLE' }))).toBe(22);
    expect(toExitCode(new ForgeError('x', { code: 'PROJECT_DIRECTORY_MISSING' }))).toBe(30);
    expect(toExitCode(new FatalStepError('MANAGED_BUILD_FAILED', 'Building Proton.SDK', 1))).toBe(31);
    expect(toExitCode(new ForgeError('x', { code: 'NO_ARTIFACTS_FOUND' }))).toBe(32);
    expect(toExitCode(new FatalStepError('WORKSPACE_BUILD_FAILED', 'Building workspace', 101))).toBe(33);
    expect(toExitCode(new ForgeError('x', { code: 'MATRIX_CELL_CRITICAL' }))).toBe(40);
    expect(toExitCode(new ForgeError('x', { code: 'RELEASE_DIRECTORY_MISSING' }))).toBe(41);
    expect(toExitCode(new ForgeError('x', { code: 'PUBLISH_FAILED' }))).toBe(42);
    expect(toExitCode(new ConfigurationError('bad'))).toBe(50);
    expect(toExitCode(new InterruptedError())).toBe(130);
  });

  it('returns 1 for anything else', () => {
    expect(toExitCode(new Error('plain'))).toBe(1);
    expect(toExitCode('string')).toBe(1);
    expect(toExitCode(new ForgeError('x', { code: 'UNHANDLED_ERROR' }))).toBe(1);
  });
});

describe('wrapError', () => {
  it('returns forge errors unchanged', () => {
    const error = new ConfigurationError('bad');
    expect(wrapError(error)).toBe(error);
  });

  it('wraps plain errors as unhandled', () => {
    const cause = new Error('boom');
    const wrapped = wrapError(cause);
    expect(wrapped.code).toBe('UNHANDLED_ERROR');
    expect(wrapped.message).toBe('boom');
    expect(wrapped.cause).toBe(cause);
  });

  it('applies defaults', () => {
    const wrapped = wrapError('nope', { code: 'PUBLISH_FAILED', context: { tag: 'v1' } });
    expect(wrapped.code).toBe('PUBLISH_FAILED');
    expect(wrapped.message).toBe('nope');
    expect(wrapped.context).toEqual({ tag: 'v1' });
  });
});
