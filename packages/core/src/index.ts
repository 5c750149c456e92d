/**
 * @libforge/core - Build and release orchestration for the native SDK libraries
 *
 * This module provides:
 * - Pipeline: the local verify → sync → build → collect → bind → test run
 * - Matrix: per-platform cells with placeholder fallback
 * - Release: deterministic archives and the publisher contract
 * - Config, errors and the structured logger shared by every component
 */

// Reliability
export * from './reliability/errors.js';

// Telemetry
export * from './telemetry/logger.js';

// Configuration
export * from './config/index.js';

// Process execution
export * from './process/command-runner.js';

// Pipeline
export * from './pipeline/types.js';
export * from './pipeline/state-machine.js';
export * from './pipeline/step-runner.js';
export * from './pipeline/pipeline.js';

// Stages
export * from './stages/dependency-verifier.js';
export * from './stages/dependency-synchronizer.js';
export * from './stages/managed-build.js';
export * from './stages/proto-sync.js';
export * from './stages/systems-build.js';
export * from './stages/test-stage.js';

// Artifacts
export * from './artifacts/classify.js';
export * from './artifacts/collector.js';

// Platform matrix
export * from './platform/targets.js';
export * from './matrix/cell.js';
export * from './matrix/coordinator.js';

// Release
export * from './release/archive.js';
export * from './release/packager.js';
export * from './release/publisher.js';

// Clean
export * from './clean/index.js';
