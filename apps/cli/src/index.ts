#!/usr/bin/env node

/**
 * libforge CLI
 *
 * Commands:
 *   libforge build      Local pipeline (default)
 *   libforge doctor     Check toolchains and environment
 *   libforge matrix     Per-platform native library builds
 *   libforge package    Release archives, optionally published
 *   libforge clean      Remove build outputs
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
