/**
 * libforge clean
 */

import { clean } from '@libforge/core';
import type { CliContext } from '../context.js';

export async function cleanCommand(ctx: CliContext): Promise<number> {
  const report = await clean(ctx);

  if (ctx.json) {
    console.log(JSON.stringify(report, null, 2));
  }

  // Cleaning failures are warnings only
  return 0;
}
