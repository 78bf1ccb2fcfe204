/**
 * Guide Command
 * Writes the application development guide
 */

import * as path from 'path';
import { writeFileSafe } from '../core/index.js';
import { TemplateRenderer } from '../scaffold/index.js';
import type { CommandContext } from './context.js';

export const DEFAULT_GUIDE_OUTPUT = 'app_development_guide.md';

export async function writeDevelopmentGuide(ctx: CommandContext, output: string = DEFAULT_GUIDE_OUTPUT): Promise<string> {
  const target = path.resolve(ctx.cwd, output);
  const renderer = new TemplateRenderer(ctx.config, ctx.log);
  await writeFileSafe(target, await renderer.renderDevelopmentGuide());
  ctx.log.success(`Development guide written to ${target}`);
  return target;
}
