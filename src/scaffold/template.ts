/**
 * Placeholder substitution for boilerplate templates.
 *
 * Placeholders are written `<<name>>` so they never collide with Django's
 * own `{{ }}` and `{% %}` template syntax.
 */

import { TemplateError } from '../core/index.js';

export type TemplateVars = Record<string, string>;

const PLACEHOLDER = /<<\s*([A-Za-z][A-Za-z0-9]*)\s*>>/g;

export function renderText(source: string, vars: TemplateVars, templateName: string = 'template'): string {
  return source.replace(PLACEHOLDER, (_match, name: string) => {
    if (!Object.hasOwn(vars, name)) {
      throw new TemplateError(`Unknown placeholder <<${name}>> in ${templateName}`);
    }
    return vars[name];
  });
}
