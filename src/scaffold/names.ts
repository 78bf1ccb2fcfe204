/**
 * Application name rules
 */

import { InvalidNameError, NameConflictError } from '../core/index.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Same casing as Python's str.title(): every run of letters starts upper
 * case and continues lower case.
 * `blog_posts` -> `Blog_Posts`, `v2api` -> `V2Api`.
 */
export function pythonTitle(value: string): string {
  return value.replace(/[A-Za-z]+/g, (word) => word[0].toUpperCase() + word.slice(1).toLowerCase());
}

export function appConfigClassName(appName: string): string {
  return `${pythonTitle(appName)}Config`;
}

export function suggestAlternative(appName: string, taken: Record<string, string>): string {
  let candidate = `${appName}_app`;
  let n = 2;
  while (Object.hasOwn(taken, candidate.toLowerCase())) {
    candidate = `${appName}_app${n}`;
    n += 1;
  }
  return candidate;
}

/**
 * Reject names that are not Python identifiers or that shadow a builtin
 * application. Reserved names match case-insensitively.
 */
export function validateAppName(appName: string, reservedNames: Record<string, string>): void {
  if (!IDENTIFIER.test(appName)) {
    throw new InvalidNameError(
      `Application name "${appName}" is not a valid Python identifier (letters, digits and underscores, not starting with a digit)`,
    );
  }

  const key = appName.toLowerCase();
  if (Object.hasOwn(reservedNames, key)) {
    const builtin = reservedNames[key];
    throw new NameConflictError(appName, builtin, suggestAlternative(appName, reservedNames));
  }
}

export function validateAppNames(appNames: string[], reservedNames: Record<string, string>): void {
  const seen = new Set<string>();
  for (const name of appNames) {
    validateAppName(name, reservedNames);
    if (seen.has(name)) {
      throw new InvalidNameError(`Application "${name}" is listed more than once`);
    }
    seen.add(name);
  }
}
