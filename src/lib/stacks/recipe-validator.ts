import type { StackError } from '../errors/stack-errors.js';
import { StackErrors } from '../errors/stack-errors.js';
import type { Result } from '../utils/result.js';
import { err, ok } from '../utils/result.js';

export const FORBIDDEN_RECIPE_PATTERNS: ReadonlyArray<{ label: string; pattern: RegExp }> = [
  // Root wipe only; cleaning e.g. /var/lib/apt/lists is fine.
  { label: 'rm -rf /', pattern: /rm\s+-rf\s+\/(?:\*|\s|$)/m },
  { label: 'chmod 777', pattern: /chmod\s+(?:-R\s+)?777/ },
  { label: 'sudo', pattern: /\bsudo\b/ },
  { label: '--privileged', pattern: /--privileged\b/ },
];

/**
 * Structural and safety checks on build recipe text. Runs on generated
 * recipes as well as recipes supplied from outside.
 */
export function validateRecipe(recipe: string): Result<string, StackError> {
  const lines = recipe.split('\n').map((line) => line.trim());

  if (!lines.some((line) => line.startsWith('FROM '))) {
    return err(StackErrors.RECIPE_REJECTED('missing FROM instruction'));
  }
  if (!lines.some((line) => line.startsWith('WORKDIR '))) {
    return err(StackErrors.RECIPE_REJECTED('missing WORKDIR instruction'));
  }

  const forbidden = FORBIDDEN_RECIPE_PATTERNS.find(({ pattern }) => pattern.test(recipe));
  if (forbidden) {
    return err(StackErrors.RECIPE_REJECTED(`forbidden command "${forbidden.label}"`));
  }

  return ok(recipe);
}
