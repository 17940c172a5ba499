import rawMatrix from './stack-matrix.json' with { type: 'json' };
import type { StackMatrix, SupportedStack } from './types.js';
import { stackMatrixSchema } from './types.js';

/** Supported language, version and framework table. Extending it is a data change. */
export const SUPPORTED_STACKS: StackMatrix = stackMatrixSchema.parse(rawMatrix);

export function getSupportedStacks(matrix: StackMatrix = SUPPORTED_STACKS): SupportedStack[] {
  return Object.entries(matrix.languages).map(([language, entry]) => ({
    language,
    defaultVersion: entry.defaultVersion,
    versions: Object.keys(entry.baseImages),
    frameworks: Object.keys(entry.frameworks),
  }));
}
