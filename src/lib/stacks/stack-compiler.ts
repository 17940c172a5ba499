import { createHash } from 'node:crypto';
import type { StackError } from '../errors/stack-errors.js';
import { StackErrors } from '../errors/stack-errors.js';
import type { Logger } from '../logging/logger.js';
import { createLogger } from '../logging/logger.js';
import type { Result } from '../utils/result.js';
import { err, ok } from '../utils/result.js';
import { sortedEntries } from '../utils/sort.js';
import type { ImageBuilder } from './image-builder.js';
import { validateRecipe } from './recipe-validator.js';
import { SUPPORTED_STACKS } from './stack-matrix.js';
import type {
  BuildArtifact,
  ResolvedStack,
  StackConfigInput,
  StackMatrix,
} from './types.js';
import { PACKAGE_NAME_PATTERN, stackConfigSchema } from './types.js';

const TAG_HASH_LENGTH = 12;

export function resolveStack(
  input: StackConfigInput,
  matrix: StackMatrix = SUPPORTED_STACKS
): Result<ResolvedStack, StackError> {
  const parsed = stackConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    if (issue?.path[0] === 'env') {
      return err(StackErrors.UNSUPPORTED_STACK('env', String(issue.path[1] ?? issue.message), []));
    }
    return err(
      StackErrors.UNSUPPORTED_STACK('language', issue ? issue.message : 'invalid stack', [])
    );
  }
  const stack = parsed.data;

  if (!Object.hasOwn(matrix.languages, stack.language)) {
    return err(
      StackErrors.UNSUPPORTED_STACK('language', stack.language, Object.keys(matrix.languages))
    );
  }
  const entry = matrix.languages[stack.language];

  const version = stack.version ?? entry.defaultVersion;
  if (!Object.hasOwn(entry.baseImages, version)) {
    return err(StackErrors.UNSUPPORTED_STACK('version', version, Object.keys(entry.baseImages)));
  }
  const baseImage = entry.baseImages[version];

  if (stack.framework !== undefined && !Object.hasOwn(entry.frameworks, stack.framework)) {
    return err(
      StackErrors.UNSUPPORTED_STACK('framework', stack.framework, Object.keys(entry.frameworks))
    );
  }

  const badPackage = stack.packages.find((name) => !PACKAGE_NAME_PATTERN.test(name));
  if (badPackage !== undefined) {
    return err(StackErrors.UNSUPPORTED_STACK('package', badPackage, []));
  }
  if (stack.packages.length > 0 && entry.packageInstall === null) {
    return err(StackErrors.UNSUPPORTED_STACK('package', stack.packages.join(' '), []));
  }

  return ok({
    language: stack.language,
    version,
    framework: stack.framework,
    packages: stack.packages,
    ports: stack.ports.length > 0 ? stack.ports : [matrix.common.defaultPort],
    env: stack.env,
    baseImage,
  });
}

function renderRecipe(stack: ResolvedStack, matrix: StackMatrix): string {
  const entry = matrix.languages[stack.language];
  const frameworkLines = stack.framework ? entry.frameworks[stack.framework] : [];
  const packageLine =
    stack.packages.length > 0 && entry.packageInstall
      ? [entry.packageInstall.replace('{packages}', stack.packages.join(' '))]
      : [];

  const envLines = sortedEntries({
    SANDBOX_LANGUAGE: stack.language,
    SANDBOX_VERSION: stack.version,
    SANDBOX_FRAMEWORK: stack.framework ?? '',
    ...stack.env,
  }).map(([key, value]) => `ENV ${key}=${JSON.stringify(value)}`);

  const sections = [
    [`# Sandbox image: ${stack.language} ${stack.version}${stack.framework ? ` (${stack.framework})` : ''}`],
    [`FROM ${stack.baseImage}`],
    entry.systemTools,
    [`WORKDIR ${matrix.common.workdir}`],
    entry.setup,
    [...frameworkLines, ...packageLine],
    envLines,
    stack.ports.map((port) => `EXPOSE ${port}`),
    matrix.common.epilogue,
  ];

  return `${sections
    .filter((lines) => lines.length > 0)
    .map((lines) => lines.join('\n'))
    .join('\n\n')}\n`;
}

const contentTag = (recipe: string): string =>
  createHash('sha256').update(recipe).digest('hex').slice(0, TAG_HASH_LENGTH);

/**
 * Maps a stack configuration to a build recipe and image tag. Total over
 * the supported matrix and byte-stable: the recipe carries no timestamps and
 * the tag is derived from the recipe's content hash.
 */
export function compileStack(
  input: StackConfigInput,
  registryScope: string,
  matrix: StackMatrix = SUPPORTED_STACKS
): Result<BuildArtifact, StackError> {
  const resolved = resolveStack(input, matrix);
  if (!resolved.ok) {
    return resolved;
  }

  const stack = resolved.value;
  const recipe = renderRecipe(stack, matrix);
  const validated = validateRecipe(recipe);
  if (!validated.ok) {
    return validated;
  }

  const repository = `${stack.language}-${stack.framework ?? 'base'}`;
  return ok({
    recipe,
    imageTag: `${registryScope}/${repository}:${contentTag(recipe)}`,
    stack,
  });
}

export type CompileOptions = {
  /** Map and check only; never ask the builder for an image. */
  validateOnly?: boolean;
};

export type CompileOutcome = {
  artifact: BuildArtifact;
  built: boolean;
};

export type StackCompilerOptions = {
  registryScope: string;
  matrix?: StackMatrix;
  builder?: ImageBuilder;
  logger?: Logger;
};

export class StackCompiler {
  private readonly matrix: StackMatrix;
  private readonly logger: Logger;

  constructor(private readonly options: StackCompilerOptions) {
    this.matrix = options.matrix ?? SUPPORTED_STACKS;
    this.logger = options.logger ?? createLogger('StackCompiler');
  }

  async compile(
    input: StackConfigInput,
    options: CompileOptions = {}
  ): Promise<Result<CompileOutcome, StackError>> {
    const compiled = compileStack(input, this.options.registryScope, this.matrix);
    if (!compiled.ok) {
      return compiled;
    }

    const artifact = compiled.value;
    if (options.validateOnly || !this.options.builder) {
      return ok({ artifact, built: false });
    }

    this.logger.info('Building image', { data: { imageTag: artifact.imageTag } });
    const built = await this.options.builder.build(artifact);
    if (!built.ok) {
      return built;
    }
    return ok({ artifact, built: true });
  }
}
