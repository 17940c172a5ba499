import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Docker from 'dockerode';
import type { StackError } from '../errors/stack-errors.js';
import { StackErrors } from '../errors/stack-errors.js';
import type { Logger } from '../logging/logger.js';
import { createLogger } from '../logging/logger.js';
import type { Result } from '../utils/result.js';
import { err, ok } from '../utils/result.js';
import type { BuiltImage, ImageBuilder } from './image-builder.js';
import type { BuildArtifact } from './types.js';

type BuildEvent = {
  stream?: string;
  error?: string;
  aux?: { ID?: string };
};

const isBuildEvent = (value: unknown): value is BuildEvent =>
  typeof value === 'object' && value !== null;

/**
 * Builds images through the local Docker daemon. The recipe is written to a
 * throwaway context directory that is removed once the build settles.
 */
export class DockerImageBuilder implements ImageBuilder {
  private docker: Docker;
  private logger: Logger;

  constructor(options?: Docker.DockerOptions, logger?: Logger) {
    this.docker = new Docker(options);
    this.logger = logger ?? createLogger('DockerImageBuilder');
  }

  async build(artifact: BuildArtifact): Promise<Result<BuiltImage, StackError>> {
    const contextDir = await mkdtemp(join(tmpdir(), 'sandbox-build-'));

    try {
      await writeFile(join(contextDir, 'Dockerfile'), artifact.recipe, 'utf-8');
      const events = await this.runBuild(contextDir, artifact.imageTag);
      const failure = events.find((event) => event.error);
      if (failure?.error) {
        return err(StackErrors.IMAGE_BUILD_FAILED(artifact.imageTag, failure.error));
      }

      const imageId = events.find((event) => event.aux?.ID)?.aux?.ID;
      this.logger.info('Image built', { data: { imageTag: artifact.imageTag, imageId } });
      return ok({ imageTag: artifact.imageTag, imageId });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return err(StackErrors.IMAGE_BUILD_FAILED(artifact.imageTag, message));
    } finally {
      await rm(contextDir, { recursive: true, force: true });
    }
  }

  private runBuild(contextDir: string, tag: string): Promise<BuildEvent[]> {
    return new Promise((resolve, reject) => {
      this.docker.buildImage(
        { context: contextDir, src: ['Dockerfile'] },
        { t: tag, rm: true, forcerm: true },
        (error?: unknown, stream?: NodeJS.ReadableStream) => {
          if (error || !stream) {
            reject(error instanceof Error ? error : new Error('Docker returned no build stream'));
            return;
          }

          this.docker.modem.followProgress(
            stream,
            (progressError: Error | null, output: unknown[]) => {
              if (progressError) {
                reject(progressError);
                return;
              }
              resolve(output.filter(isBuildEvent));
            },
            (event: unknown) => {
              if (isBuildEvent(event) && event.stream) {
                this.logger.debug('Build output', { data: { line: event.stream.trim() } });
              }
            }
          );
        }
      );
    });
  }
}
