import type { StackError } from '../errors/stack-errors.js';
import type { Result } from '../utils/result.js';
import type { BuildArtifact } from './types.js';

export type BuiltImage = {
  imageTag: string;
  imageId?: string;
};

/** Capability that turns a build artifact into an image in a registry or local store. */
export interface ImageBuilder {
  build(artifact: BuildArtifact): Promise<Result<BuiltImage, StackError>>;
}
