import { z } from 'zod';

/** Package names that can be passed to an install command without quoting. */
export const PACKAGE_NAME_PATTERN = /^[A-Za-z0-9@][A-Za-z0-9@._/=~^+-]*$/;

/** Names that are safe as both a shell variable and an `ENV` instruction key. */
export const ENV_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const envVarsSchema = z.record(
  z.string().regex(ENV_NAME_PATTERN, 'Invalid environment variable name'),
  z.string()
);

export const stackConfigSchema = z.object({
  language: z.string().min(1),
  version: z.string().min(1).optional(),
  framework: z.string().min(1).optional(),
  packages: z.array(z.string().min(1)).default([]),
  ports: z.array(z.number().int().min(1).max(65535)).default([]),
  env: envVarsSchema.default({}),
});

export type StackConfig = z.infer<typeof stackConfigSchema>;
export type StackConfigInput = z.input<typeof stackConfigSchema>;

export const languageEntrySchema = z.object({
  defaultVersion: z.string(),
  baseImages: z.record(z.string()),
  systemTools: z.array(z.string()),
  setup: z.array(z.string()),
  packageInstall: z.string().includes('{packages}').nullable(),
  frameworks: z.record(z.array(z.string())),
});

export const stackMatrixSchema = z.object({
  common: z.object({
    workdir: z.string().startsWith('/'),
    defaultPort: z.number().int().min(1).max(65535),
    epilogue: z.array(z.string()),
  }),
  languages: z.record(languageEntrySchema),
});

export type LanguageEntry = z.infer<typeof languageEntrySchema>;
export type StackMatrix = z.infer<typeof stackMatrixSchema>;

/** Stack after defaults are applied and every dimension is checked. */
export type ResolvedStack = {
  language: string;
  version: string;
  framework?: string;
  packages: string[];
  ports: number[];
  env: Record<string, string>;
  baseImage: string;
};

export type BuildArtifact = {
  recipe: string;
  imageTag: string;
  stack: ResolvedStack;
};

export type SupportedStack = {
  language: string;
  defaultVersion: string;
  versions: string[];
  frameworks: string[];
};
