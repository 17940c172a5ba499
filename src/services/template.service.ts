import { createId } from '@paralleldrive/cuid2';
import { z } from 'zod';
import type { NewTemplate, Template, TemplateStatus } from '../db/schema/templates.js';
import { quotaOverridesSchema } from '../lib/config/schemas.js';
import type { AppError } from '../lib/errors/base.js';
import type { TemplateError } from '../lib/errors/template-errors.js';
import { TemplateErrors } from '../lib/errors/template-errors.js';
import type { Logger } from '../lib/logging/logger.js';
import { createLogger } from '../lib/logging/logger.js';
import type { QuotaGovernor } from '../lib/quota/quota-governor.js';
import type { EnvironmentState } from '../lib/state-machines/environment-lifecycle/types.js';
import type { StackCompiler } from '../lib/stacks/stack-compiler.js';
import { envVarsSchema, stackConfigSchema } from '../lib/stacks/types.js';
import type { Clock } from '../lib/utils/date.js';
import { systemClock } from '../lib/utils/date.js';
import type { Result } from '../lib/utils/result.js';
import { err, ok } from '../lib/utils/result.js';
import type { EnvironmentRepository, TemplateFilter, TemplateRepository } from '../repositories/types.js';

export const templateConfigSchema = z.object({
  name: z.string().min(1).max(100),
  description: z.string().max(500).optional(),
  baseImage: z.string().optional(),
  stack: stackConfigSchema,
  defaultQuota: quotaOverridesSchema.default({}),
  ports: z.array(z.number().int()).default([]),
  env: envVarsSchema.default({}),
  gitRepositoryUrl: z.string().optional(),
  gitBranch: z.string().optional(),
});

export type TemplateConfigInput = z.input<typeof templateConfigSchema>;
type TemplateConfig = z.infer<typeof templateConfigSchema>;

export type TemplateChanges = Partial<TemplateConfigInput>;

export type CreateTemplateOptions = {
  /** Store as a draft instead of making it available right away. */
  draft?: boolean;
};

export type TemplateValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
  imageTag?: string;
};

export type TemplateUsage = {
  templateId: string;
  total: number;
  byStatus: Partial<Record<EnvironmentState, number>>;
  environmentIds: string[];
};

export type TemplateImageBuild = {
  template: Template;
  imageTag: string;
  built: boolean;
};

export type TemplateServiceDeps = {
  templates: TemplateRepository;
  environments: EnvironmentRepository;
  compiler: StackCompiler;
  quota: QuotaGovernor;
  clock?: Clock;
  logger?: Logger;
};

const toConfigInput = (template: Template): TemplateConfigInput => ({
  name: template.name,
  description: template.description ?? undefined,
  baseImage: template.baseImage,
  stack: template.stack,
  defaultQuota: template.defaultQuota,
  ports: template.ports,
  env: template.envVars,
  gitRepositoryUrl: template.gitRepositoryUrl ?? undefined,
  gitBranch: template.gitBranch ?? undefined,
});

/** A built image stays valid only while the stack compiles to the same tag. */
const builtTagFor = (previous: Template, compiledTag: string | undefined): string | null =>
  compiledTag !== undefined && previous.imageTag === compiledTag ? compiledTag : null;

/**
 * Template catalog. Templates referenced by a live environment are frozen:
 * `update` and `delete` are refused, `createVersion` is the way to change them.
 */
export class TemplateService {
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(private readonly deps: TemplateServiceDeps) {
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger('TemplateService');
  }

  private updateTimestamp(): string {
    return this.clock().toISOString();
  }

  /** Checks a configuration without storing anything. */
  async validate(input: TemplateConfigInput): Promise<TemplateValidation> {
    const errors: string[] = [];
    const warnings: string[] = [];

    const parsed = templateConfigSchema.safeParse(input);
    if (!parsed.success) {
      return {
        valid: false,
        errors: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        warnings,
      };
    }
    const config = parsed.data;

    if (!config.baseImage?.trim()) {
      errors.push('Base image is required');
    }

    const invalidPorts = config.ports.filter((port) => port < 1 || port > 65535);
    if (invalidPorts.length > 0) {
      errors.push(`Invalid port(s): ${invalidPorts.join(', ')}`);
    }

    const quota = this.deps.quota.resolve(config.defaultQuota);
    if (!quota.ok) {
      errors.push(quota.error.message);
    }

    if (
      config.gitRepositoryUrl &&
      !config.gitRepositoryUrl.startsWith('http') &&
      !config.gitRepositoryUrl.startsWith('git@')
    ) {
      warnings.push('Git repository URL should start with http(s):// or git@');
    }

    const compiled = await this.deps.compiler.compile(config.stack, { validateOnly: true });
    if (!compiled.ok) {
      errors.push(compiled.error.message);
    }

    return {
      valid: errors.length === 0,
      errors,
      warnings,
      imageTag: compiled.ok ? compiled.value.artifact.imageTag : undefined,
    };
  }

  async create(
    input: TemplateConfigInput,
    options: CreateTemplateOptions = {}
  ): Promise<Result<Template, TemplateError>> {
    const checked = await this.check(input);
    if (!checked.ok) {
      return checked;
    }
    const { config } = checked.value;

    const existing = await this.deps.templates.findByName(config.name);
    if (existing.length > 0) {
      return err(TemplateErrors.ALREADY_EXISTS(config.name, 1));
    }

    const template = await this.deps.templates.save(
      this.toRecord(config, null, {
        version: 1,
        status: options.draft ? 'draft' : 'active',
      })
    );
    this.logger.info('Template created', { data: { templateId: template.id, name: template.name } });
    return ok(template);
  }

  async getById(id: string): Promise<Result<Template, TemplateError>> {
    const template = await this.deps.templates.findById(id);
    return template ? ok(template) : err(TemplateErrors.NOT_FOUND(id));
  }

  async list(filter?: TemplateFilter): Promise<Result<Template[], TemplateError>> {
    return ok(await this.deps.templates.list(filter));
  }

  /** In-place edit. Refused while any live environment uses the template. */
  async update(id: string, changes: TemplateChanges): Promise<Result<Template, TemplateError>> {
    const found = await this.getById(id);
    if (!found.ok) {
      return found;
    }
    const inUse = await this.assertUnused(id);
    if (!inUse.ok) {
      return inUse;
    }

    const checked = await this.check({ ...toConfigInput(found.value), ...changes });
    if (!checked.ok) {
      return checked;
    }
    const { config, imageTag } = checked.value;

    const builtTag = builtTagFor(found.value, imageTag);
    const { id: _id, createdAt: _createdAt, ...fields } = this.toRecord(config, builtTag, {
      version: found.value.version,
      status: found.value.status,
      parentId: found.value.parentId,
    });
    const updated = await this.deps.templates.update(id, fields);
    return updated ? ok(updated) : err(TemplateErrors.NOT_FOUND(id));
  }

  /** Applies `changes` as a new record with the next version number. */
  async createVersion(
    id: string,
    changes: TemplateChanges = {}
  ): Promise<Result<Template, TemplateError>> {
    const found = await this.getById(id);
    if (!found.ok) {
      return found;
    }
    const current = found.value;

    const checked = await this.check({ ...toConfigInput(current), ...changes, name: current.name });
    if (!checked.ok) {
      return checked;
    }

    const versions = await this.deps.templates.findByName(current.name);
    const latest = versions.reduce((max, template) => Math.max(max, template.version), 0);

    const template = await this.deps.templates.save(
      this.toRecord(checked.value.config, builtTagFor(current, checked.value.imageTag), {
        version: latest + 1,
        status: current.status,
        parentId: current.id,
      })
    );
    this.logger.info('Template version created', {
      data: { templateId: template.id, name: template.name, version: template.version },
    });
    return ok(template);
  }

  /** Copies a template under a new name as a draft. */
  async clone(id: string, name: string): Promise<Result<Template, TemplateError>> {
    const found = await this.getById(id);
    if (!found.ok) {
      return found;
    }

    const existing = await this.deps.templates.findByName(name);
    if (existing.length > 0) {
      return err(TemplateErrors.ALREADY_EXISTS(name, 1));
    }

    const checked = await this.check({ ...toConfigInput(found.value), name });
    if (!checked.ok) {
      return checked;
    }
    return ok(
      await this.deps.templates.save(
        this.toRecord(checked.value.config, builtTagFor(found.value, checked.value.imageTag), {
          version: 1,
          status: 'draft',
          parentId: found.value.id,
        })
      )
    );
  }

  async publish(id: string): Promise<Result<Template, TemplateError>> {
    return this.setStatus(id, 'active');
  }

  async archive(id: string): Promise<Result<Template, TemplateError>> {
    return this.setStatus(id, 'archived');
  }

  async delete(id: string): Promise<Result<void, TemplateError>> {
    const found = await this.getById(id);
    if (!found.ok) {
      return found;
    }
    const inUse = await this.assertUnused(id);
    if (!inUse.ok) {
      return inUse;
    }

    await this.deps.templates.delete(id);
    return ok(undefined);
  }

  async usage(id: string): Promise<Result<TemplateUsage, TemplateError>> {
    const found = await this.getById(id);
    if (!found.ok) {
      return found;
    }

    const environments = await this.deps.environments.findByTemplate(id);
    const byStatus: Partial<Record<EnvironmentState, number>> = {};
    for (const environment of environments) {
      byStatus[environment.status] = (byStatus[environment.status] ?? 0) + 1;
    }
    return ok({
      templateId: id,
      total: environments.length,
      byStatus,
      environmentIds: environments.map((environment) => environment.id),
    });
  }

  /**
   * Compiles the stack and asks the image builder for the image. The tag is
   * recorded on the template only once an image exists under it.
   */
  async buildImage(id: string): Promise<Result<TemplateImageBuild, AppError>> {
    const found = await this.getById(id);
    if (!found.ok) {
      return found;
    }

    const compiled = await this.deps.compiler.compile(found.value.stack);
    if (!compiled.ok) {
      return compiled;
    }

    const { artifact, built } = compiled.value;
    if (!built) {
      return ok({ template: found.value, imageTag: artifact.imageTag, built });
    }
    const template =
      (await this.deps.templates.update(id, {
        imageTag: artifact.imageTag,
        updatedAt: this.updateTimestamp(),
      })) ?? found.value;
    return ok({ template, imageTag: artifact.imageTag, built });
  }

  private async setStatus(id: string, status: TemplateStatus): Promise<Result<Template, TemplateError>> {
    const found = await this.getById(id);
    if (!found.ok) {
      return found;
    }
    if (found.value.status === status) {
      return found;
    }

    const updated = await this.deps.templates.update(id, {
      status,
      updatedAt: this.updateTimestamp(),
    });
    if (!updated) {
      return err(TemplateErrors.NOT_FOUND(id));
    }
    this.logger.info('Template status changed', {
      data: { templateId: id, from: found.value.status, to: status },
    });
    return ok(updated);
  }

  private async assertUnused(id: string): Promise<Result<void, TemplateError>> {
    const environments = await this.deps.environments.findByTemplate(id);
    if (environments.length > 0) {
      return err(
        TemplateErrors.IN_USE(
          id,
          environments.map((environment) => environment.id)
        )
      );
    }
    return ok(undefined);
  }

  private async check(
    input: TemplateConfigInput
  ): Promise<Result<{ config: TemplateConfig; imageTag?: string }, TemplateError>> {
    const validation = await this.validate(input);
    if (!validation.valid) {
      return err(TemplateErrors.INVALID(validation.errors, validation.warnings));
    }
    // validate() has already accepted the input, so this parse succeeds.
    return ok({ config: templateConfigSchema.parse(input), imageTag: validation.imageTag });
  }

  private toRecord(
    config: TemplateConfig,
    builtImageTag: string | null,
    meta: { version: number; status: TemplateStatus; parentId?: string | null }
  ): NewTemplate {
    const now = this.updateTimestamp();
    return {
      id: createId(),
      name: config.name,
      description: config.description ?? null,
      version: meta.version,
      parentId: meta.parentId ?? null,
      status: meta.status,
      baseImage: config.baseImage ?? '',
      stack: config.stack,
      defaultQuota: config.defaultQuota,
      ports: config.ports,
      envVars: config.env,
      gitRepositoryUrl: config.gitRepositoryUrl ?? null,
      gitBranch: config.gitBranch ?? null,
      imageTag: builtImageTag,
      createdAt: now,
      updatedAt: now,
    };
  }
}
