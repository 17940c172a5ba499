import { createError } from './base.js';

export const TemplateErrors = {
  NOT_FOUND: (templateId: string) =>
    createError('TEMPLATE_NOT_FOUND', `Template ${templateId} not found`, 404, { templateId }),
  IN_USE: (templateId: string, environmentIds: string[]) =>
    createError(
      'TEMPLATE_IN_USE',
      `Template ${templateId} is referenced by ${environmentIds.length} active environment(s)`,
      409,
      { templateId, environmentIds }
    ),
  NOT_ACTIVE: (templateId: string, status: string) =>
    createError('TEMPLATE_NOT_ACTIVE', `Template ${templateId} is ${status}`, 409, {
      templateId,
      status,
    }),
  INVALID: (errors: string[], warnings: string[]) =>
    createError('TEMPLATE_INVALID', 'Template configuration is invalid', 400, {
      errors,
      warnings,
    }),
  ALREADY_EXISTS: (name: string, version: number) =>
    createError('TEMPLATE_ALREADY_EXISTS', `Template ${name} v${version} already exists`, 409, {
      name,
      version,
    }),
} as const;

export type TemplateError =
  | ReturnType<typeof TemplateErrors.NOT_FOUND>
  | ReturnType<typeof TemplateErrors.IN_USE>
  | ReturnType<typeof TemplateErrors.NOT_ACTIVE>
  | ReturnType<typeof TemplateErrors.INVALID>
  | ReturnType<typeof TemplateErrors.ALREADY_EXISTS>;
