/**
 * Request bodies accepted by the platform's view services.
 *
 * Each schema fills in its `class` discriminator when the caller leaves it out
 * and keeps any extra members, so callers may pass fuller bodies than the SDK
 * models.
 */

import { z } from 'zod';
import { InvalidParameterException, type ExceptionContext } from '@egeria-sdk/core';

const stringList = z.array(z.string());

/**
 * Properties of a new or updated element. `class` names the property bean,
 * e.g. "GlossaryProperties".
 */
export const ElementPropertiesSchema = z
  .object({
    class: z.string().min(1),
    qualifiedName: z.string().optional(),
    displayName: z.string().optional(),
    description: z.string().optional(),
  })
  .passthrough();

const queryOptions = {
  effectiveTime: z.string().optional(),
  asOfTime: z.string().optional(),
  forLineage: z.boolean().optional(),
  forDuplicateProcessing: z.boolean().optional(),
  startFrom: z.number().int().nonnegative().optional(),
  pageSize: z.number().int().nonnegative().optional(),
  metadataElementTypeName: z.string().optional(),
  metadataElementSubtypeNames: stringList.optional(),
  includeOnlyClassifiedElements: stringList.optional(),
  skipClassifiedElements: stringList.optional(),
  skipRelationships: stringList.optional(),
  limitResultsByStatus: stringList.optional(),
  governanceZoneFilter: stringList.optional(),
  graphQueryDepth: z.number().int().nonnegative().optional(),
};

export const SearchStringRequestBodySchema = z
  .object({
    class: z.literal('SearchStringRequestBody').default('SearchStringRequestBody'),
    searchString: z.string().nullable().optional(),
    startsWith: z.boolean().optional(),
    endsWith: z.boolean().optional(),
    ignoreCase: z.boolean().optional(),
    ...queryOptions,
  })
  .passthrough();

export const FilterRequestBodySchema = z
  .object({
    class: z.literal('FilterRequestBody').default('FilterRequestBody'),
    filter: z.string().nullable().optional(),
    ...queryOptions,
  })
  .passthrough();

export const GetRequestBodySchema = z
  .object({
    class: z.literal('GetRequestBody').default('GetRequestBody'),
    ...queryOptions,
  })
  .passthrough();

export const ResultsRequestBodySchema = z
  .object({
    class: z.literal('ResultsRequestBody').default('ResultsRequestBody'),
    ...queryOptions,
  })
  .passthrough();

export const NewElementRequestBodySchema = z
  .object({
    class: z.literal('NewElementRequestBody').default('NewElementRequestBody'),
    anchorGUID: z.string().optional(),
    isOwnAnchor: z.boolean().optional(),
    anchorScopeGUID: z.string().optional(),
    parentGUID: z.string().optional(),
    parentRelationshipTypeName: z.string().optional(),
    parentAtEnd1: z.boolean().optional(),
    initialStatus: z.string().optional(),
    initialClassifications: z.record(z.record(z.unknown())).optional(),
    effectiveTime: z.string().optional(),
    properties: ElementPropertiesSchema,
  })
  .passthrough();

export const TemplateRequestBodySchema = z
  .object({
    class: z.literal('TemplateRequestBody').default('TemplateRequestBody'),
    templateGUID: z.string().min(1),
    anchorGUID: z.string().optional(),
    isOwnAnchor: z.boolean().optional(),
    parentGUID: z.string().optional(),
    parentRelationshipTypeName: z.string().optional(),
    parentAtEnd1: z.boolean().optional(),
    replacementProperties: z.record(z.unknown()).optional(),
    placeholderPropertyValues: z.record(z.string()).optional(),
  })
  .passthrough();

export const UpdateElementRequestBodySchema = z
  .object({
    class: z.literal('UpdateElementRequestBody').default('UpdateElementRequestBody'),
    mergeUpdate: z.boolean().optional(),
    effectiveTime: z.string().optional(),
    properties: ElementPropertiesSchema,
  })
  .passthrough();

export const UpdateStatusRequestBodySchema = z
  .object({
    class: z.literal('UpdateStatusRequestBody').default('UpdateStatusRequestBody'),
    newStatus: z.string().min(1),
    effectiveTime: z.string().optional(),
  })
  .passthrough();

export const NewRelationshipRequestBodySchema = z
  .object({
    class: z.literal('NewRelationshipRequestBody').default('NewRelationshipRequestBody'),
    effectiveTime: z.string().optional(),
    properties: ElementPropertiesSchema.optional(),
  })
  .passthrough();

export const DeleteRequestBodySchema = z
  .object({
    class: z.literal('DeleteRequestBody').default('DeleteRequestBody'),
    cascadeDelete: z.boolean().optional(),
    effectiveTime: z.string().optional(),
  })
  .passthrough();

/**
 * Body of the glossary services' create and update calls.
 */
export const ReferenceableRequestBodySchema = z
  .object({
    class: z
      .enum(['ReferenceableRequestBody', 'ReferenceableUpdateRequestBody'])
      .default('ReferenceableRequestBody'),
    elementProperties: ElementPropertiesSchema,
    initialStatus: z.string().optional(),
    effectiveTime: z.string().optional(),
    updateDescription: z.string().optional(),
  })
  .passthrough();

export type ElementProperties = z.input<typeof ElementPropertiesSchema>;
export type SearchStringRequestBody = z.input<typeof SearchStringRequestBodySchema>;
export type FilterRequestBody = z.input<typeof FilterRequestBodySchema>;
export type GetRequestBody = z.input<typeof GetRequestBodySchema>;
export type ResultsRequestBody = z.input<typeof ResultsRequestBodySchema>;
export type NewElementRequestBody = z.input<typeof NewElementRequestBodySchema>;
export type TemplateRequestBody = z.input<typeof TemplateRequestBodySchema>;
export type UpdateElementRequestBody = z.input<typeof UpdateElementRequestBodySchema>;
export type UpdateStatusRequestBody = z.input<typeof UpdateStatusRequestBodySchema>;
export type NewRelationshipRequestBody = z.input<typeof NewRelationshipRequestBodySchema>;
export type DeleteRequestBody = z.input<typeof DeleteRequestBodySchema>;
export type ReferenceableRequestBody = z.input<typeof ReferenceableRequestBodySchema>;

/**
 * Validates a request body, throwing InvalidParameterException with every
 * issue when it does not match.
 */
export function validateBody<S extends z.ZodTypeAny>(
  schema: S,
  body: unknown,
  context?: Partial<ExceptionContext>
): z.output<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new InvalidParameterException(issues.join('; '), { context });
  }
  return parsed.data;
}

/**
 * Checks that a properties bean is one of the expected classes.
 */
export function requirePropertyClass(
  properties: { class: string } | undefined,
  allowed: readonly string[],
  context?: Partial<ExceptionContext>
): void {
  if (properties === undefined || allowed.length === 0) {
    return;
  }
  if (!allowed.includes(properties.class)) {
    throw new InvalidParameterException(
      `property class '${properties.class}' is not one of ${allowed.join(', ')}`,
      { context }
    );
  }
}
