import { z } from 'zod';

/**
 * Free-form `meta` / `links` members
 */
export const metaSchema = z.record(z.string(), z.unknown());

/**
 * Resource identifier object: `{ type, id }`
 */
export const resourceIdentifierSchema = z.object({
  type: z.string().min(1),
  id: z.string().min(1),
  meta: metaSchema.optional(),
});

/**
 * Relationship object. `data` is a resource linkage: one identifier, a list
 * of identifiers, or `null` for an empty to-one relationship.
 */
export const relationshipSchema = z.object({
  data: z
    .union([
      resourceIdentifierSchema,
      z.array(resourceIdentifierSchema),
      z.null(),
    ])
    .optional(),
  links: metaSchema.optional(),
  meta: metaSchema.optional(),
});

/**
 * Resource object. `id` is optional so that client-side documents for
 * resources that do not exist yet can be described too.
 */
export const resourceObjectSchema = z.object({
  type: z.string().min(1),
  id: z.string().min(1).optional(),
  attributes: z.record(z.string(), z.unknown()).optional(),
  relationships: z.record(z.string(), relationshipSchema).optional(),
  links: metaSchema.optional(),
  meta: metaSchema.optional(),
});

/**
 * Top-level document carrying primary data
 */
export const documentSchema = z.object({
  data: z.union([resourceObjectSchema, z.array(resourceObjectSchema), z.null()]),
  included: z.array(resourceObjectSchema).optional(),
  meta: metaSchema.optional(),
  links: metaSchema.optional(),
  jsonapi: metaSchema.optional(),
});

/**
 * Error object from an error document
 */
export const apiErrorSchema = z.object({
  id: z.string().optional(),
  status: z.string().optional(),
  code: z.string().optional(),
  title: z.string().optional(),
  detail: z.string().optional(),
  source: z
    .object({
      pointer: z.string().optional(),
      parameter: z.string().optional(),
      header: z.string().optional(),
    })
    .optional(),
  meta: metaSchema.optional(),
});

/**
 * Top-level document carrying errors
 */
export const errorDocumentSchema = z.object({
  errors: z.array(apiErrorSchema),
  meta: metaSchema.optional(),
});
