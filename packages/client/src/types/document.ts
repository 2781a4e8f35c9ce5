import type { z } from 'zod';
import type {
  apiErrorSchema,
  documentSchema,
  errorDocumentSchema,
  metaSchema,
  relationshipSchema,
  resourceIdentifierSchema,
  resourceObjectSchema,
} from '../schemas/document.js';

/**
 * Free-form `meta` or `links` object
 */
export type Meta = z.infer<typeof metaSchema>;

/**
 * `{ type, id }` pair pointing at a resource
 */
export type ResourceIdentifier = z.infer<typeof resourceIdentifierSchema>;

/**
 * Relationship object of a resource
 */
export type Relationship = z.infer<typeof relationshipSchema>;

/**
 * Resource object as it appears on the wire
 */
export type ResourceObject = z.infer<typeof resourceObjectSchema>;

/**
 * Document with primary data
 */
export type Document = z.infer<typeof documentSchema>;

/**
 * Error object from an error response
 */
export type ApiError = z.infer<typeof apiErrorSchema>;

/**
 * Document with errors
 */
export type ErrorDocument = z.infer<typeof errorDocumentSchema>;
