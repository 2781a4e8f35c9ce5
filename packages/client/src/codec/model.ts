import { z } from 'zod';
import { DecodeError, EncodeError } from '../errors/index.js';
import type {
  Relationship,
  ResourceIdentifier,
  ResourceObject,
} from '../types/index.js';

/**
 * Wire description of a relationship field
 */
export interface RelationshipMeta {
  /**
   * Resource type the relationship points at
   */
  type: string;
  many: boolean;
}

/**
 * Marks the fields of a model shape that are relationships rather than
 * attributes
 */
export const relationshipRegistry = z.registry<RelationshipMeta>();

/**
 * Value of a relationship field. `attributes` is set when the related
 * resource is part of the document's `included` section.
 */
export const relatedSchema = z.object({
  type: z.string().min(1),
  id: z.string().min(1),
  attributes: z.record(z.string(), z.unknown()).optional(),
});

export type Related = z.infer<typeof relatedSchema>;

const linkageSchema = z.union([
  relatedSchema,
  z.array(relatedSchema),
  z.null(),
]);

/**
 * Resources already decoded from `included`, keyed by {@link resourceKey}
 */
export type IncludedIndex = ReadonlyMap<string, ResourceObject>;

export function resourceKey(type: string, id: string): string {
  return `${type}/${id}`;
}

export interface ResourceDecoder<T> {
  readonly type: string;
  decode(resource: ResourceObject, included: IncludedIndex): T;
}

export interface ResourceEncoder<I> {
  readonly type: string;
  encode(value: I): ResourceObject;
}

/**
 * Maps one JSON:API resource type to and from plain objects
 */
export interface ResourceModel<T, I = T>
  extends ResourceDecoder<T>,
    ResourceEncoder<I> {}

export type ModelEntity<M> = M extends ResourceDecoder<infer T> ? T : never;

export type ModelInput<M> = M extends ResourceEncoder<infer I> ? I : never;

/**
 * To-one relationship field. Decodes to `null` when the resource has no
 * linkage for it; may be omitted from input values.
 */
export function toOne(type: string) {
  const schema = relatedSchema.nullable().default(null);
  relationshipRegistry.add(schema, { type, many: false });
  return schema;
}

/**
 * To-many relationship field. Decodes to `[]` when the resource has no
 * linkage for it; may be omitted from input values.
 */
export function toMany(type: string) {
  const schema = z.array(relatedSchema).default([]);
  relationshipRegistry.add(schema, { type, many: true });
  return schema;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function resolveRelated(
  identifier: ResourceIdentifier,
  included: IncludedIndex,
): Related {
  const resource = included.get(resourceKey(identifier.type, identifier.id));
  if (resource?.attributes) {
    return {
      type: identifier.type,
      id: identifier.id,
      attributes: resource.attributes,
    };
  }
  return { type: identifier.type, id: identifier.id };
}

function decodeRelationship(
  relationship: Relationship | undefined,
  meta: RelationshipMeta,
  included: IncludedIndex,
): unknown {
  const data = relationship?.data;
  if (data === undefined) {
    return meta.many ? [] : null;
  }
  if (data === null) {
    return null;
  }
  if (Array.isArray(data)) {
    return data.map((identifier) => resolveRelated(identifier, included));
  }
  return resolveRelated(data, included);
}

function encodeLinkage(
  value: unknown,
): ResourceIdentifier | ResourceIdentifier[] | null {
  const linkage = linkageSchema.parse(value);
  if (linkage === null) {
    return null;
  }
  if (Array.isArray(linkage)) {
    return linkage.map(({ type, id }) => ({ type, id }));
  }
  return { type: linkage.type, id: linkage.id };
}

/**
 * Define the model of a resource type.
 *
 * Attribute fields are plain zod schemas keyed by their wire name;
 * relationship fields are declared with {@link toOne} and {@link toMany}.
 *
 * @example
 * ```typescript
 * const workspaces = defineModel('workspaces', {
 *   name: z.string(),
 *   'auto-apply': z.boolean(),
 *   organization: toOne('organizations'),
 * });
 * ```
 */
export function defineModel<Shape extends Record<string, z.ZodType>>(
  type: string,
  shape: Shape,
) {
  const entitySchema = z.object({ ...shape, id: z.string().min(1) });
  const inputSchema = z.object({ ...shape, id: z.string().min(1).optional() });

  const relationships = new Map<string, RelationshipMeta>();
  for (const [key, schema] of Object.entries(shape)) {
    const meta = relationshipRegistry.get(schema);
    if (meta) {
      relationships.set(key, meta);
    }
  }

  const model: ResourceModel<
    z.output<typeof entitySchema>,
    z.input<typeof inputSchema>
  > = {
    type,

    decode(resource, included) {
      if (resource.type !== type) {
        throw new DecodeError(
          `Expected a "${type}" resource, got "${resource.type}"`,
        );
      }
      if (resource.id === undefined) {
        throw new DecodeError(`"${type}" resource has no id`);
      }

      const candidate: Record<string, unknown> = {
        ...resource.attributes,
        id: resource.id,
      };
      for (const [key, meta] of relationships) {
        candidate[key] = decodeRelationship(
          resource.relationships?.[key],
          meta,
          included,
        );
      }

      const result = entitySchema.safeParse(candidate);
      if (!result.success) {
        throw new DecodeError(
          `Invalid "${type}" resource ${resource.id}`,
          result.error,
        );
      }
      return result.data;
    },

    encode(value) {
      const result = inputSchema.safeParse(value);
      if (!result.success) {
        throw new EncodeError(`Invalid "${type}" input`, result.error);
      }

      const fields: Record<string, unknown> = isRecord(result.data)
        ? result.data
        : {};
      const given: Record<string, unknown> = isRecord(value) ? value : {};
      const attributes: Record<string, unknown> = {};
      const linkage: Record<string, Relationship> = {};

      for (const [key, field] of Object.entries(fields)) {
        if (key === 'id') {
          continue;
        }
        if (!relationships.has(key)) {
          attributes[key] = field;
        } else if (given[key] !== undefined) {
          // Omitted relationships stay out of the document
          linkage[key] = { data: encodeLinkage(field) };
        }
      }

      const resource: ResourceObject = { type, attributes };
      if (typeof fields.id === 'string') {
        resource.id = fields.id;
      }
      if (Object.keys(linkage).length > 0) {
        resource.relationships = linkage;
      }
      return resource;
    },
  };

  return model;
}
