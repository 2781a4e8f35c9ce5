import { DecodeError } from '../errors/index.js';
import { documentSchema } from '../schemas/index.js';
import type { Document, ResourceObject } from '../types/index.js';
import {
  type IncludedIndex,
  type ResourceDecoder,
  type ResourceEncoder,
  resourceKey,
} from './model.js';

/**
 * Structured request body, see {@link payload}
 */
export interface Payload {
  serialize(): string;
}

function isList<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value);
}

/**
 * Encode one value, or a list of values, as a JSON:API document
 *
 * @throws {EncodeError} if a value does not match the model
 */
export function marshalPayload<I>(
  model: ResourceEncoder<I>,
  value: I | readonly I[],
): string {
  const data = isList(value)
    ? value.map((item) => model.encode(item))
    : model.encode(value);
  return JSON.stringify({ data });
}

/**
 * Bind a value to its model for use as the `input` of a request descriptor
 */
export function payload<I>(
  model: ResourceEncoder<I>,
  value: I | readonly I[],
): Payload {
  return {
    serialize: () => marshalPayload(model, value),
  };
}

/**
 * Parse and validate a JSON:API document
 *
 * @throws {DecodeError} if the text is not JSON or not a document
 */
export function parseDocument(text: string): Document {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new DecodeError(
      'Response body is not valid JSON',
      undefined,
      error instanceof Error ? error : undefined,
    );
  }

  const result = documentSchema.safeParse(json);
  if (!result.success) {
    throw new DecodeError(
      'Response body is not a JSON:API document',
      result.error,
    );
  }
  return result.data;
}

function indexIncluded(document: Document): IncludedIndex {
  const index = new Map<string, ResourceObject>();
  for (const resource of document.included ?? []) {
    if (resource.id !== undefined) {
      index.set(resourceKey(resource.type, resource.id), resource);
    }
  }
  return index;
}

/**
 * Decode the primary data of a document as a single resource
 */
export function unmarshalOne<T>(
  model: ResourceDecoder<T>,
  document: Document,
): T {
  const { data } = document;
  if (data === null) {
    throw new DecodeError(
      `Expected a "${model.type}" resource, got no primary data`,
    );
  }
  if (Array.isArray(data)) {
    throw new DecodeError(
      `Expected a single "${model.type}" resource, got a list`,
    );
  }
  return model.decode(data, indexIncluded(document));
}

/**
 * Decode the primary data of a document as a list of resources, in
 * document order
 */
export function unmarshalMany<T>(
  model: ResourceDecoder<T>,
  document: Document,
): T[] {
  const { data } = document;
  if (!Array.isArray(data)) {
    throw new DecodeError(`Expected a list of "${model.type}" resources`);
  }
  const included = indexIncluded(document);
  return data.map((resource) => model.decode(resource, included));
}

export function unmarshalPayload<T>(
  model: ResourceDecoder<T>,
  text: string,
): T {
  return unmarshalOne(model, parseDocument(text));
}

export function unmarshalManyPayload<T>(
  model: ResourceDecoder<T>,
  text: string,
): T[] {
  return unmarshalMany(model, parseDocument(text));
}
