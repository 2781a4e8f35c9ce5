/**
 * @tfe-api/client - TypeScript client for JSON:API resource APIs
 *
 * Builds bearer-authenticated requests, encodes structured input as JSON:API
 * documents and decodes responses into single resources or collections.
 *
 * @packageDocumentation
 */

// Main client
export { TfeClient } from './client.js';

// Codec
export {
  defineModel,
  type IncludedIndex,
  type ModelEntity,
  type ModelInput,
  marshalPayload,
  type Payload,
  parseDocument,
  payload,
  type Related,
  type RelationshipMeta,
  type ResourceDecoder,
  type ResourceEncoder,
  type ResourceModel,
  relatedSchema,
  toMany,
  toOne,
  unmarshalMany,
  unmarshalManyPayload,
  unmarshalOne,
  unmarshalPayload,
} from './codec/index.js';

// Configuration
export {
  type ClientConfig,
  DEFAULT_ADDRESS,
  DEFAULT_TIMEOUT,
  defaultConfig,
} from './config.js';

// Errors
export {
  ConfigError,
  DecodeError,
  EncodeError,
  NotFoundError,
  TfeError,
  TransportError,
  UnexpectedStatusError,
  ValidationError,
} from './errors/index.js';

// Output sinks
export {
  CollectionSink,
  intoMany,
  intoOne,
  type OutputSink,
  SingleSink,
} from './sinks.js';

// Transport
export { createTransport, JSONAPI_MEDIA_TYPE } from './utils/index.js';

// Types
export type {
  ApiError,
  Document,
  ErrorDocument,
  HttpMethod,
  Meta,
  QueryParams,
  QueryValue,
  Relationship,
  RequestDescriptor,
  ResolvedConfig,
  ResourceIdentifier,
  ResourceObject,
} from './types/index.js';
