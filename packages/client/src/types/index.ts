export type { ResolvedConfig } from './config.js';
export type {
  ApiError,
  Document,
  ErrorDocument,
  Meta,
  Relationship,
  ResourceIdentifier,
  ResourceObject,
} from './document.js';
export type {
  HttpMethod,
  QueryParams,
  QueryValue,
  RequestDescriptor,
} from './request.js';
