export { TfeError } from './base.js';
export { ConfigError } from './config.js';
export {
  NotFoundError,
  TransportError,
  UnexpectedStatusError,
} from './http.js';
export { DecodeError, EncodeError, ValidationError } from './validation.js';
