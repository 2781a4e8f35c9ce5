export {
  buildHeaders,
  checkResponseCode,
  constructUrl,
  createTransport,
  JSONAPI_MEDIA_TYPE,
  readBody,
  sendRequest,
} from './http.js';
