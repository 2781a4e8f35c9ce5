export { clientConfigSchema } from './config.js';
export {
  apiErrorSchema,
  documentSchema,
  errorDocumentSchema,
  metaSchema,
  relationshipSchema,
  resourceIdentifierSchema,
  resourceObjectSchema,
} from './document.js';
