export {
  defineModel,
  type IncludedIndex,
  type ModelEntity,
  type ModelInput,
  type Related,
  type RelationshipMeta,
  type ResourceDecoder,
  type ResourceEncoder,
  type ResourceModel,
  relatedSchema,
  relationshipRegistry,
  resourceKey,
  toMany,
  toOne,
} from './model.js';
export {
  marshalPayload,
  type Payload,
  parseDocument,
  payload,
  unmarshalMany,
  unmarshalManyPayload,
  unmarshalOne,
  unmarshalPayload,
} from './payload.js';
