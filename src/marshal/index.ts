export { marshalWithFieldset, withStatus, MarshalResponse } from './handler.js';
export type {
  FieldsetHandler,
  FieldsetMarshaller,
  MarshalOptions,
} from './handler.js';
