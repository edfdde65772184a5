// Fieldsets
export {
  FieldsetSchema,
  FieldsetBuilder,
  fieldset,
  defineFieldset,
  buildRenderPlan,
  DEFAULT_META,
  FieldsetMetaSchema,
  resolveMeta,
  validateMeta,
} from './fieldset/index.js';
export type {
  FieldsetParent,
  FieldsetConfig,
  FieldsetMeta,
  FieldsetMetaInput,
  FieldDeclaration,
  FieldsetLayer,
  RenderPlan,
  RenderPlanEntry,
} from './fieldset/index.js';

// Fields
export {
  fields,
  Field,
  StringField,
  IntegerField,
  FloatField,
  BooleanField,
  DateTimeField,
  NestedField,
  ListField,
  ObjectMemberField,
  OptionalNestedField,
  getValue,
} from './fields/index.js';
export type {
  AttributeSource,
  FieldOptions,
  FieldClass,
  FieldInput,
  FieldsetSource,
  DateTimeFormat,
  DateTimeFieldOptions,
  NestedFieldOptions,
  ObjectMemberFieldOptions,
  OptionalNestedFieldOptions,
  NestedRenderOptions,
} from './fields/index.js';

// Selection
export {
  parseSelection,
  createSelectionParser,
  parseQueryArg,
  createSelectionParsers,
  readFieldSelection,
} from './selection/index.js';
export type {
  FieldSelection,
  SelectionParser,
  SelectionParsers,
} from './selection/index.js';

// Marshalling
export { marshal, marshalOne } from './serialization/index.js';
export type { MarshalledRecord, MarshalOutput } from './serialization/index.js';
export { marshalWithFieldset, withStatus, MarshalResponse } from './marshal/index.js';
export type {
  FieldsetHandler,
  FieldsetMarshaller,
  MarshalOptions,
} from './marshal/index.js';

// OpenAPI
export {
  jsonContent,
  fieldsetQuerySchema,
  SelectionErrorSchema,
  selectionErrorResponse,
  openApiValidationHook,
} from './openapi/utils.js';

// Core
export {
  ApiException,
  InputValidationException,
  SelectionTypeException,
  InvalidSelectionException,
  SchemaDeclarationException,
  MarshallingException,
} from './core/exceptions.js';
export type { ApiStatusCode } from './core/exceptions.js';
export { createErrorHandler, zodErrorMapper } from './core/error-handler.js';
export type {
  ErrorMapper,
  ErrorHook,
  ErrorHandlerConfig,
} from './core/error-handler.js';
export { setLogger, getLogger, resetLogger } from './core/logger.js';
export type { Logger } from './core/logger.js';
export {
  getContextVar,
  setContextVar,
  getRequestId,
  getFieldSelection,
  setFieldSelection,
} from './core/context-helpers.js';
