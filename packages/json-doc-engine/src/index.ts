export {
  defaultEngineConfig,
  type EngineConfig,
  getEngineConfig,
  loadEngineConfig,
  LOG_LEVELS,
  type LogLevel,
  resetEngineConfig,
} from "./config"
export { type ChangeStatus, computeChanges } from "./diff"
export { JSONDocument, type JSONDocumentInit, type JSONEditable } from "./document"
export {
  EditResolutionError,
  EngineConfigError,
  InvalidJSONError,
  JSONEngineError,
  SchemaParseError,
} from "./error"
export {
  formatPath,
  fromPlain,
  getAt,
  jsonArray,
  jsonBool,
  jsonEquals,
  jsonFloat,
  jsonInt,
  jsonNull,
  jsonNumericEquals,
  jsonObject,
  jsonString,
  jsonTypeName,
  parseIndex,
  pathKey,
  toPlain,
  type JSONArray,
  type JSONBool,
  type JSONContainer,
  type JSONFloat,
  type JSONInt,
  type JSONNull,
  type JSONObject,
  type JSONScalar,
  type JSONString,
  type JSONTypeName,
  type JSONValue,
  type Path,
} from "./json"
export { getLogger, getRootLogger, type Logger, setRootLogger } from "./logging"
export {
  applyEdit,
  applyEditToAll,
  describeEdit,
  editTargetPath,
  type EditOp,
  type EditResult,
  tryApplyEdit,
} from "./operations"
export {
  type AdditionalProperties,
  allowsAdditionalProperties,
  extractPropertyInfo,
  isRequired,
  parseSchema,
  parseSchemaValue,
  type PropertyInfo,
  propertyNames,
  requiredFields,
  type Schema,
  schemaAt,
  type SchemaTypeName,
} from "./schema"
export {
  detectIndentation,
  serialize,
  serializeCanonical,
  type SerializeOptions,
} from "./serializer"
export {
  type ErrorCode,
  groupByPath,
  type Severity,
  validate,
  type ValidationError,
  validationErrors,
  type ValidationResult,
  validateText,
} from "./validator"
