// @modelform/core entry point
//
// - createForm() builds a bound form tree; the tree (or the functional
//   facades in ./api.js) drives populate / validate / sync / save.
// - Definitions come from the builder DSL or from JSON declarations.

export * from './api.js';

// Definitions
export {
  defineSchema,
  extendSchema,
  defineFragment,
  SchemaBuilder,
  FragmentBuilder,
  Fragment,
  PropertyDsl,
  type OverrideIntent,
  type ScalarOptions,
  type NestedOptions,
  type BuildChild,
  type PropertyDeclaration,
} from './definition/builder.js';
export {
  SchemaDefinition,
  type SchemaDefinitionInit,
} from './definition/definition.js';
export {
  compileDeclaration,
  type FormDeclaration,
  type PropertyDeclarationJson,
} from './definition/declaration.js';
export {
  SELF_ROLE,
  isNestedDescriptor,
  type PropertyKind,
  type Visibility,
  type InputMapping,
  type Snapshot,
  type ErrorMessages,
  type RuleChecker,
  type ModelConstructor,
  type CreationContext,
  type CreationFunction,
  type CreationPolicy,
  type SkipContext,
  type SkipPolicy,
  type TransformContext,
  type InputTransform,
  type ScalarDescriptor,
  type NestedDescriptor,
  type PropertyDescriptor,
} from './types/schema.js';

// Models
export {
  objectAdapter,
  toAdapter,
  isModelAdapter,
  type ModelAdapter,
} from './binding/adapter.js';
export { Binding, type BindingScope } from './binding/binding.js';

// Form tree and traversals
export { FormNode, type FormNodeInit } from './form/form-node.js';
export {
  type PopulateNote,
  type PopulateNoteCode,
  type PopulateResult,
} from './populate/populate.js';
export { isAllBlank, createRecord } from './populate/policies.js';
export {
  type PersistedEntry,
  type SaveResult,
  type ManualSaveHandler,
} from './sync/save.js';

// Validation
export {
  ROOT_KEY,
  emptyReport,
  isReportEmpty,
  flattenReport,
  type ErrorReport,
} from './validation/report.js';
export { rules, combineRules } from './validation/rules.js';
export {
  jsonSchemaRules,
  type JsonSchemaRuleOptions,
} from './validation/json-schema-rules.js';

// Options
export {
  resolveOptions,
  isSurplusPolicy,
  DEFAULT_OPTIONS,
  SURPLUS_POLICIES,
  type FormOptions,
  type ResolvedOptions,
  type SurplusPolicy,
  type CollectionOptions,
  type InputOptions,
  type TraceSink,
} from './types/options.js';
export { createTracer, type Tracer } from './util/trace.js';
export { displayPath, indexPath, joinPath } from './util/path.js';

// Errors
export {
  ErrorCode,
  EXIT_CODES,
  type Severity,
  getExitCode,
} from './errors/codes.js';
export { ErrorPresenter, type CLIErrorView } from './errors/presenter.js';
export {
  ModelFormError,
  DefinitionError,
  MissingAccessorError,
  MissingNestedModelError,
  PopulationError,
  PersistenceError,
  ConfigError,
  ParseError,
  isModelFormError,
  redactSensitive,
  SENSITIVE_KEYS,
  type ErrorContext,
  type SerializedError,
  type UserError,
  type ModelFormErrorParams,
} from './types/errors.js';
export {
  ok,
  err,
  isOk,
  isErr,
  Ok,
  Err,
  type Result,
} from './types/result.js';
