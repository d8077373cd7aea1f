// =============================================================================
// streamshape — Public API
// =============================================================================

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  StreamshapeError,
  DuplicateDefinitionError,
  DuplicatePropertyError,
  UnsupportedMetadataKeyError,
  UnknownTypeReferenceError,
  UnresolvedTypeReferenceError,
  CyclicDefinitionError,
  DuplicateVersionError,
  UnknownOperationError,
  UnknownVersionError,
  InvocationError,
  IncompleteValueError,
  DecodeFailure,
  ConvergenceViolationError,
  InvalidStateError,
  ValidationError,
  type DanglingReference,
  type UnresolvedPath,
} from "./errors.js";

// ─────────────────────────────────────────────────────────────────────────────
// Domain
// ─────────────────────────────────────────────────────────────────────────────

export {
  t,
  typeName,
  typeRefEquals,
  isOptional,
  referencedNames,
  isIdentifier,
  PRIMITIVE_NAMES,
  type TypeRef,
  type TypeRefKind,
  type PrimitiveName,
  type LiteralValue,
} from "./domain/type-ref.js";
export { parseTypeExpression } from "./domain/type-expr.js";
export {
  MediaValue,
  MediaJsonSchema,
  type MediaKind,
  type MediaSource,
  type MediaJson,
} from "./domain/media.js";

// ─────────────────────────────────────────────────────────────────────────────
// Schema
// ─────────────────────────────────────────────────────────────────────────────

export {
  SchemaRegistry,
  ClassBuilder,
  EnumBuilder,
  PropertyBuilder,
  EnumValueBuilder,
} from "./schema/schema-registry.js";
export { SchemaSnapshot } from "./schema/snapshot.js";
export type {
  ClassDef,
  EnumDef,
  EnumValueDef,
  PropertyDef,
  Definition,
  Meta,
  MetaKey,
} from "./schema/types.js";
export { renderOutputFormat, type OutputFormatOptions } from "./schema/output-format.js";
export { toZodSchema } from "./schema/zod-bridge.js";

// ─────────────────────────────────────────────────────────────────────────────
// Decoding
// ─────────────────────────────────────────────────────────────────────────────

export type {
  PartialJsonPort,
  PartialJsonParseOptions,
  JsonishNode,
  ValueStart,
} from "./ports/partial-json.port.js";
export {
  createDefaultPartialJsonAdapter,
} from "./adapters/partial-json/default-partial-json.adapter.js";
export {
  IncrementalDecoder,
  type DecoderState,
  type IncrementalDecoderOptions,
} from "./decoder/incremental-decoder.js";
export { ConvergenceTracker } from "./decoder/convergence-tracker.js";
export {
  collectLeaves,
  ROOT_PATH,
  type DecodedValue,
  type DecodedLeaf,
  type DecodedObject,
} from "./decoder/values.js";

// ─────────────────────────────────────────────────────────────────────────────
// Operations
// ─────────────────────────────────────────────────────────────────────────────

export { OperationRegistry, type OperationRegistryOptions } from "./operations/operation-registry.js";
export { StreamHandle } from "./operations/stream-handle.js";
export type {
  ImplementationBinding,
  InvocationContext,
  InvokeOptions,
  TypedInvokeOptions,
  OperationDeclaration,
  SelectionStrategy,
  ParamSpec,
  RawPayload,
  ResolvedBinding,
  StreamEvent,
  StreamStatus,
} from "./operations/types.js";
export { createModelBinding, type ModelBindingConfig } from "./adapters/model/ai-sdk-binding.adapter.js";
export { AsyncChannel, createPushSource, type PushSource } from "./streaming/async-channel.js";

// ─────────────────────────────────────────────────────────────────────────────
// Ambient
// ─────────────────────────────────────────────────────────────────────────────

export {
  loadRuntimeConfig,
  resolveRuntimeConfig,
  DEFAULT_RUNTIME_CONFIG,
  DEFAULT_DECODER_OPTIONS,
  LOG_LEVEL_ENV,
  RuntimeConfigSchema,
  type RuntimeConfig,
  type DecoderOptions,
} from "./config/runtime-config.js";
export {
  createConsoleLogger,
  silentLogger,
  bindLogger,
  formatLogLine,
  type Logger,
  type LogEntry,
  type LogLevel,
  type BoundLogger,
} from "./logging/logger.js";
