/**
 * Structured error hierarchy for streamshape.
 *
 * Every error extends {@link StreamshapeError} so callers can branch on the
 * class or on the stable `code`:
 *
 * ```ts
 * try {
 *   await operations.call("ExtractUser", [text]);
 * } catch (e) {
 *   if (e instanceof DecodeFailure) console.log(e.paths);
 *   if (e instanceof UnknownVersionError) { ... }
 * }
 * ```
 *
 * @module errors
 */

/** Base error for all streamshape errors. Includes an error code for programmatic matching. */
export class StreamshapeError extends Error {
  readonly code: string;
  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StreamshapeError";
    this.code = code;
  }
}

// ─── Build-time (schema registry) ──────────────────────────────────

/** A class or enum name was defined twice. Names are unique across both kinds. */
export class DuplicateDefinitionError extends StreamshapeError {
  readonly definitionName: string;
  readonly existingKind: "class" | "enum";
  constructor(definitionName: string, existingKind: "class" | "enum") {
    super("DUPLICATE_DEFINITION", `"${definitionName}" is already defined as ${existingKind === "class" ? "a class" : "an enum"}`);
    this.name = "DuplicateDefinitionError";
    this.definitionName = definitionName;
    this.existingKind = existingKind;
  }
}

/** A property (or enum value) name was used twice inside one definition. */
export class DuplicatePropertyError extends StreamshapeError {
  readonly owner: string;
  readonly member: string;
  constructor(owner: string, member: string) {
    super("DUPLICATE_PROPERTY", `"${owner}" already has a member named "${member}"`);
    this.name = "DuplicatePropertyError";
    this.owner = owner;
    this.member = member;
  }
}

export class UnsupportedMetadataKeyError extends StreamshapeError {
  readonly key: string;
  readonly target: string;
  constructor(target: string, key: string) {
    super("UNSUPPORTED_METADATA_KEY", `Metadata key "${key}" is not supported on ${target} (expected alias or description)`);
    this.name = "UnsupportedMetadataKeyError";
    this.key = key;
    this.target = target;
  }
}

/** A reference that can never resolve, or an extension of a definition that does not exist. */
export class UnknownTypeReferenceError extends StreamshapeError {
  readonly reference: string;
  constructor(reference: string, message?: string) {
    super("UNKNOWN_TYPE_REFERENCE", message ?? `Unknown type reference "${reference}"`);
    this.name = "UnknownTypeReferenceError";
    this.reference = reference;
  }
}

export interface DanglingReference {
  /** Where the reference was declared, e.g. `User.address`. */
  readonly location: string;
  readonly reference: string;
  readonly reason: string;
}

/** Raised by `snapshot()` with every dangling or invalid reference found. */
export class UnresolvedTypeReferenceError extends StreamshapeError {
  readonly references: readonly DanglingReference[];
  constructor(references: readonly DanglingReference[]) {
    const lines = references.map((r) => `  ${r.location}: ${r.reference} (${r.reason})`);
    super("UNRESOLVED_TYPE_REFERENCE", `Schema has ${references.length} unresolved reference(s):\n${lines.join("\n")}`);
    this.name = "UnresolvedTypeReferenceError";
    this.references = references;
  }
}

/** A class requires itself through required properties, so no finite value exists. */
export class CyclicDefinitionError extends StreamshapeError {
  readonly cycle: readonly string[];
  constructor(cycle: readonly string[]) {
    super("CYCLIC_DEFINITION", `Class cycle through required properties: ${cycle.join(" -> ")}`);
    this.name = "CyclicDefinitionError";
    this.cycle = cycle;
  }
}

// ─── Dispatch (operation registry) ─────────────────────────────────

export class DuplicateVersionError extends StreamshapeError {
  readonly operation: string;
  readonly version: string;
  constructor(operation: string, version: string) {
    super("DUPLICATE_VERSION", `Operation "${operation}" already has a version "${version}"`);
    this.name = "DuplicateVersionError";
    this.operation = operation;
    this.version = version;
  }
}

export class UnknownOperationError extends StreamshapeError {
  readonly operation: string;
  constructor(operation: string, reason = "has no registered implementations") {
    super("UNKNOWN_OPERATION", `Operation "${operation}" ${reason}`);
    this.name = "UnknownOperationError";
    this.operation = operation;
  }
}

export class UnknownVersionError extends StreamshapeError {
  readonly operation: string;
  readonly version: string;
  readonly available: readonly string[];
  constructor(operation: string, version: string, available: readonly string[]) {
    super(
      "UNKNOWN_VERSION",
      `Operation "${operation}" has no version "${version}" (available: ${available.length > 0 ? available.join(", ") : "none"})`,
    );
    this.name = "UnknownVersionError";
    this.operation = operation;
    this.version = version;
    this.available = available;
  }
}

/** Thrown when a binding fails to produce its raw payload. */
export class InvocationError extends StreamshapeError {
  readonly operation: string;
  readonly version: string;
  constructor(operation: string, version: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("INVOCATION_ERROR", `Operation "${operation}" (${version}) failed: ${detail}`, { cause });
    this.name = "InvocationError";
    this.operation = operation;
    this.version = version;
  }
}

// ─── Decode ────────────────────────────────────────────────────────

export interface UnresolvedPath {
  readonly path: string;
  readonly reason: string;
}

/** Required values were still unresolved at end-of-input. */
export class IncompleteValueError extends StreamshapeError {
  readonly unresolved: readonly UnresolvedPath[];
  constructor(unresolved: readonly UnresolvedPath[]) {
    super(
      "INCOMPLETE_VALUE",
      `Unresolved required value(s): ${unresolved.map((u) => `${u.path} (${u.reason})`).join("; ")}`,
    );
    this.name = "IncompleteValueError";
    this.unresolved = unresolved;
  }

  get paths(): string[] {
    return this.unresolved.map((u) => u.path);
  }
}

/** Decode errors as seen at the operation boundary. */
export class DecodeFailure extends StreamshapeError {
  readonly typeName: string;
  readonly paths: readonly string[];
  readonly detail: string;
  constructor(typeName: string, paths: readonly string[], detail: string, cause?: unknown) {
    super("DECODE_FAILURE", `Failed to decode ${typeName}: ${detail}`, { cause });
    this.name = "DecodeFailure";
    this.typeName = typeName;
    this.paths = paths;
    this.detail = detail;
  }
}

/**
 * An emitted value broke monotonicity or convergence. This signals a defect in
 * the decoder, never bad input.
 */
export class ConvergenceViolationError extends StreamshapeError {
  readonly path: string;
  constructor(path: string, message: string) {
    super("CONVERGENCE_VIOLATION", `Convergence violated at ${path}: ${message}`);
    this.name = "ConvergenceViolationError";
    this.path = path;
  }
}

export class InvalidStateError extends StreamshapeError {
  readonly state: string;
  constructor(state: string, message: string) {
    super("INVALID_STATE", message);
    this.name = "InvalidStateError";
    this.state = state;
  }
}

// ─── Input validation ──────────────────────────────────────────────

/** Thrown when configuration, arguments or a type expression fail validation. */
export class ValidationError extends StreamshapeError {
  readonly field?: string;
  constructor(message: string, field?: string) {
    super("VALIDATION_ERROR", field ? `Invalid "${field}": ${message}` : message);
    this.name = "ValidationError";
    this.field = field;
  }
}
