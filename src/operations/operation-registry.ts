// =============================================================================
// OperationRegistry — Named operations bound to versioned implementations
// =============================================================================

import {
  DecodeFailure,
  DuplicateVersionError,
  UnknownOperationError,
  UnknownTypeReferenceError,
  UnknownVersionError,
  ValidationError,
} from "../errors.js";
import { DEFAULT_RUNTIME_CONFIG, type RuntimeConfig } from "../config/runtime-config.js";
import { parseTypeExpression } from "../domain/type-expr.js";
import { referencedNames, typeName, type TypeRef } from "../domain/type-ref.js";
import type { DecodedValue } from "../decoder/values.js";
import { bindLogger, createConsoleLogger, type BoundLogger, type Logger } from "../logging/logger.js";
import { SchemaRegistry } from "../schema/schema-registry.js";
import type { SchemaSnapshot } from "../schema/snapshot.js";
import { toZodSchema } from "../schema/zod-bridge.js";
import { StreamHandle } from "./stream-handle.js";
import type {
  ImplementationBinding,
  InvokeOptions,
  OperationDeclaration,
  ResolvedBinding,
  SelectionStrategy,
  TypedInvokeOptions,
} from "./types.js";

export interface OperationRegistryOptions {
  /**
   * Schema the results decode against. A registry is snapshotted on every
   * invocation, so definitions added later are picked up.
   */
  schema: SchemaSnapshot | SchemaRegistry;
  /** Log sink (defaults to a console logger at the configured level) */
  logger?: Logger;
  config?: RuntimeConfig;
}

interface ResolvedParam {
  readonly name: string;
  readonly type: TypeRef;
}

interface OperationEntry {
  params?: readonly ResolvedParam[];
  strategy?: SelectionStrategy;
  /** Calls served so far under round-robin */
  turn: number;
  /** Insertion-ordered by version */
  readonly bindings: Map<string, { readonly returns: TypeRef; readonly binding: ImplementationBinding }>;
}

function toTypeRef(ref: TypeRef | string): TypeRef {
  return typeof ref === "string" ? parseTypeExpression(ref) : ref;
}

/**
 * Maps operation names to one or more interchangeable implementations.
 *
 * @example
 * ```ts
 * const operations = new OperationRegistry({ schema: snapshot });
 * operations.register("ExtractUser", "v1", { returns: "User", invoke: ([text]) => callModel(text) });
 * const user = await operations.call("ExtractUser", ["Ada, 36"]);
 * ```
 */
export class OperationRegistry {
  private readonly operations = new Map<string, OperationEntry>();
  private readonly schema: SchemaSnapshot | SchemaRegistry;
  private readonly config: RuntimeConfig;
  private readonly logger: Logger;
  private readonly log: BoundLogger;

  constructor(options: OperationRegistryOptions) {
    this.schema = options.schema;
    this.config = options.config ?? DEFAULT_RUNTIME_CONFIG;
    this.logger = options.logger ?? createConsoleLogger({ level: this.config.logLevel });
    this.log = bindLogger(this.logger);
  }

  /** Declare an operation, optionally with positional parameter types and a selection strategy. */
  declare(name: string, declaration: OperationDeclaration = {}): this {
    if (name.length === 0) throw new ValidationError("operation name must not be empty", "operation");
    const entry = this.entry(name);
    if (declaration.params) {
      entry.params = declaration.params.map((p) => ({ name: p.name, type: toTypeRef(p.type) }));
    }
    if (declaration.strategy) entry.strategy = declaration.strategy;
    return this;
  }

  /**
   * Append an implementation.
   *
   * @throws DuplicateVersionError when `version` is already registered for `name`
   */
  register(name: string, version: string, binding: ImplementationBinding): this {
    if (name.length === 0) throw new ValidationError("operation name must not be empty", "operation");
    if (version.length === 0) throw new ValidationError("version must not be empty", `${name}.version`);
    const entry = this.entry(name);
    if (entry.bindings.has(version)) throw new DuplicateVersionError(name, version);

    const returns = toTypeRef(binding.returns);
    if (!(this.schema instanceof SchemaRegistry)) this.assertResolvable(returns, this.schema);
    entry.bindings.set(version, { returns, binding });
    this.log.debug("operation:register", { operation: name, version, returns: typeName(returns) });
    return this;
  }

  has(name: string): boolean {
    return this.operations.has(name);
  }

  /** Registered versions of `name`, in registration order. */
  versions(name: string): string[] {
    return [...(this.operations.get(name)?.bindings.keys() ?? [])];
  }

  /**
   * Pick the implementation for a call: the exact `version`, or the one the
   * declared strategy would use next. Without a strategy the configured
   * default applies (first registered unless configured otherwise).
   * Resolving does not advance a round-robin rotation.
   */
  resolve(name: string, version?: string): ResolvedBinding {
    const entry = this.operations.get(name);
    if (!entry) throw new UnknownOperationError(name, "is not registered");
    const available = [...entry.bindings.keys()];
    if (available.length === 0) throw new UnknownOperationError(name);

    const chosen = version ?? this.defaultVersion(entry, available);
    const found = entry.bindings.get(chosen);
    if (!found) throw new UnknownVersionError(name, chosen, available);
    return { operation: name, version: chosen, returns: found.returns, binding: found.binding };
  }

  /** Invoke and return the final decoded value. */
  call(name: string, args?: readonly unknown[], options?: InvokeOptions): Promise<DecodedValue>;
  call<T>(name: string, args: readonly unknown[], options: TypedInvokeOptions<T>): Promise<T>;
  async call<T>(
    name: string,
    args: readonly unknown[] = [],
    options: InvokeOptions & { schema?: TypedInvokeOptions<T>["schema"] } = {},
  ): Promise<T | DecodedValue> {
    const { schema, ...rest } = options;
    return schema ? this.stream(name, args, { ...rest, schema }).final() : this.stream(name, args, rest).final();
  }

  /**
   * Start a streaming invocation. Resolution and argument validation happen
   * now; the binding runs once the handle is iterated.
   */
  stream(name: string, args?: readonly unknown[], options?: InvokeOptions): StreamHandle<DecodedValue>;
  stream<T>(name: string, args: readonly unknown[], options: TypedInvokeOptions<T>): StreamHandle<T>;
  stream<T>(
    name: string,
    args: readonly unknown[] = [],
    options: InvokeOptions & { schema?: TypedInvokeOptions<T>["schema"] } = {},
  ): StreamHandle<T> | StreamHandle<DecodedValue> {
    const candidates = this.plan(name, options.version);
    const snapshot = this.currentSnapshot();
    for (const candidate of candidates) this.assertResolvable(candidate.returns, snapshot);
    this.validateArgs(name, args, snapshot);

    const run = {
      candidates,
      args,
      snapshot,
      decoder: this.config.decoder,
      logger: this.logger,
      log: this.log,
      signal: options.signal,
    };
    const schema = options.schema;
    if (!schema) return new StreamHandle<DecodedValue>(run, (value) => value);

    return new StreamHandle<T>(run, (value, resolved) => {
      const result = schema.safeParse(value);
      if (result.success) return result.data;
      const issue = result.error.issues[0];
      const paths = issue && issue.path.length > 0 ? [issue.path.join(".")] : [];
      throw new DecodeFailure(typeName(resolved.returns), paths, `value does not match the requested schema: ${issue?.message ?? "invalid"}`, result.error);
    });
  }

  private defaultVersion(entry: OperationEntry, available: readonly string[]): string {
    if (entry.strategy === "round-robin") return available[entry.turn % available.length];
    if (entry.strategy === "fallback") return available[0];
    return this.config.defaultVersion === "last" ? available[available.length - 1] : available[0];
  }

  /** Bindings one invocation may use, in the order they are tried. */
  private plan(name: string, version?: string): [ResolvedBinding, ...ResolvedBinding[]] {
    const first = this.resolve(name, version);
    const entry = this.operations.get(name);
    if (version !== undefined || !entry) return [first];
    if (entry.strategy === "round-robin") {
      entry.turn++;
      return [first];
    }
    if (entry.strategy !== "fallback") return [first];
    const rest = this.versions(name)
      .filter((v) => v !== first.version)
      .map((v) => this.resolve(name, v));
    return [first, ...rest];
  }

  private entry(name: string): OperationEntry {
    let entry = this.operations.get(name);
    if (!entry) {
      entry = { turn: 0, bindings: new Map() };
      this.operations.set(name, entry);
    }
    return entry;
  }

  private currentSnapshot(): SchemaSnapshot {
    return this.schema instanceof SchemaRegistry ? this.schema.snapshot() : this.schema;
  }

  private assertResolvable(type: TypeRef, snapshot: SchemaSnapshot): void {
    for (const ref of referencedNames(type)) {
      if (!snapshot.lookup(ref)) {
        throw new UnknownTypeReferenceError(ref, `Type "${typeName(type)}" refers to "${ref}", which the schema does not define`);
      }
    }
  }

  private validateArgs(name: string, args: readonly unknown[], snapshot: SchemaSnapshot): void {
    const params = this.operations.get(name)?.params;
    if (!params) return;
    if (args.length > params.length) {
      throw new ValidationError(`expected at most ${params.length} argument(s), got ${args.length}`, `${name}.args`);
    }
    params.forEach((param, i) => {
      this.assertResolvable(param.type, snapshot);
      const result = toZodSchema(snapshot, param.type).safeParse(args[i]);
      if (!result.success) {
        throw new ValidationError(result.error.issues[0]?.message ?? "invalid argument", `${name}.${param.name}`);
      }
    });
  }
}
