// =============================================================================
// IncrementalDecoder — Partial typed values while a raw payload streams in
// =============================================================================

import { DEFAULT_DECODER_OPTIONS, type DecoderOptions } from "../config/runtime-config.js";
import { DecodeFailure, IncompleteValueError, InvalidStateError, UnknownTypeReferenceError } from "../errors.js";
import { createDefaultPartialJsonAdapter } from "../adapters/partial-json/default-partial-json.adapter.js";
import { referencedNames, typeName, type TypeRef } from "../domain/type-ref.js";
import { bindLogger, silentLogger, type BoundLogger, type Logger } from "../logging/logger.js";
import type { PartialJsonPort, ValueStart } from "../ports/partial-json.port.js";
import type { SchemaSnapshot } from "../schema/snapshot.js";
import { Coercer, createCoercionState, type Coerced, type CoercionState } from "./coercer.js";
import { ConvergenceTracker } from "./convergence-tracker.js";
import { collectLeaves, freezeValue, ROOT_PATH, sameLeaves, type DecodedLeaf, type DecodedValue } from "./values.js";

export type DecoderState = "empty" | "accumulating" | "finalizing" | "completed" | "failed";

export interface IncrementalDecoderOptions {
  snapshot: SchemaSnapshot;
  target: TypeRef;
  /** Overrides for the coercion policy (defaults: everything enabled) */
  options?: Partial<DecoderOptions>;
  logger?: Logger;
  /** Parser for the accumulated payload (defaults to the built-in lenient parser) */
  parser?: PartialJsonPort;
}

/** Where the value starts inside surrounding prose, from the shape of the target type. */
export function valueStartFor(snapshot: SchemaSnapshot, target: TypeRef, singleValueAsList: boolean): ValueStart {
  switch (target.kind) {
    case "optional":
      return valueStartFor(snapshot, target.inner, singleValueAsList);
    case "map":
      return "object";
    case "list":
      return singleValueAsList ? "container" : "array";
    case "ref":
      return snapshot.lookup(target.name)?.kind === "class" ? "object" : "any";
    default:
      return "any";
  }
}

/**
 * Decodes one invocation's raw payload against a target type.
 *
 * The whole accumulated payload is re-parsed on every `feed`, so a value
 * never depends on how the text was split into chunks.
 *
 * @example
 * ```ts
 * const decoder = new IncrementalDecoder({ snapshot, target: t.ref("User") });
 * decoder.feed('{"name": "A');   // {}
 * decoder.feed('lice"}');        // { name: "Alice" }
 * decoder.finish();              // { name: "Alice", age: null }
 * ```
 */
export class IncrementalDecoder {
  private readonly snapshot: SchemaSnapshot;
  private readonly target: TypeRef;
  private readonly options: DecoderOptions;
  private readonly parser: PartialJsonPort;
  private readonly expect: ValueStart;
  private readonly log: BoundLogger;
  private readonly coercion: CoercionState = createCoercionState();
  private readonly tracker: ConvergenceTracker | undefined;
  private readonly reported = new Set<string>();

  private buffer = "";
  private current: DecoderState = "empty";
  private lastLeaves: Map<string, DecodedLeaf> | undefined;

  constructor(config: IncrementalDecoderOptions) {
    for (const name of referencedNames(config.target)) {
      if (!config.snapshot.lookup(name)) {
        throw new UnknownTypeReferenceError(name, `Target type refers to "${name}", which the snapshot does not define`);
      }
    }
    this.snapshot = config.snapshot;
    this.target = config.target;
    this.options = { ...DEFAULT_DECODER_OPTIONS, ...config.options };
    this.parser = config.parser ?? createDefaultPartialJsonAdapter();
    this.expect = valueStartFor(this.snapshot, this.target, this.options.singleValueAsList);
    this.log = bindLogger(config.logger ?? silentLogger, { target: typeName(this.target) });
    this.tracker = this.options.verifyConvergence ? new ConvergenceTracker() : undefined;
  }

  get state(): DecoderState {
    return this.current;
  }

  /** Raw text received so far. */
  get received(): string {
    return this.buffer;
  }

  /**
   * Append a raw increment. Returns a new partial value when the resolved
   * leaves changed (or the value appeared for the first time), otherwise
   * `undefined`.
   */
  feed(chunk: string): DecodedValue | undefined {
    if (this.current !== "empty" && this.current !== "accumulating") {
      throw new InvalidStateError(this.current, `Cannot feed a decoder that is ${this.current}`);
    }
    if (chunk.length === 0) return undefined;
    this.buffer += chunk;
    this.current = "accumulating";

    const result = this.pass(false);
    if (result.kind !== "value") return undefined;

    const leaves = collectLeaves(result.value);
    if (this.lastLeaves && sameLeaves(this.lastLeaves, leaves)) return undefined;
    this.lastLeaves = leaves;

    const partial = freezeValue(result.value);
    this.tracker?.observePartial(partial);
    return partial;
  }

  /**
   * Signal end-of-input and produce the final value.
   *
   * @throws DecodeFailure wrapping {@link IncompleteValueError} when required values are unresolved
   */
  finish(): DecodedValue {
    if (this.current !== "empty" && this.current !== "accumulating") {
      throw new InvalidStateError(this.current, `Cannot finish a decoder that is ${this.current}`);
    }
    this.current = "finalizing";

    const result = this.pass(true);
    if (result.kind !== "value") {
      this.current = "failed";
      const unresolved =
        result.kind === "failed" ? result.unresolved : [{ path: ROOT_PATH, reason: "incomplete value" }];
      const cause = new IncompleteValueError(unresolved);
      throw new DecodeFailure(typeName(this.target), cause.paths, cause.message, cause);
    }

    const value = freezeValue(result.value);
    this.tracker?.observeFinal(value);
    this.current = "completed";
    this.log.debug("decode:complete", { bytes: this.buffer.length, leaves: collectLeaves(value).size });
    return value;
  }

  private pass(final: boolean): Coerced {
    const root = this.parser.parse(this.buffer, { final, expect: this.expect });
    const result = new Coercer(this.snapshot, this.options, final).coerce(root, this.target, "", this.coercion);
    this.reportFailures();
    return result;
  }

  private reportFailures(): void {
    for (const [key, failure] of this.coercion.failures) {
      if (this.reported.has(key)) continue;
      this.reported.add(key);
      this.log.debug("decode:local-failure", { path: failure.path, reason: failure.reason });
    }
  }
}
