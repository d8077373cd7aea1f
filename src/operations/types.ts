// =============================================================================
// Operation types — Bindings, invocation context and stream events
// =============================================================================

import type { ZodType, ZodTypeDef } from "zod";

import type { TypeRef } from "../domain/type-ref.js";
import type { DecodedValue } from "../decoder/values.js";
import type { SchemaSnapshot } from "../schema/snapshot.js";

/** What a binding hands back: the whole payload at once, or increments. */
export type RawPayload = string | Promise<string> | AsyncIterable<string>;

export interface InvocationContext {
  readonly operation: string;
  readonly version: string;
  readonly snapshot: SchemaSnapshot;
  readonly target: TypeRef;
  /** Prompt-ready description of the expected output */
  readonly outputFormat: string;
  /** Aborted when the stream handle is cancelled or the caller's signal fires */
  readonly signal: AbortSignal;
}

export interface ImplementationBinding {
  /** Declared result type, as a reference or a type expression such as `"User[]"` */
  readonly returns: TypeRef | string;
  invoke(args: readonly unknown[], context: InvocationContext): RawPayload;
}

export interface ParamSpec {
  readonly name: string;
  readonly type: TypeRef | string;
}

/**
 * How a call without an explicit version picks among registered versions.
 * `fallback` tries them in registration order until one succeeds;
 * `round-robin` rotates through them, one per call.
 */
export type SelectionStrategy = "fallback" | "round-robin";

export interface OperationDeclaration {
  /** Positional parameters; calls are validated against them */
  readonly params?: readonly ParamSpec[];
  readonly strategy?: SelectionStrategy;
}

export interface ResolvedBinding {
  readonly operation: string;
  readonly version: string;
  readonly returns: TypeRef;
  readonly binding: ImplementationBinding;
}

export interface InvokeOptions {
  /** Exact version; the configured default policy applies when omitted */
  version?: string;
  /** Aborts the binding and the stream */
  signal?: AbortSignal;
}

export interface TypedInvokeOptions<T> extends InvokeOptions {
  /** Validates and types the final value */
  schema: ZodType<T, ZodTypeDef, unknown>;
}

export type StreamEvent<T = DecodedValue> =
  | { readonly type: "partial"; readonly value: DecodedValue }
  | { readonly type: "final"; readonly value: T };

export type StreamStatus = "idle" | "running" | "completed" | "failed" | "cancelled";
