// =============================================================================
// Partial JSON Port — Contract for lenient, incremental payload parsing
// =============================================================================

/**
 * Parse tree of a possibly incomplete, possibly malformed payload.
 *
 * `complete` tells whether more input could still change the node: a quoted
 * string is complete once its closing quote is seen, a bare token once a
 * delimiter follows it, a container once it is closed (or at end-of-input).
 */
export type JsonishNode =
  | JsonishObject
  | JsonishArray
  | JsonishString
  | JsonishNumber
  | JsonishBoolean
  | JsonishNull;

export interface JsonishObject {
  readonly kind: "object";
  readonly complete: boolean;
  readonly entries: readonly JsonishEntry[];
}

export interface JsonishEntry {
  readonly key: string;
  /** Undefined while the key has been read but its value has not started. */
  readonly value?: JsonishNode;
}

export interface JsonishArray {
  readonly kind: "array";
  readonly complete: boolean;
  readonly items: readonly JsonishNode[];
}

export interface JsonishString {
  readonly kind: "string";
  readonly complete: boolean;
  readonly value: string;
  /** False for bare words such as `{name: Alice}`. */
  readonly quoted: boolean;
}

export interface JsonishNumber {
  readonly kind: "number";
  readonly complete: boolean;
  readonly value: number;
  readonly raw: string;
}

export interface JsonishBoolean {
  readonly kind: "boolean";
  readonly complete: boolean;
  readonly value: boolean;
}

export interface JsonishNull {
  readonly kind: "null";
  readonly complete: boolean;
}

/**
 * Where the value begins inside surrounding prose: at the first `{`, at the
 * first `[`, at whichever of the two comes first, or at the first non-blank
 * character.
 */
export type ValueStart = "object" | "array" | "container" | "any";

export interface PartialJsonParseOptions {
  /** End-of-input has been signalled: bare tokens and open containers are complete. */
  final?: boolean;
  expect?: ValueStart;
}

export interface PartialJsonPort {
  /** Parse the accumulated payload; `undefined` when no value has started yet. Never throws. */
  parse(text: string, options?: PartialJsonParseOptions): JsonishNode | undefined;
}
