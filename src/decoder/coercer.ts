// =============================================================================
// Coercer — Maps a jsonish tree onto a declared type, leniently
// =============================================================================
//
// One pass per increment. Results are three-valued: a value (possibly
// partial), pending (more input may resolve it) or failed. A leaf only
// resolves from a complete node, so an emitted leaf never changes later.
//
// =============================================================================

import type { DecoderOptions } from "../config/runtime-config.js";
import type { UnresolvedPath } from "../errors.js";
import { MediaValue, type MediaKind } from "../domain/media.js";
import { isOptional, typeName, type LiteralValue, type PrimitiveName, type TypeRef } from "../domain/type-ref.js";
import type { JsonishEntry, JsonishNode, JsonishObject } from "../ports/partial-json.port.js";
import type { SchemaSnapshot } from "../schema/snapshot.js";
import type { ClassDef, EnumDef, PropertyDef } from "../schema/types.js";
import { childPath, displayPath, indexPath, type DecodedObject, type DecodedValue } from "./values.js";

export type Coerced =
  | { readonly kind: "value"; readonly value: DecodedValue; readonly leaves: number }
  | { readonly kind: "pending" }
  | {
      readonly kind: "failed";
      readonly reason: string;
      readonly unresolved: readonly UnresolvedPath[];
      /** An optional value cannot absorb it at end-of-input */
      readonly hard?: boolean;
    };

export interface LocalFailure {
  readonly path: string;
  readonly reason: string;
  readonly hard: boolean;
}

/** Decisions that must hold for the rest of a decode session. */
export interface CoercionState {
  /** Keyed by `path::type` so union members at one path do not share failures. */
  readonly failures: Map<string, LocalFailure>;
  /** Union member index per `path::type`, fixed once it produced a leaf. */
  readonly unionChoices: Map<string, number>;
}

export function createCoercionState(): CoercionState {
  return { failures: new Map(), unionChoices: new Map() };
}

function forkState(state: CoercionState): CoercionState {
  return { failures: new Map(state.failures), unionChoices: new Map(state.unionChoices) };
}

function adoptState(target: CoercionState, source: CoercionState): void {
  target.failures.clear();
  for (const [key, failure] of source.failures) target.failures.set(key, failure);
  target.unionChoices.clear();
  for (const [key, choice] of source.unionChoices) target.unionChoices.set(key, choice);
}

interface UnionCandidate {
  readonly index: number;
  readonly result: Extract<Coerced, { kind: "value" }>;
  readonly state: CoercionState;
}

const PENDING: Coerced = { kind: "pending" };
const INTEGER_TEXT = /^-?\d+(?:\.0+)?$/;
const NUMBER_TEXT = /^-?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const URI_TEXT = /^[a-z][a-z0-9+.-]*:\S+$/i;

function value(v: DecodedValue, leaves = 1): Coerced {
  return { kind: "value", value: v, leaves };
}

function nodeKind(node: JsonishNode): string {
  return node.kind === "string" && !node.quoted ? "text" : node.kind;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function containsWord(text: string, word: string, ignoreCase: boolean): boolean {
  const pattern = new RegExp(`(?<![A-Za-z0-9_])${escapeRegExp(word)}(?![A-Za-z0-9_])`, ignoreCase ? "i" : "");
  return pattern.test(text);
}

/**
 * Coerces one jsonish tree. A new instance is made per pass; everything that
 * must survive between passes lives in the {@link CoercionState}.
 */
export class Coercer {
  constructor(
    private readonly snapshot: SchemaSnapshot,
    private readonly options: DecoderOptions,
    private readonly final: boolean,
  ) {}

  coerce(node: JsonishNode | undefined, type: TypeRef, path: string, state: CoercionState, strict = false): Coerced {
    if (type.kind === "optional") return this.coerceOptional(node, type.inner, path, state, strict);
    if (type.kind === "union") return this.coerceUnion(node, type, path, state, strict);
    if (node === undefined) return this.missing(type, path);

    switch (type.kind) {
      case "primitive":
        return this.coercePrimitive(node, type.name, path, state, strict);
      case "literal":
        return this.coerceLiteral(node, type.value, path, state, strict);
      case "media":
        return this.coerceMedia(node, type.media, path, state);
      case "list":
        return this.coerceList(node, type.element, path, state, strict);
      case "map":
        return this.coerceMap(node, type, path, state, strict);
      case "ref": {
        const def = this.snapshot.resolve(type.name);
        return def.kind === "class"
          ? this.coerceClass(node, def, path, state, strict)
          : this.coerceEnum(node, def, path, state, strict);
      }
    }
  }

  // ─── Absence & failure ─────────────────────────────────────────────

  private missing(type: TypeRef, path: string): Coerced {
    if (!this.final) return PENDING;
    if (isOptional(type)) return value(null);
    return this.unresolved(path, "missing");
  }

  private unresolved(path: string, reason: string, hard = false): Coerced {
    return { kind: "failed", reason, unresolved: [{ path: displayPath(path), reason }], hard };
  }

  /** Records a sticky local failure for a complete node that cannot become `type`. */
  private fail(state: CoercionState, path: string, type: TypeRef, reason: string, hard = false): Coerced {
    const key = `${path}::${typeName(type)}`;
    if (!state.failures.has(key)) state.failures.set(key, { path: displayPath(path), reason, hard });
    return this.unresolved(path, reason, hard);
  }

  private sticky(state: CoercionState, path: string, type: TypeRef): Coerced | undefined {
    const failure = state.failures.get(`${path}::${typeName(type)}`);
    return failure ? this.unresolved(path, failure.reason, failure.hard) : undefined;
  }

  /** Incomplete leaf node: wait, or give up at end-of-input. */
  private incomplete(path: string): Coerced {
    return this.final ? this.unresolved(path, "incomplete value") : PENDING;
  }

  // ─── Leaves ────────────────────────────────────────────────────────

  private coercePrimitive(
    node: JsonishNode,
    name: PrimitiveName,
    path: string,
    state: CoercionState,
    strict: boolean,
  ): Coerced {
    const type: TypeRef = { kind: "primitive", name };
    const known = this.sticky(state, path, type);
    if (known) return known;
    if (!node.complete) return this.incomplete(path);

    const mismatch = (): Coerced => this.fail(state, path, type, `expected ${name}, got ${nodeKind(node)}`);
    switch (name) {
      case "string":
        if (node.kind === "string") return value(node.value);
        if (strict) return mismatch();
        if (node.kind === "number") return value(node.raw);
        if (node.kind === "boolean") return value(String(node.value));
        return mismatch();
      case "int": {
        if (node.kind === "number") {
          if (!Number.isInteger(node.value)) return this.fail(state, path, type, `expected int, got ${node.raw}`);
          return Number.isSafeInteger(node.value) ? value(node.value) : this.fail(state, path, type, `int ${node.raw} is out of range`);
        }
        const text = node.kind === "string" && !strict ? node.value.trim() : undefined;
        if (text === undefined || !INTEGER_TEXT.test(text)) return mismatch();
        return Number.isSafeInteger(Number(text)) ? value(Number(text)) : this.fail(state, path, type, `int ${text} is out of range`);
      }
      case "float": {
        if (node.kind === "number") return value(node.value);
        const text = node.kind === "string" && !strict ? node.value.trim() : undefined;
        if (text !== undefined && NUMBER_TEXT.test(text)) return value(Number(text));
        return mismatch();
      }
      case "bool": {
        if (node.kind === "boolean") return value(node.value);
        const text = node.kind === "string" && !strict ? node.value.trim().toLowerCase() : undefined;
        if (text === "true" || text === "false") return value(text === "true");
        return mismatch();
      }
      case "null":
        return node.kind === "null" ? value(null) : mismatch();
    }
  }

  private coerceLiteral(
    node: JsonishNode,
    literal: LiteralValue,
    path: string,
    state: CoercionState,
    strict: boolean,
  ): Coerced {
    const type: TypeRef = { kind: "literal", value: literal };
    const known = this.sticky(state, path, type);
    if (known) return known;
    if (!node.complete) return this.incomplete(path);

    if ((node.kind === "string" || node.kind === "number" || node.kind === "boolean") && node.value === literal) {
      return value(literal);
    }
    if (!strict && node.kind === "string") {
      const text = node.value.trim();
      const matches =
        typeof literal === "string" ? text.toLowerCase() === literal.toLowerCase() : text === String(literal);
      if (matches) return value(literal);
    }
    return this.fail(state, path, type, `expected ${typeName(type)}`);
  }

  private coerceEnum(node: JsonishNode, def: EnumDef, path: string, state: CoercionState, strict: boolean): Coerced {
    const type: TypeRef = { kind: "ref", name: def.name };
    const known = this.sticky(state, path, type);
    if (known) return known;
    if (!node.complete) return this.incomplete(path);
    if (node.kind !== "string") return this.fail(state, path, type, `expected ${def.name}, got ${nodeKind(node)}`);

    const text = node.value.trim();
    const pick = (candidates: readonly string[]): Coerced | undefined => {
      const unique = [...new Set(candidates)];
      if (unique.length === 1) return value(unique[0]);
      if (unique.length > 1) {
        return this.fail(state, path, type, `ambiguous ${def.name} value "${text}" (${unique.join(", ")})`, true);
      }
      return undefined;
    };

    const exact = def.values.find((v) => v.name === text);
    if (exact) return value(exact.name);
    const byAlias = pick(def.values.filter((v) => v.meta.alias === text).map((v) => v.name));
    if (byAlias) return byAlias;

    if (!strict && this.options.caseInsensitiveEnums) {
      const lower = text.toLowerCase();
      const matched = pick(
        def.values
          .filter((v) => v.name.toLowerCase() === lower || v.meta.alias?.toLowerCase() === lower)
          .map((v) => v.name),
      );
      if (matched) return matched;
    }

    if (!strict && this.options.enumSubstringFallback) {
      const ignoreCase = this.options.caseInsensitiveEnums;
      const matched = pick(
        def.values
          .filter((v) => [v.name, v.meta.alias].some((w) => w !== undefined && w.length > 0 && containsWord(text, w, ignoreCase)))
          .map((v) => v.name),
      );
      if (matched) return matched;
    }

    return this.fail(state, path, type, `"${text}" is not a value of ${def.name}`);
  }

  private coerceMedia(node: JsonishNode, kind: MediaKind, path: string, state: CoercionState): Coerced {
    const type: TypeRef = { kind: "media", media: kind };
    const known = this.sticky(state, path, type);
    if (known) return known;
    if (!node.complete) return this.incomplete(path);

    if (node.kind === "string") {
      const text = node.value.trim();
      return URI_TEXT.test(text) ? value(MediaValue.fromUrl(kind, text)) : this.fail(state, path, type, `expected ${kind} URL`);
    }
    if (node.kind === "object") {
      const field = (name: string): string | undefined => {
        const entry = node.entries.find((e) => e.key === name);
        return entry?.value?.kind === "string" && entry.value.complete ? entry.value.value : undefined;
      };
      const url = field("url");
      const mediaType = field("mediaType") ?? field("media_type");
      if (url !== undefined) return value(MediaValue.fromUrl(kind, url, mediaType));
      const data = field("base64");
      if (data !== undefined && mediaType !== undefined) return value(MediaValue.fromBase64(kind, data, mediaType));
    }
    return this.fail(state, path, type, `expected ${kind}, got ${nodeKind(node)}`);
  }

  // ─── Containers ────────────────────────────────────────────────────

  private coerceOptional(
    node: JsonishNode | undefined,
    inner: TypeRef,
    path: string,
    state: CoercionState,
    strict: boolean,
  ): Coerced {
    if (node?.kind === "null" && node.complete) return value(null);
    if (node === undefined) return this.final ? value(null) : PENDING;
    const result = this.coerce(node, inner, path, state, strict);
    if (result.kind === "value") return result;
    if (!this.final) return PENDING;
    // a container may already have shown leaves, so it cannot silently become null
    if (result.kind === "failed" && (result.hard === true || node.kind === "object" || node.kind === "array")) return result;
    return value(null);
  }

  /** The entry for a property: first key equal to its name or alias, else first case-insensitive match. */
  private findEntry(node: JsonishObject, prop: PropertyDef, def: ClassDef): JsonishEntry | undefined {
    const names = [prop.name, prop.meta.alias].filter((n): n is string => n !== undefined);
    const exactElsewhere = (key: string): boolean =>
      def.properties.some((p) => p !== prop && (p.name === key || p.meta.alias === key));
    return node.entries.find(
      (e) =>
        names.includes(e.key) ||
        (!exactElsewhere(e.key) && names.some((n) => n.toLowerCase() === e.key.toLowerCase())),
    );
  }

  private coerceClass(node: JsonishNode, def: ClassDef, path: string, state: CoercionState, strict: boolean): Coerced {
    const type: TypeRef = { kind: "ref", name: def.name };
    if (node.kind !== "object") {
      if (!node.complete) return this.incomplete(path);
      return this.fail(state, path, type, `expected ${def.name} object, got ${nodeKind(node)}`);
    }

    const out: DecodedObject = {};
    const unresolved: UnresolvedPath[] = [];
    let leaves = 0;
    for (const prop of def.properties) {
      const propPath = childPath(path, prop.name);
      const result = this.coerce(this.findEntry(node, prop, def)?.value, prop.type, propPath, state, strict);
      if (result.kind === "value") {
        out[prop.name] = result.value;
        leaves += result.leaves;
      } else if (result.kind === "failed") {
        unresolved.push(...result.unresolved);
      } else if (this.final) {
        unresolved.push({ path: displayPath(propPath), reason: "incomplete value" });
      }
    }

    if (this.final && unresolved.length > 0) {
      return { kind: "failed", reason: `${def.name} is incomplete`, unresolved };
    }
    return value(out, leaves);
  }

  private coerceList(node: JsonishNode, element: TypeRef, path: string, state: CoercionState, strict: boolean): Coerced {
    if (node.kind !== "array") {
      if (strict || !this.options.singleValueAsList) {
        if (!node.complete) return this.incomplete(path);
        return this.fail(state, path, { kind: "list", element }, `expected list, got ${nodeKind(node)}`);
      }
      if (!node.complete) return this.incomplete(path);
      const single = this.coerce(node, element, indexPath(path, 0), state, strict);
      return single.kind === "value" ? value([single.value], single.leaves) : single;
    }

    const out: DecodedValue[] = [];
    let leaves = 0;
    for (const [i, item] of node.items.entries()) {
      const trailing = i === node.items.length - 1;
      if (!this.final && trailing && !item.complete) break;
      const result = this.coerce(item, element, indexPath(path, i), state, strict);
      if (result.kind !== "value") {
        if (this.final) {
          const unresolved =
            result.kind === "failed" ? result.unresolved : [{ path: displayPath(indexPath(path, i)), reason: "incomplete value" }];
          return { kind: "failed", reason: "list element unresolved", unresolved };
        }
        // later elements stay hidden behind the first unresolved one
        break;
      }
      out.push(result.value);
      leaves += result.leaves;
    }
    return value(out, leaves);
  }

  private coerceMap(
    node: JsonishNode,
    type: Extract<TypeRef, { kind: "map" }>,
    path: string,
    state: CoercionState,
    strict: boolean,
  ): Coerced {
    if (node.kind !== "object") {
      if (!node.complete) return this.incomplete(path);
      return this.fail(state, path, type, `expected map, got ${nodeKind(node)}`);
    }

    const out: DecodedObject = {};
    const unresolved: UnresolvedPath[] = [];
    let leaves = 0;
    for (const entry of node.entries) {
      const entryPath = childPath(path, entry.key);
      const key = this.coerceMapKey(entry.key, type.key, entryPath, state);
      if (key === undefined || Object.hasOwn(out, key)) continue;
      const result = this.coerce(entry.value, type.value, entryPath, state, strict);
      if (result.kind === "value") {
        out[key] = result.value;
        leaves += result.leaves;
      } else if (this.final) {
        unresolved.push(
          ...(result.kind === "failed" ? result.unresolved : [{ path: displayPath(entryPath), reason: "incomplete value" }]),
        );
      }
    }

    if (this.final && unresolved.length > 0) {
      return { kind: "failed", reason: "map is incomplete", unresolved };
    }
    return value(out, leaves);
  }

  /** Canonical key, or `undefined` (recorded as a local failure) when the key type rejects it. */
  private coerceMapKey(key: string, keyType: TypeRef, path: string, state: CoercionState): string | undefined {
    if (keyType.kind === "primitive") return key;
    const result = this.coerce({ kind: "string", complete: true, value: key, quoted: true }, keyType, path, state);
    return result.kind === "value" && typeof result.value === "string" ? result.value : undefined;
  }

  // ─── Unions ────────────────────────────────────────────────────────

  private coerceUnion(
    node: JsonishNode | undefined,
    type: Extract<TypeRef, { kind: "union" }>,
    path: string,
    state: CoercionState,
    strict: boolean,
  ): Coerced {
    const key = `${path}::${typeName(type)}`;
    const chosen = state.unionChoices.get(key);
    if (chosen !== undefined) return this.coerce(node, type.members[chosen], path, state, strict);
    if (node === undefined) return this.missing(type, path);

    const passes = strict ? [true] : [true, false];
    let anyPending = false;
    for (const strictPass of passes) {
      let best: UnionCandidate | undefined;
      for (const [index, member] of type.members.entries()) {
        const trial = forkState(state);
        const result = this.coerce(node, member, path, trial, strictPass);
        if (result.kind === "pending") anyPending = true;
        if (result.kind === "value" && (best === undefined || result.leaves > best.result.leaves)) {
          best = { index, result, state: trial };
        }
      }
      if (best) {
        adoptState(state, best.state);
        if (best.result.leaves > 0) state.unionChoices.set(key, best.index);
        return best.result;
      }
    }

    if (anyPending) return this.incomplete(path);
    return this.unresolved(path, `no member of ${typeName(type)} matched`);
  }
}
