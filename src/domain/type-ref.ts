// =============================================================================
// TypeRef — Declared types of properties and operation results
// =============================================================================

import type { MediaKind } from "./media.js";

export type PrimitiveName = "string" | "int" | "float" | "bool" | "null";

export type LiteralValue = string | number | boolean;

export type TypeRef =
  | { readonly kind: "primitive"; readonly name: PrimitiveName }
  | { readonly kind: "literal"; readonly value: LiteralValue }
  /** A class or enum, resolved by name against a schema snapshot. */
  | { readonly kind: "ref"; readonly name: string }
  | { readonly kind: "media"; readonly media: MediaKind }
  | { readonly kind: "optional"; readonly inner: TypeRef }
  | { readonly kind: "list"; readonly element: TypeRef }
  | { readonly kind: "map"; readonly key: TypeRef; readonly value: TypeRef }
  | { readonly kind: "union"; readonly members: readonly TypeRef[] };

export type TypeRefKind = TypeRef["kind"];

export const PRIMITIVE_NAMES: readonly PrimitiveName[] = ["string", "int", "float", "bool", "null"];

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}

/**
 * Constructors for type references.
 *
 * @example
 * ```ts
 * t.optional(t.list(t.ref("Address")))   // Address[]?
 * t.map(t.string(), t.int())             // map<string, int>
 * ```
 */
export const t = {
  string: (): TypeRef => ({ kind: "primitive", name: "string" }),
  int: (): TypeRef => ({ kind: "primitive", name: "int" }),
  float: (): TypeRef => ({ kind: "primitive", name: "float" }),
  bool: (): TypeRef => ({ kind: "primitive", name: "bool" }),
  null: (): TypeRef => ({ kind: "primitive", name: "null" }),
  literal: (value: LiteralValue): TypeRef => ({ kind: "literal", value }),
  ref: (name: string): TypeRef => ({ kind: "ref", name }),
  image: (): TypeRef => ({ kind: "media", media: "image" }),
  audio: (): TypeRef => ({ kind: "media", media: "audio" }),
  optional: (inner: TypeRef): TypeRef => (inner.kind === "optional" ? inner : { kind: "optional", inner }),
  list: (element: TypeRef): TypeRef => ({ kind: "list", element }),
  map: (key: TypeRef, value: TypeRef): TypeRef => ({ kind: "map", key, value }),
  union: (...members: TypeRef[]): TypeRef => ({ kind: "union", members }),
} as const;

/** True when an absent value is acceptable (optional, null, or a union admitting either). */
export function isOptional(ref: TypeRef): boolean {
  switch (ref.kind) {
    case "optional":
      return true;
    case "primitive":
      return ref.name === "null";
    case "union":
      return ref.members.some(isOptional);
    default:
      return false;
  }
}

/** Every class/enum name the reference mentions, in order of appearance. */
export function referencedNames(ref: TypeRef): string[] {
  const names: string[] = [];
  const visit = (r: TypeRef): void => {
    switch (r.kind) {
      case "ref":
        names.push(r.name);
        break;
      case "optional":
        visit(r.inner);
        break;
      case "list":
        visit(r.element);
        break;
      case "map":
        visit(r.key);
        visit(r.value);
        break;
      case "union":
        r.members.forEach(visit);
        break;
      default:
        break;
    }
  };
  visit(ref);
  return names;
}

function renderLiteral(value: LiteralValue): string {
  return typeof value === "string" ? JSON.stringify(value) : String(value);
}

function needsParens(ref: TypeRef): boolean {
  return ref.kind === "union" || ref.kind === "optional";
}

/**
 * Canonical text of a type reference; {@link parseTypeExpression} reads it back.
 *
 * `int?`, `string[]`, `(int | string)[]`, `map<string, User>`, `"draft" | "final"`.
 */
export function typeName(ref: TypeRef): string {
  switch (ref.kind) {
    case "primitive":
      return ref.name;
    case "literal":
      return renderLiteral(ref.value);
    case "ref":
      return ref.name;
    case "media":
      return ref.media;
    case "optional":
      return ref.inner.kind === "union" ? `(${typeName(ref.inner)})?` : `${typeName(ref.inner)}?`;
    case "list":
      return needsParens(ref.element) ? `(${typeName(ref.element)})[]` : `${typeName(ref.element)}[]`;
    case "map":
      return `map<${typeName(ref.key)}, ${typeName(ref.value)}>`;
    case "union":
      return ref.members.map((m) => (m.kind === "union" ? `(${typeName(m)})` : typeName(m))).join(" | ");
  }
}

export function typeRefEquals(a: TypeRef, b: TypeRef): boolean {
  return typeName(a) === typeName(b);
}
