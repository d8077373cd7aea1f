// =============================================================================
// Schema definitions — Immutable shapes held by a SchemaSnapshot
// =============================================================================

import { z } from "zod";

import type { TypeRef } from "../domain/type-ref.js";

/** The only metadata keys a definition accepts. */
export const MetaKeySchema = z.enum(["alias", "description"]);

export type MetaKey = z.infer<typeof MetaKeySchema>;

export interface Meta {
  readonly alias?: string;
  readonly description?: string;
}

export interface PropertyDef {
  readonly name: string;
  readonly type: TypeRef;
  readonly meta: Meta;
}

export interface ClassDef {
  readonly kind: "class";
  readonly name: string;
  readonly meta: Meta;
  readonly properties: readonly PropertyDef[];
}

export interface EnumValueDef {
  readonly name: string;
  readonly meta: Meta;
}

export interface EnumDef {
  readonly kind: "enum";
  readonly name: string;
  readonly meta: Meta;
  readonly values: readonly EnumValueDef[];
}

export type Definition = ClassDef | EnumDef;
