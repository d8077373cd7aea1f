// =============================================================================
// describe() — Deterministic text rendering of every class and enum
// =============================================================================
//
// SchemaRegistry(
//   Classes: [
//     User (description='A person') {
//       name: string (alias='username', description='Full name'),
//       age: int?
//     },
//     Empty {}
//   ],
//   Enums: [
//     Status {
//       ACTIVE (alias='active'),
//       INACTIVE
//     }
//   ]
// )
//
// =============================================================================

import { typeName, type TypeRef } from "../domain/type-ref.js";
import type { Meta } from "./types.js";

export interface DescribableProperty {
  readonly name: string;
  readonly type?: TypeRef;
  readonly meta: Meta;
}

export interface DescribableClass {
  readonly name: string;
  readonly meta: Meta;
  readonly properties: Iterable<DescribableProperty>;
}

export interface DescribableEnum {
  readonly name: string;
  readonly meta: Meta;
  readonly values: Iterable<{ readonly name: string; readonly meta: Meta }>;
}

const UNSET = "<unset>";

export function renderMeta(meta: Meta): string {
  const parts = Object.entries(meta)
    .filter((entry): entry is [string, string] => typeof entry[1] === "string")
    .map(([key, value]) => `${key}='${value}'`);
  return parts.length > 0 ? ` (${parts.join(", ")})` : "";
}

function renderBlock(header: string, lines: string[]): string {
  if (lines.length === 0) return `${header} {}`;
  return `${header} {\n${lines.map((l) => `      ${l}`).join(",\n")}\n    }`;
}

function renderClass(cls: DescribableClass): string {
  const lines = [...cls.properties].map((p) => {
    const type = p.type ? typeName(p.type) : UNSET;
    return `${p.name}: ${type}${renderMeta(p.meta)}`;
  });
  return renderBlock(`${cls.name}${renderMeta(cls.meta)}`, lines);
}

function renderEnum(enm: DescribableEnum): string {
  const lines = [...enm.values].map((v) => `${v.name}${renderMeta(v.meta)}`);
  return renderBlock(`${enm.name}${renderMeta(enm.meta)}`, lines);
}

function renderSection(title: string, items: string[]): string {
  return `  ${title}: [\n${items.map((i) => `    ${i}`).join(",\n")}\n  ]`;
}

export function describeSchema(
  classes: Iterable<DescribableClass>,
  enums: Iterable<DescribableEnum>,
): string {
  const sections: string[] = [];
  const renderedClasses = [...classes].map(renderClass);
  const renderedEnums = [...enums].map(renderEnum);
  if (renderedClasses.length > 0) sections.push(renderSection("Classes", renderedClasses));
  if (renderedEnums.length > 0) sections.push(renderSection("Enums", renderedEnums));
  if (sections.length === 0) return "SchemaRegistry()";
  return `SchemaRegistry(\n${sections.join(",\n")}\n)`;
}
