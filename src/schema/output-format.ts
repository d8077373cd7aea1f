// =============================================================================
// Output format — Prompt-ready description of a target type
// =============================================================================

import { typeName, type TypeRef } from "../domain/type-ref.js";
import type { SchemaSnapshot } from "./snapshot.js";
import type { ClassDef, EnumDef } from "./types.js";

export interface OutputFormatOptions {
  /** Indentation per nesting level (default: "  ") */
  indent?: string;
  /** Render `// description` lines above properties (default: true) */
  includeDescriptions?: boolean;
}

class OutputFormatRenderer {
  private readonly enums: EnumDef[] = [];
  private readonly deferred: ClassDef[] = [];
  private readonly stack: string[] = [];

  constructor(
    private readonly snapshot: SchemaSnapshot,
    private readonly indent: string,
    private readonly includeDescriptions: boolean,
  ) {}

  render(type: TypeRef, depth: number): string {
    switch (type.kind) {
      case "primitive":
      case "literal":
      case "media":
        return typeName(type);
      case "optional":
        return `${this.render(type.inner, depth)} or null`;
      case "list": {
        const element = this.render(type.element, depth);
        return type.element.kind === "union" || type.element.kind === "optional" ? `(${element})[]` : `${element}[]`;
      }
      case "map":
        return `map<${this.render(type.key, depth)}, ${this.render(type.value, depth)}>`;
      case "union":
        return type.members.map((m) => this.render(m, depth)).join(" or ");
      case "ref": {
        const def = this.snapshot.resolve(type.name);
        if (def.kind === "enum") {
          this.noteEnum(def);
          return def.name;
        }
        if (this.stack.includes(def.name)) {
          if (!this.deferred.includes(def)) this.deferred.push(def);
          return def.name;
        }
        return this.renderClass(def, depth);
      }
    }
  }

  renderClass(def: ClassDef, depth: number): string {
    this.stack.push(def.name);
    const pad = this.indent.repeat(depth + 1);
    const lines: string[] = [];
    for (const prop of def.properties) {
      if (this.includeDescriptions && prop.meta.description) lines.push(`${pad}// ${prop.meta.description}`);
      lines.push(`${pad}${prop.meta.alias ?? prop.name}: ${this.render(prop.type, depth + 1)},`);
    }
    this.stack.pop();
    if (lines.length === 0) return "{}";
    return `{\n${lines.join("\n")}\n${this.indent.repeat(depth)}}`;
  }

  /** Classes that refer back to themselves, rendered once each after the main body. */
  renderDeferred(): string[] {
    const blocks: string[] = [];
    for (let i = 0; i < this.deferred.length; i++) {
      const def = this.deferred[i];
      blocks.push(`${def.name} ${this.renderClass(def, 0)}`);
    }
    return blocks;
  }

  renderEnums(skip?: string): string[] {
    return this.enums.filter((e) => e.name !== skip).map((e) => renderEnum(e, this.includeDescriptions));
  }

  noteEnum(def: EnumDef): void {
    if (!this.enums.includes(def)) this.enums.push(def);
  }
}

function renderEnum(def: EnumDef, includeDescriptions: boolean): string {
  const header = includeDescriptions && def.meta.description ? `${def.name}\n${def.meta.description}` : def.name;
  const values = def.values.map((v) => {
    const label = v.meta.alias ?? v.name;
    return includeDescriptions && v.meta.description ? `- ${label}: ${v.meta.description}` : `- ${label}`;
  });
  return `${header}\n----\n${values.join("\n")}`;
}

function unwrapOptional(type: TypeRef): TypeRef {
  return type.kind === "optional" ? unwrapOptional(type.inner) : type;
}

function withArticle(text: string): string {
  return /^[aeiou]/i.test(text) ? `an ${text}` : `a ${text}`;
}

/**
 * Render instructions describing the JSON a model should produce for
 * `target`. Property aliases are used as keys, since the decoder matches them.
 *
 * @example
 * ```ts
 * renderOutputFormat(snapshot, t.ref("User"));
 * // Answer in JSON using this schema:
 * // {
 * //   name: string,
 * //   age: int or null,
 * // }
 * ```
 */
export function renderOutputFormat(snapshot: SchemaSnapshot, target: TypeRef, options: OutputFormatOptions = {}): string {
  const renderer = new OutputFormatRenderer(snapshot, options.indent ?? "  ", options.includeDescriptions ?? true);
  const shape = unwrapOptional(target);

  let head: string;
  let skipEnum: string | undefined;
  const def = shape.kind === "ref" ? snapshot.resolve(shape.name) : undefined;
  if (def?.kind === "enum") {
    renderer.noteEnum(def);
    skipEnum = def.name;
    head = `Answer with any of the categories:\n${renderEnum(def, options.includeDescriptions ?? true)}`;
  } else if (def?.kind === "class" || shape.kind === "map") {
    head = `Answer in JSON using this schema:\n${renderer.render(target, 0)}`;
  } else if (shape.kind === "list") {
    head = `Answer with a JSON Array using this schema:\n${renderer.render(target, 0)}`;
  } else {
    head = `Answer as ${withArticle(renderer.render(target, 0))}`;
  }

  const sections = [head, ...renderer.renderDeferred(), ...renderer.renderEnums(skipEnum)];
  return sections.join("\n\n");
}
