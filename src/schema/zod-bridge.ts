// =============================================================================
// Zod bridge — Build zod schemas from declared types
// =============================================================================

import { z } from "zod";

import { MediaValue } from "../domain/media.js";
import type { TypeRef } from "../domain/type-ref.js";
import type { SchemaSnapshot } from "./snapshot.js";
import type { ClassDef, EnumDef } from "./types.js";

class ZodBridge {
  private readonly cache = new Map<string, z.ZodTypeAny>();

  constructor(private readonly snapshot: SchemaSnapshot) {}

  build(type: TypeRef): z.ZodTypeAny {
    switch (type.kind) {
      case "primitive":
        switch (type.name) {
          case "string":
            return z.string();
          case "int":
            return z.number().int();
          case "float":
            return z.number();
          case "bool":
            return z.boolean();
          case "null":
            return z.null();
        }
      case "literal":
        return z.literal(type.value);
      case "media":
        return z.custom<MediaValue>((v) => v instanceof MediaValue && v.kind === type.media, {
          message: `Expected ${type.media}`,
        });
      case "optional":
        return this.build(type.inner).nullable().optional();
      case "list":
        return z.array(this.build(type.element));
      case "map":
        return z.record(this.buildKey(type.key), this.build(type.value));
      case "union": {
        const [first, second, ...rest] = type.members.map((m) => this.build(m));
        if (first === undefined) return z.never();
        return second === undefined ? first : z.union([first, second, ...rest]);
      }
      case "ref":
        return this.buildRef(type.name);
    }
  }

  private buildKey(key: TypeRef): z.ZodType<string> {
    const allowed = this.keyValues(key);
    if (!allowed) return z.string();
    return z.string().refine((k) => allowed.includes(k), { message: "Key not allowed" });
  }

  /** Allowed key strings, or `undefined` for any string. */
  private keyValues(key: TypeRef): string[] | undefined {
    switch (key.kind) {
      case "literal":
        return [String(key.value)];
      case "union":
        return key.members.flatMap((m) => this.keyValues(m) ?? []);
      case "ref": {
        const def = this.snapshot.lookup(key.name);
        return def?.kind === "enum" ? def.values.map((v) => v.name) : undefined;
      }
      default:
        return undefined;
    }
  }

  private buildRef(name: string): z.ZodTypeAny {
    const cached = this.cache.get(name);
    if (cached) return cached;
    const def = this.snapshot.resolve(name);
    const schema = def.kind === "enum" ? enumSchema(def) : z.lazy(() => this.classSchema(def));
    this.cache.set(name, schema);
    return schema;
  }

  private classSchema(def: ClassDef): z.ZodTypeAny {
    const shape: Record<string, z.ZodTypeAny> = {};
    for (const prop of def.properties) {
      const schema = this.build(prop.type);
      shape[prop.name] = prop.meta.description ? schema.describe(prop.meta.description) : schema;
    }
    const object = z.object(shape);
    return def.meta.description ? object.describe(def.meta.description) : object;
  }
}

function enumSchema(def: EnumDef): z.ZodTypeAny {
  const [first, ...rest] = def.values.map((v) => v.name);
  if (first === undefined) return z.never();
  return z.enum([first, ...rest]);
}

/**
 * Zod schema for values of `type`, resolved against `snapshot`. Optional
 * types accept `null` and absence; recursive classes go through `z.lazy`.
 *
 * @example
 * ```ts
 * const schema = toZodSchema(snapshot, t.list(t.ref("User")));
 * schema.parse([{ name: "Ada", age: null }]);
 * ```
 */
export function toZodSchema(snapshot: SchemaSnapshot, type: TypeRef): z.ZodTypeAny {
  return new ZodBridge(snapshot).build(type);
}
