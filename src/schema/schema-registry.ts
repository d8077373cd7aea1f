// =============================================================================
// SchemaRegistry — Runtime definition of classes, enums and their metadata
// =============================================================================

import {
  CyclicDefinitionError,
  DuplicateDefinitionError,
  DuplicatePropertyError,
  UnknownTypeReferenceError,
  UnresolvedTypeReferenceError,
  UnsupportedMetadataKeyError,
  ValidationError,
  type DanglingReference,
} from "../errors.js";
import { parseTypeExpression } from "../domain/type-expr.js";
import { isIdentifier, referencedNames, typeName, type TypeRef } from "../domain/type-ref.js";
import { describeSchema } from "./describe.js";
import { SchemaSnapshot } from "./snapshot.js";
import { MetaKeySchema, type ClassDef, type EnumDef, type Meta, type MetaKey, type PropertyDef } from "./types.js";

// ─── Builders ──────────────────────────────────────────────────────

abstract class MetaBuilder {
  protected readonly metadata: { [K in MetaKey]?: string } = {};

  /** Human-readable owner used in error messages, e.g. `property "User.name"`. */
  protected abstract get target(): string;

  get meta(): Meta {
    return { ...this.metadata };
  }

  /**
   * Attach `alias` or `description` metadata.
   *
   * @throws UnsupportedMetadataKeyError for any other key
   */
  withMeta(key: string, value: string): this {
    const parsed = MetaKeySchema.safeParse(key);
    if (!parsed.success) throw new UnsupportedMetadataKeyError(this.target, key);
    this.metadata[parsed.data] = value;
    return this;
  }
}

export class PropertyBuilder extends MetaBuilder {
  private declared: TypeRef | undefined;

  constructor(
    readonly owner: string,
    readonly name: string,
  ) {
    super();
  }

  protected get target(): string {
    return `property "${this.owner}.${this.name}"`;
  }

  get declaredType(): TypeRef | undefined {
    return this.declared;
  }

  /**
   * Set the declared type. Class and enum names are resolved when the
   * registry is snapshotted, so definitions may refer to each other in any
   * order.
   */
  type(ref: TypeRef | string): this {
    const resolved = typeof ref === "string" ? parseTypeExpression(ref) : ref;
    assertWellFormed(resolved);
    this.declared = resolved;
    return this;
  }
}

export class ClassBuilder extends MetaBuilder {
  private readonly properties = new Map<string, PropertyBuilder>();

  constructor(readonly name: string) {
    super();
  }

  protected get target(): string {
    return `class "${this.name}"`;
  }

  /** @throws DuplicatePropertyError when `name` is already a property of this class */
  property(name: string): PropertyBuilder {
    if (name.length === 0) throw new ValidationError("property name must not be empty", `${this.name}.property`);
    if (this.properties.has(name)) throw new DuplicatePropertyError(this.name, name);
    const builder = new PropertyBuilder(this.name, name);
    this.properties.set(name, builder);
    return builder;
  }

  listProperties(): PropertyBuilder[] {
    return [...this.properties.values()];
  }
}

export class EnumValueBuilder extends MetaBuilder {
  constructor(
    readonly owner: string,
    readonly name: string,
  ) {
    super();
  }

  protected get target(): string {
    return `enum value "${this.owner}.${this.name}"`;
  }
}

export class EnumBuilder extends MetaBuilder {
  private readonly values = new Map<string, EnumValueBuilder>();

  constructor(readonly name: string) {
    super();
  }

  protected get target(): string {
    return `enum "${this.name}"`;
  }

  /** @throws DuplicatePropertyError when `name` is already a value of this enum */
  value(name: string): EnumValueBuilder {
    if (name.length === 0) throw new ValidationError("enum value name must not be empty", `${this.name}.value`);
    if (this.values.has(name)) throw new DuplicatePropertyError(this.name, name);
    const builder = new EnumValueBuilder(this.name, name);
    this.values.set(name, builder);
    return builder;
  }

  listValues(): EnumValueBuilder[] {
    return [...this.values.values()];
  }
}

function assertWellFormed(ref: TypeRef): void {
  for (const name of referencedNames(ref)) {
    if (!isIdentifier(name)) {
      throw new UnknownTypeReferenceError(name, `"${name}" can never name a class or enum`);
    }
  }
  const visit = (r: TypeRef): void => {
    switch (r.kind) {
      case "union":
        if (r.members.length === 0) throw new ValidationError("a union needs at least one member", "type");
        r.members.forEach(visit);
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
      default:
        break;
    }
  };
  visit(ref);
}

// ─── Registry ──────────────────────────────────────────────────────

/**
 * Mutable, insertion-ordered registry of classes and enums.
 *
 * Build everything first, then call {@link SchemaRegistry.snapshot} and hand
 * the snapshot to decoders. Mutating a registry while a snapshot taken from
 * it is in use is allowed but does not affect that snapshot.
 *
 * @example
 * ```ts
 * const schema = new SchemaRegistry();
 * const user = schema.defineClass("User");
 * user.property("name").type(t.string()).withMeta("alias", "username");
 * user.property("status").type("Status?");
 * schema.defineEnum("Status").value("ACTIVE");
 * const snapshot = schema.snapshot();
 * ```
 */
export class SchemaRegistry {
  private readonly classes = new Map<string, ClassBuilder>();
  private readonly enums = new Map<string, EnumBuilder>();

  /** @throws DuplicateDefinitionError when a class or enum already uses `name` */
  defineClass(name: string): ClassBuilder {
    this.assertAvailable(name);
    const builder = new ClassBuilder(name);
    this.classes.set(name, builder);
    return builder;
  }

  /** @throws DuplicateDefinitionError when a class or enum already uses `name` */
  defineEnum(name: string): EnumBuilder {
    this.assertAvailable(name);
    const builder = new EnumBuilder(name);
    this.enums.set(name, builder);
    return builder;
  }

  /** Reopen an existing class to add properties or metadata. */
  extendClass(name: string): ClassBuilder {
    const builder = this.classes.get(name);
    if (!builder) throw new UnknownTypeReferenceError(name, `Cannot extend "${name}": no such class`);
    return builder;
  }

  /** Reopen an existing enum to add values or metadata. */
  extendEnum(name: string): EnumBuilder {
    const builder = this.enums.get(name);
    if (!builder) throw new UnknownTypeReferenceError(name, `Cannot extend "${name}": no such enum`);
    return builder;
  }

  has(name: string): boolean {
    return this.classes.has(name) || this.enums.has(name);
  }

  /**
   * Validate every reference and freeze the current state.
   *
   * @throws UnresolvedTypeReferenceError listing every dangling or invalid reference
   * @throws CyclicDefinitionError when a class requires itself
   */
  snapshot(): SchemaSnapshot {
    this.validate();
    return this.construct();
  }

  describe(): string {
    const classes = [...this.classes.values()].map((c) => ({
      name: c.name,
      meta: c.meta,
      properties: c.listProperties().map((p) => ({ name: p.name, type: p.declaredType, meta: p.meta })),
    }));
    const enums = [...this.enums.values()].map((e) => ({
      name: e.name,
      meta: e.meta,
      values: e.listValues().map((v) => ({ name: v.name, meta: v.meta })),
    }));
    return describeSchema(classes, enums);
  }

  toString(): string {
    return this.describe();
  }

  private assertAvailable(name: string): void {
    if (!isIdentifier(name)) throw new ValidationError("definition names must be identifiers", name);
    if (this.classes.has(name)) throw new DuplicateDefinitionError(name, "class");
    if (this.enums.has(name)) throw new DuplicateDefinitionError(name, "enum");
  }

  private validate(): void {
    const dangling: DanglingReference[] = [];

    for (const cls of this.classes.values()) {
      for (const prop of cls.listProperties()) {
        const location = `${cls.name}.${prop.name}`;
        const type = prop.declaredType;
        if (!type) {
          dangling.push({ location, reference: "<unset>", reason: "property has no type" });
          continue;
        }
        for (const name of referencedNames(type)) {
          if (!this.has(name)) dangling.push({ location, reference: name, reason: "not defined" });
        }
        for (const key of mapKeys(type)) {
          if (!this.isStringLikeKey(key)) {
            dangling.push({ location, reference: typeName(key), reason: "map keys must be string, a string literal or an enum" });
          }
        }
      }
    }

    if (dangling.length > 0) throw new UnresolvedTypeReferenceError(dangling);

    const cycle = this.findRequiredCycle();
    if (cycle) throw new CyclicDefinitionError(cycle);
  }

  private construct(): SchemaSnapshot {
    const classes: ClassDef[] = [...this.classes.values()].map((c) => ({
      kind: "class",
      name: c.name,
      meta: c.meta,
      properties: c.listProperties().map((p): PropertyDef => ({
        name: p.name,
        // validate() has rejected untyped properties
        type: p.declaredType ?? { kind: "primitive", name: "null" },
        meta: p.meta,
      })),
    }));
    const enums: EnumDef[] = [...this.enums.values()].map((e) => ({
      kind: "enum",
      name: e.name,
      meta: e.meta,
      values: e.listValues().map((v) => ({ name: v.name, meta: v.meta })),
    }));
    return new SchemaSnapshot(classes, enums);
  }

  private isStringLikeKey(key: TypeRef): boolean {
    switch (key.kind) {
      case "primitive":
        return key.name === "string";
      case "literal":
        return typeof key.value === "string";
      case "ref":
        // an undefined name was already reported as dangling
        return this.enums.has(key.name) || !this.classes.has(key.name);
      case "union":
        return key.members.every((m) => m.kind === "literal" && typeof m.value === "string");
      default:
        return false;
    }
  }

  /** Depth-first search over `class -> class` edges made of required, direct references. */
  private findRequiredCycle(): string[] | undefined {
    const edges = new Map<string, string[]>();
    for (const cls of this.classes.values()) {
      const targets: string[] = [];
      for (const prop of cls.listProperties()) {
        const type = prop.declaredType;
        if (type?.kind === "ref" && this.classes.has(type.name)) targets.push(type.name);
      }
      edges.set(cls.name, targets);
    }

    const done = new Set<string>();
    const stack: string[] = [];
    const visit = (name: string): string[] | undefined => {
      const at = stack.indexOf(name);
      if (at !== -1) return [...stack.slice(at), name];
      if (done.has(name)) return undefined;
      stack.push(name);
      for (const next of edges.get(name) ?? []) {
        const cycle = visit(next);
        if (cycle) return cycle;
      }
      stack.pop();
      done.add(name);
      return undefined;
    };

    for (const name of edges.keys()) {
      const cycle = visit(name);
      if (cycle) return cycle;
    }
    return undefined;
  }
}

function mapKeys(ref: TypeRef): TypeRef[] {
  switch (ref.kind) {
    case "map":
      return [ref.key, ...mapKeys(ref.key), ...mapKeys(ref.value)];
    case "optional":
      return mapKeys(ref.inner);
    case "list":
      return mapKeys(ref.element);
    case "union":
      return ref.members.flatMap(mapKeys);
    default:
      return [];
  }
}
