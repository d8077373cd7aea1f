import { describe, it, expect } from "vitest";

import {
  CyclicDefinitionError,
  DuplicateDefinitionError,
  DuplicatePropertyError,
  UnknownTypeReferenceError,
  UnresolvedTypeReferenceError,
  UnsupportedMetadataKeyError,
  ValidationError,
} from "../../errors.js";
import { t } from "../../domain/type-ref.js";
import { SchemaRegistry } from "../schema-registry.js";

function userSchema(): SchemaRegistry {
  const schema = new SchemaRegistry();
  const user = schema.defineClass("User").withMeta("description", "A person");
  user.property("name").type(t.string()).withMeta("alias", "username").withMeta("description", "Full name");
  user.property("age").type("int?");
  schema.defineClass("Empty");
  const status = schema.defineEnum("Status");
  status.value("ACTIVE").withMeta("alias", "active");
  status.value("INACTIVE");
  return schema;
}

describe("SchemaRegistry — definitions", () => {
  it("rejects a name used by a class or an enum", () => {
    const schema = userSchema();
    expect(() => schema.defineClass("User")).toThrow(DuplicateDefinitionError);
    try {
      schema.defineClass("Status");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DuplicateDefinitionError);
      expect(err).toMatchObject({ code: "DUPLICATE_DEFINITION", definitionName: "Status", existingKind: "enum" });
    }
  });

  it("rejects names that are not identifiers", () => {
    expect(() => new SchemaRegistry().defineClass("1User")).toThrow(ValidationError);
  });

  it("rejects duplicate properties and enum values", () => {
    const schema = userSchema();
    expect(() => schema.extendClass("User").property("name")).toThrow(DuplicatePropertyError);
    expect(() => schema.extendEnum("Status").value("ACTIVE")).toThrow(DuplicatePropertyError);
  });

  it("accepts only alias and description metadata", () => {
    const schema = new SchemaRegistry();
    const prop = schema.defineClass("A").property("x");
    expect(() => prop.withMeta("label", "X")).toThrow(UnsupportedMetadataKeyError);
    expect(() => prop.withMeta("label", "X")).toThrow('Metadata key "label" is not supported on property "A.x"');
    expect(prop.withMeta("alias", "ex").meta).toEqual({ alias: "ex" });
  });

  it("rejects references that can never resolve", () => {
    const prop = new SchemaRegistry().defineClass("A").property("x");
    expect(() => prop.type(t.ref("not a name"))).toThrow(UnknownTypeReferenceError);
    expect(() => prop.type("User Name")).toThrow(ValidationError);
  });

  it("defers resolution of names until snapshot", () => {
    const schema = new SchemaRegistry();
    schema.defineClass("A").property("b").type("B");
    schema.defineClass("B").property("n").type("int");
    expect(schema.snapshot().lookup("A")).toEqual({
      kind: "class",
      name: "A",
      meta: {},
      properties: [{ name: "b", type: { kind: "ref", name: "B" }, meta: {} }],
    });
  });

  it("fails to extend a definition that does not exist", () => {
    expect(() => new SchemaRegistry().extendClass("Nope")).toThrow(UnknownTypeReferenceError);
    expect(() => new SchemaRegistry().extendEnum("Nope")).toThrow('Cannot extend "Nope": no such enum');
  });
});

describe("SchemaRegistry — snapshot", () => {
  it("lists every dangling reference", () => {
    const schema = new SchemaRegistry();
    const user = schema.defineClass("User");
    user.property("address").type("Address");
    user.property("nickname");
    user.property("scores").type("map<int, string>");

    try {
      schema.snapshot();
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UnresolvedTypeReferenceError);
      expect(err).toMatchObject({
        references: [
          { location: "User.address", reference: "Address", reason: "not defined" },
          { location: "User.nickname", reference: "<unset>", reason: "property has no type" },
          { location: "User.scores", reference: "int", reason: "map keys must be string, a string literal or an enum" },
        ],
      });
    }
  });

  it("rejects classes that require themselves", () => {
    const schema = new SchemaRegistry();
    schema.defineClass("A").property("b").type("B");
    schema.defineClass("B").property("a").type("A");
    try {
      schema.snapshot();
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(CyclicDefinitionError);
      expect(err).toMatchObject({ cycle: ["A", "B", "A"] });
    }
  });

  it("allows recursion through optional or list properties", () => {
    const schema = new SchemaRegistry();
    const node = schema.defineClass("Node");
    node.property("parent").type("Node?");
    node.property("children").type("Node[]");
    expect(() => schema.snapshot()).not.toThrow();
  });

  it("accepts enum and literal map keys", () => {
    const schema = userSchema();
    const team = schema.defineClass("Team");
    team.property("counts").type("map<Status, int>");
    team.property("labels").type('map<"a" | "b", string>');
    expect(() => schema.snapshot()).not.toThrow();
  });

  it("is frozen and unaffected by later changes", () => {
    const schema = userSchema();
    const before = schema.snapshot();
    schema.extendClass("User").property("email").type("string");
    const after = schema.snapshot();

    const lookup = (snap: typeof before) => {
      const def = snap.lookup("User");
      return def?.kind === "class" ? def.properties.map((p) => p.name) : [];
    };
    expect(lookup(before)).toEqual(["name", "age"]);
    expect(lookup(after)).toEqual(["name", "age", "email"]);
    expect(Object.isFrozen(before.lookup("User"))).toBe(true);
    expect(Object.isFrozen(before)).toBe(true);
  });

  it("resolves names and rejects unknown ones", () => {
    const snapshot = userSchema().snapshot();
    expect(snapshot.resolve("Status").kind).toBe("enum");
    expect(() => snapshot.resolve("Team")).toThrow(UnknownTypeReferenceError);
  });
});

describe("SchemaRegistry — describe", () => {
  it("renders classes and enums in insertion order", () => {
    const expected = [
      "SchemaRegistry(",
      "  Classes: [",
      "    User (description='A person') {",
      "      name: string (alias='username', description='Full name'),",
      "      age: int?",
      "    },",
      "    Empty {}",
      "  ],",
      "  Enums: [",
      "    Status {",
      "      ACTIVE (alias='active'),",
      "      INACTIVE",
      "    }",
      "  ]",
      ")",
    ].join("\n");
    const schema = userSchema();
    expect(schema.describe()).toBe(expected);
    expect(String(schema)).toBe(expected);
    expect(schema.snapshot().describe()).toBe(expected);
  });

  it("renders an empty registry", () => {
    expect(new SchemaRegistry().describe()).toBe("SchemaRegistry()");
  });

  it("marks untyped properties", () => {
    const schema = new SchemaRegistry();
    schema.defineClass("A").property("x");
    expect(schema.describe()).toBe("SchemaRegistry(\n  Classes: [\n    A {\n      x: <unset>\n    }\n  ]\n)");
  });
});
