import { describe, it, expect } from "vitest";

import { ValidationError } from "../../errors.js";
import { parseTypeExpression } from "../type-expr.js";
import { isOptional, referencedNames, t, typeName, typeRefEquals } from "../type-ref.js";

describe("typeName", () => {
  it("renders primitives, lists and optionals", () => {
    expect(typeName(t.int())).toBe("int");
    expect(typeName(t.optional(t.int()))).toBe("int?");
    expect(typeName(t.list(t.ref("User")))).toBe("User[]");
    expect(typeName(t.optional(t.list(t.string())))).toBe("string[]?");
  });

  it("parenthesizes unions inside lists and optionals", () => {
    expect(typeName(t.list(t.union(t.int(), t.string())))).toBe("(int | string)[]");
    expect(typeName(t.optional(t.union(t.int(), t.string())))).toBe("(int | string)?");
    expect(typeName(t.list(t.optional(t.int())))).toBe("(int?)[]");
  });

  it("renders maps, literals and media", () => {
    expect(typeName(t.map(t.string(), t.ref("Address")))).toBe("map<string, Address>");
    expect(typeName(t.union(t.literal("draft"), t.literal(2), t.literal(true)))).toBe('"draft" | 2 | true');
    expect(typeName(t.image())).toBe("image");
  });
});

describe("t.optional", () => {
  it("does not wrap twice", () => {
    expect(t.optional(t.optional(t.bool()))).toEqual({ kind: "optional", inner: { kind: "primitive", name: "bool" } });
  });
});

describe("isOptional", () => {
  it("accepts optional, null and unions admitting null", () => {
    expect(isOptional(t.optional(t.int()))).toBe(true);
    expect(isOptional(t.null())).toBe(true);
    expect(isOptional(t.union(t.int(), t.null()))).toBe(true);
    expect(isOptional(t.list(t.optional(t.int())))).toBe(false);
  });
});

describe("referencedNames", () => {
  it("lists every class or enum name in order", () => {
    const ref = t.map(t.ref("Status"), t.union(t.list(t.ref("User")), t.optional(t.ref("Team"))));
    expect(referencedNames(ref)).toEqual(["Status", "User", "Team"]);
  });
});

describe("parseTypeExpression", () => {
  it("reads what typeName writes", () => {
    const sources = ["int?", "User[]", "(int | string)[]", "map<string, Address[]>?", '"a" | "b"', "image", "(int?)[]"];
    for (const source of sources) {
      expect(typeName(parseTypeExpression(source))).toBe(source);
    }
  });

  it("builds the expected structure", () => {
    expect(parseTypeExpression("map<Status, int[]>?")).toEqual(
      t.optional(t.map(t.ref("Status"), t.list(t.int()))),
    );
    expect(parseTypeExpression("true | 3")).toEqual(t.union(t.literal(true), t.literal(3)));
  });

  it("rejects malformed expressions", () => {
    expect(() => parseTypeExpression("map<string int>")).toThrow(ValidationError);
    expect(() => parseTypeExpression("User |")).toThrow('Invalid "type": unexpected end of type expression at 6 in "User |"');
    expect(() => parseTypeExpression("int $")).toThrow('Invalid "type": unexpected character "$" at 4');
  });
});

describe("typeRefEquals", () => {
  it("compares structurally", () => {
    expect(typeRefEquals(parseTypeExpression("int[]?"), t.optional(t.list(t.int())))).toBe(true);
    expect(typeRefEquals(t.int(), t.float())).toBe(false);
  });
});
