import { describe, it, expect } from "vitest";

import { MediaValue } from "../../domain/media.js";
import { parseTypeExpression } from "../../domain/type-expr.js";
import { t } from "../../domain/type-ref.js";
import { SchemaRegistry } from "../schema-registry.js";
import { toZodSchema } from "../zod-bridge.js";

function snapshot() {
  const schema = new SchemaRegistry();
  const user = schema.defineClass("User");
  user.property("name").type("string");
  user.property("age").type("int?");
  user.property("status").type("Status");
  const status = schema.defineEnum("Status");
  status.value("ACTIVE");
  status.value("INACTIVE");
  const node = schema.defineClass("Node");
  node.property("value").type("int");
  node.property("next").type("Node?");
  return schema.snapshot();
}

const accepts = (expr: string, value: unknown) => toZodSchema(snapshot(), parseTypeExpression(expr)).safeParse(value).success;

describe("toZodSchema", () => {
  it("validates class instances", () => {
    expect(accepts("User", { name: "Ada", age: null, status: "ACTIVE" })).toBe(true);
    expect(accepts("User", { name: "Ada", status: "INACTIVE" })).toBe(true);
    expect(accepts("User", { name: "Ada", status: "BOGUS" })).toBe(false);
    expect(accepts("User", { name: "Ada", age: 1.5, status: "ACTIVE" })).toBe(false);
    expect(accepts("User", { age: 3, status: "ACTIVE" })).toBe(false);
  });

  it("validates recursive classes", () => {
    expect(accepts("Node", { value: 1, next: { value: 2, next: null } })).toBe(true);
    expect(accepts("Node", { value: 1, next: { value: "2" } })).toBe(false);
  });

  it("validates lists, maps and unions", () => {
    expect(accepts("int[]", [1, 2])).toBe(true);
    expect(accepts("int[]", [1, "2"])).toBe(false);
    expect(accepts("map<Status, int>", { ACTIVE: 1 })).toBe(true);
    expect(accepts("map<Status, int>", { OTHER: 1 })).toBe(false);
    expect(accepts('map<"a" | "b", string>', { b: "x" })).toBe(true);
    expect(accepts("int | string", "a")).toBe(true);
    expect(accepts("int | string", true)).toBe(false);
    expect(accepts('"draft"', "draft")).toBe(true);
  });

  it("validates media by kind", () => {
    const schema = toZodSchema(snapshot(), t.image());
    expect(schema.safeParse(MediaValue.fromUrl("image", "https://example.com/a.png")).success).toBe(true);
    expect(schema.safeParse(MediaValue.fromUrl("audio", "https://example.com/a.wav")).success).toBe(false);
    expect(schema.safeParse("https://example.com/a.png").success).toBe(false);
  });
});
