import { describe, it, expect } from "vitest";

import { t } from "../../domain/type-ref.js";
import { renderOutputFormat } from "../output-format.js";
import { SchemaRegistry } from "../schema-registry.js";

function snapshot() {
  const schema = new SchemaRegistry();
  const user = schema.defineClass("User");
  user.property("name").type("string").withMeta("alias", "username").withMeta("description", "Full name");
  user.property("age").type("int?");
  user.property("status").type("Status");
  const status = schema.defineEnum("Status");
  status.value("ACTIVE").withMeta("description", "Currently active");
  status.value("INACTIVE").withMeta("alias", "inactive");
  const team = schema.defineClass("Team");
  team.property("name").type("string");
  team.property("lead").type("User");
  schema.defineClass("Tag").property("label").type("string");
  const node = schema.defineClass("Node");
  node.property("value").type("int");
  node.property("next").type("Node?");
  return schema.snapshot();
}

describe("renderOutputFormat", () => {
  it("renders a class with aliases, descriptions and the enums it uses", () => {
    expect(renderOutputFormat(snapshot(), t.ref("User"))).toBe(
      [
        "Answer in JSON using this schema:",
        "{",
        "  // Full name",
        "  username: string,",
        "  age: int or null,",
        "  status: Status,",
        "}",
        "",
        "Status",
        "----",
        "- ACTIVE: Currently active",
        "- inactive",
      ].join("\n"),
    );
  });

  it("inlines nested classes", () => {
    expect(renderOutputFormat(snapshot(), t.ref("Team"), { includeDescriptions: false })).toBe(
      [
        "Answer in JSON using this schema:",
        "{",
        "  name: string,",
        "  lead: {",
        "    username: string,",
        "    age: int or null,",
        "    status: Status,",
        "  },",
        "}",
        "",
        "Status",
        "----",
        "- ACTIVE",
        "- inactive",
      ].join("\n"),
    );
  });

  it("renders list targets as arrays", () => {
    expect(renderOutputFormat(snapshot(), t.list(t.ref("Tag")))).toBe(
      "Answer with a JSON Array using this schema:\n{\n  label: string,\n}[]",
    );
  });

  it("renders enum targets as categories", () => {
    expect(renderOutputFormat(snapshot(), t.ref("Status"))).toBe(
      "Answer with any of the categories:\nStatus\n----\n- ACTIVE: Currently active\n- inactive",
    );
  });

  it("renders primitives in a sentence", () => {
    expect(renderOutputFormat(snapshot(), t.int())).toBe("Answer as an int");
    expect(renderOutputFormat(snapshot(), t.optional(t.string()))).toBe("Answer as a string or null");
  });

  it("renders a self-referencing class once, by name", () => {
    expect(renderOutputFormat(snapshot(), t.ref("Node"))).toBe(
      [
        "Answer in JSON using this schema:",
        "{",
        "  value: int,",
        "  next: Node or null,",
        "}",
        "",
        "Node {",
        "  value: int,",
        "  next: Node or null,",
        "}",
      ].join("\n"),
    );
  });
});
