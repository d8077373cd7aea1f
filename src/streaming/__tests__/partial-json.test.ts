import { describe, it, expect } from "vitest";

import { createDefaultPartialJsonAdapter } from "../../adapters/partial-json/default-partial-json.adapter.js";
import type { JsonishNode, PartialJsonParseOptions } from "../../ports/partial-json.port.js";

// =============================================================================
// Helpers
// =============================================================================

function parse(text: string, options?: PartialJsonParseOptions): JsonishNode | undefined {
  return createDefaultPartialJsonAdapter().parse(text, options);
}

const num = (value: number, complete = true) => ({ kind: "number", complete, value, raw: String(value) });
const str = (value: string, complete = true, quoted = true) => ({ kind: "string", complete, value, quoted });

// =============================================================================
// parse() — Scalars
// =============================================================================

describe("PartialJsonAdapter.parse — scalars", () => {
  it("parses a closed string as complete", () => {
    expect(parse('"hello"')).toEqual(str("hello"));
  });

  it("keeps an unclosed string incomplete", () => {
    expect(parse('"hel')).toEqual(str("hel", false));
  });

  it("keeps an unclosed string incomplete even at end-of-input", () => {
    expect(parse('"hel', { final: true })).toEqual(str("hel", false));
  });

  it("treats a trailing bare number as incomplete until end-of-input", () => {
    expect(parse("42")).toEqual(num(42, false));
    expect(parse("42", { final: true })).toEqual(num(42));
  });

  it("classifies bare keywords", () => {
    expect(parse("true", { final: true })).toEqual({ kind: "boolean", complete: true, value: true });
    expect(parse("null", { final: true })).toEqual({ kind: "null", complete: true });
  });

  it("returns undefined for blank input", () => {
    expect(parse("")).toBeUndefined();
    expect(parse("   \n")).toBeUndefined();
  });

  it("decodes JSON escapes", () => {
    expect(parse('"line\\nbreak \\u0041\\""')).toEqual(str('line\nbreak A"'));
  });
});

// =============================================================================
// parse() — Objects
// =============================================================================

describe("PartialJsonAdapter.parse — objects", () => {
  it("parses a closed object", () => {
    expect(parse('{"a": 1, "b": "x"}')).toEqual({
      kind: "object",
      complete: true,
      entries: [
        { key: "a", value: num(1) },
        { key: "b", value: str("x") },
      ],
    });
  });

  it("returns the open object with its incomplete tail", () => {
    expect(parse('{"a": 1, "b": "x')).toEqual({
      kind: "object",
      complete: false,
      entries: [
        { key: "a", value: num(1) },
        { key: "b", value: str("x", false) },
      ],
    });
  });

  it("marks a bare value without a delimiter as incomplete", () => {
    expect(parse('{"a": 1')).toEqual({ kind: "object", complete: false, entries: [{ key: "a", value: num(1, false) }] });
  });

  it("drops a key whose colon has not arrived", () => {
    expect(parse('{"a": 1, "b"')).toEqual({ kind: "object", complete: false, entries: [{ key: "a", value: num(1) }] });
  });

  it("keeps a key whose value has not started", () => {
    expect(parse('{"a":')).toEqual({ kind: "object", complete: false, entries: [{ key: "a" }] });
  });

  it("accepts unquoted keys and bare words", () => {
    expect(parse("{name: Alice, age: 30}")).toEqual({
      kind: "object",
      complete: true,
      entries: [
        { key: "name", value: str("Alice", true, false) },
        { key: "age", value: num(30) },
      ],
    });
  });

  it("tolerates missing commas", () => {
    expect(parse('{"a": "x" "b": "y"}')).toEqual({
      kind: "object",
      complete: true,
      entries: [
        { key: "a", value: str("x") },
        { key: "b", value: str("y") },
      ],
    });
  });

  it("keeps duplicate keys in document order", () => {
    expect(parse('{"a": 1, "a": 2}')).toEqual({
      kind: "object",
      complete: true,
      entries: [
        { key: "a", value: num(1) },
        { key: "a", value: num(2) },
      ],
    });
  });

  it("stops at a mismatched bracket without throwing", () => {
    expect(parse('{"a": 1] "b": 2}')).toEqual({ kind: "object", complete: false, entries: [{ key: "a", value: num(1) }] });
  });

  it("closes open containers at end-of-input", () => {
    expect(parse('{"a": [1, 2', { final: true })).toEqual({
      kind: "object",
      complete: true,
      entries: [{ key: "a", value: { kind: "array", complete: true, items: [num(1), num(2)] } }],
    });
  });
});

// =============================================================================
// parse() — Arrays
// =============================================================================

describe("PartialJsonAdapter.parse — arrays", () => {
  it("ignores a trailing comma", () => {
    expect(parse("[1, 2, ]")).toEqual({ kind: "array", complete: true, items: [num(1), num(2)] });
  });

  it("keeps the incomplete last item", () => {
    expect(parse('["a", "b')).toEqual({ kind: "array", complete: false, items: [str("a"), str("b", false)] });
  });
});

// =============================================================================
// parse() — Locating the value
// =============================================================================

describe("PartialJsonAdapter.parse — value location", () => {
  it("skips prose before the first brace", () => {
    expect(parse('Sure! Here it is: {"ok": true}', { expect: "object" })).toEqual({
      kind: "object",
      complete: true,
      entries: [{ key: "ok", value: { kind: "boolean", complete: true, value: true } }],
    });
  });

  it("waits for the brace when an object is expected", () => {
    expect(parse("Thinking about it", { expect: "object" })).toBeUndefined();
  });

  it("takes whichever container opens first", () => {
    expect(parse("list: [1] {", { expect: "container" })).toEqual({ kind: "array", complete: true, items: [num(1)] });
  });

  it("ignores braces when only an array is accepted", () => {
    expect(parse('{"a": 1}', { expect: "array" })).toBeUndefined();
  });

  it("skips a markdown fence", () => {
    expect(parse('```json\n{"a": 1}\n```')).toEqual({
      kind: "object",
      complete: true,
      entries: [{ key: "a", value: num(1) }],
    });
  });

  it("treats a closed fence as the end of a bare value", () => {
    expect(parse("```\nhello world\n```")).toEqual(str("hello world", true, false));
  });

  it("waits for the newline after an opening fence", () => {
    expect(parse("```js")).toBeUndefined();
  });
});
