/**
 * Property-based tests for the incremental decoder.
 * Chunk boundaries must never change what is decoded.
 */
import { describe, it, expect } from "vitest";
import fc from "fast-check";

import { DecodeFailure } from "../../errors.js";
import { t } from "../../domain/type-ref.js";
import { SchemaRegistry } from "../../schema/schema-registry.js";
import { IncrementalDecoder } from "../incremental-decoder.js";
import { collectLeaves, type DecodedValue } from "../values.js";

const PAYLOAD = '{"name": "Ada Lovelace", "age": 36, "tags": ["x", "y"], "status": "ACTIVE"}';

function snapshot() {
  const schema = new SchemaRegistry();
  const person = schema.defineClass("Person");
  person.property("name").type("string");
  person.property("age").type("int?");
  person.property("tags").type("string[]");
  person.property("status").type("Status");
  const status = schema.defineEnum("Status");
  status.value("ACTIVE");
  status.value("INACTIVE");
  return schema.snapshot();
}

function split(text: string, cuts: number[]): string[] {
  const points = [...new Set(cuts.map((c) => c % (text.length + 1)))].sort((a, b) => a - b);
  const chunks: string[] = [];
  let from = 0;
  for (const point of points) {
    chunks.push(text.slice(from, point));
    from = point;
  }
  chunks.push(text.slice(from));
  return chunks;
}

function decode(chunks: string[]): { partials: DecodedValue[]; final: DecodedValue } {
  const decoder = new IncrementalDecoder({ snapshot: snapshot(), target: t.ref("Person") });
  const partials: DecodedValue[] = [];
  for (const chunk of chunks) {
    const partial = decoder.feed(chunk);
    if (partial !== undefined) partials.push(partial);
  }
  return { partials, final: decoder.finish() };
}

describe("IncrementalDecoder properties", () => {
  it("decodes the same value however the payload is split", () => {
    fc.assert(
      fc.property(fc.array(fc.nat(), { maxLength: 12 }), (cuts) => {
        const { partials, final } = decode(split(PAYLOAD, cuts));
        expect(final).toEqual({ name: "Ada Lovelace", age: 36, tags: ["x", "y"], status: "ACTIVE" });
        expect(partials.length).toBeGreaterThan(0);
        expect(partials[partials.length - 1]).toEqual(final);
      }),
    );
  });

  it("only ever grows the set of resolved leaves", () => {
    fc.assert(
      fc.property(fc.array(fc.nat(), { maxLength: 12 }), (cuts) => {
        const { partials } = decode(split(PAYLOAD, cuts));
        for (let i = 1; i < partials.length; i++) {
          const before = collectLeaves(partials[i - 1]);
          const after = collectLeaves(partials[i]);
          for (const [path, leaf] of before) expect(after.get(path)).toEqual(leaf);
        }
      }),
    );
  });

  it("never throws while feeding, and fails only with DecodeFailure", () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 80 }), fc.array(fc.nat(), { maxLength: 6 }), (text, cuts) => {
        const decoder = new IncrementalDecoder({ snapshot: snapshot(), target: t.ref("Person") });
        for (const chunk of split(text, cuts)) decoder.feed(chunk);
        try {
          decoder.finish();
          expect(decoder.state).toBe("completed");
        } catch (err) {
          expect(err).toBeInstanceOf(DecodeFailure);
          expect(decoder.state).toBe("failed");
        }
      }),
    );
  });
});
