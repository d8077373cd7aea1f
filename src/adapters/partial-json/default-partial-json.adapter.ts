// =============================================================================
// Default Partial JSON Adapter — Lenient, incremental parsing without dependencies
// =============================================================================

import type {
  JsonishArray,
  JsonishEntry,
  JsonishNode,
  JsonishObject,
  JsonishString,
  PartialJsonParseOptions,
  PartialJsonPort,
  ValueStart,
} from "../../ports/partial-json.port.js";

const FENCE = "```";
const NUMBER = /^-?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const BARE_TERMINATORS = new Set([",", "}", "]", "\n"]);
const KEY_TERMINATORS = new Set([":", ",", "{", "}", "[", "]", "\n"]);
const ESCAPES: Record<string, string> = {
  '"': '"',
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
};

/**
 * Recursive-descent parser over one snapshot of the payload. It never throws:
 * at end-of-text or at the first malformed character it stops (`halted`) and
 * every node still open is returned as incomplete.
 */
class JsonishParser {
  private pos = 0;
  private halted = false;

  constructor(
    private readonly text: string,
    private readonly final: boolean,
  ) {}

  parseRoot(): JsonishNode | undefined {
    this.skipWhitespace();
    if (this.atEnd()) return undefined;
    return this.parseValue(true);
  }

  private parseValue(topLevel: boolean): JsonishNode | undefined {
    this.skipWhitespace();
    if (this.atEnd()) {
      this.halted = true;
      return undefined;
    }
    switch (this.peek()) {
      case "{":
        return this.parseObject();
      case "[":
        return this.parseArray();
      case '"':
        return this.parseString();
      default:
        return this.parseBare(topLevel);
    }
  }

  private parseObject(): JsonishObject {
    this.pos++;
    const entries: JsonishEntry[] = [];
    while (!this.halted) {
      this.skipSeparators();
      if (this.atEnd() || this.peek() === "]") {
        this.halted = true;
        break;
      }
      if (this.peek() === "}") {
        this.pos++;
        return { kind: "object", complete: true, entries };
      }

      const key = this.parseKey();
      if (key === undefined) break;
      this.skipWhitespace();
      if (this.atEnd() || this.peek() !== ":") {
        // a key whose colon has not arrived yet is dropped
        this.halted = true;
        break;
      }
      this.pos++;
      this.skipWhitespace();
      if (this.atEnd()) {
        entries.push({ key });
        this.halted = true;
        break;
      }
      const value = this.parseValue(false);
      entries.push(value ? { key, value } : { key });
    }
    return { kind: "object", complete: this.final, entries };
  }

  private parseKey(): string | undefined {
    if (this.peek() === '"') {
      const key = this.parseString();
      return key.complete ? key.value : undefined;
    }
    const start = this.pos;
    while (!this.atEnd() && !KEY_TERMINATORS.has(this.peek())) this.pos++;
    const key = this.text.slice(start, this.pos).trim();
    if (this.atEnd() || this.peek() !== ":" || key.length === 0) {
      this.halted = true;
      return undefined;
    }
    return key;
  }

  private parseArray(): JsonishArray {
    this.pos++;
    const items: JsonishNode[] = [];
    while (!this.halted) {
      this.skipSeparators();
      if (this.atEnd() || this.peek() === "}") {
        this.halted = true;
        break;
      }
      if (this.peek() === "]") {
        this.pos++;
        return { kind: "array", complete: true, items };
      }
      const item = this.parseValue(false);
      if (item) items.push(item);
    }
    return { kind: "array", complete: this.final, items };
  }

  private parseString(): JsonishString {
    this.pos++;
    let value = "";
    while (!this.atEnd()) {
      const ch = this.peek();
      if (ch === '"') {
        this.pos++;
        return { kind: "string", complete: true, value, quoted: true };
      }
      if (ch !== "\\") {
        value += ch;
        this.pos++;
        continue;
      }
      if (this.pos + 1 >= this.text.length) break;
      const escape = this.text[this.pos + 1];
      if (escape === "u") {
        if (this.pos + 6 > this.text.length) break;
        const hex = this.text.slice(this.pos + 2, this.pos + 6);
        value += /^[0-9a-fA-F]{4}$/.test(hex) ? String.fromCharCode(parseInt(hex, 16)) : `\\u${hex}`;
        this.pos += 6;
        continue;
      }
      value += ESCAPES[escape] ?? escape;
      this.pos += 2;
    }
    // unclosed: never complete, even at end-of-input
    this.halted = true;
    return { kind: "string", complete: false, value, quoted: true };
  }

  private parseBare(topLevel: boolean): JsonishNode | undefined {
    const start = this.pos;
    if (topLevel) {
      this.pos = this.text.length;
    } else {
      while (!this.atEnd() && !BARE_TERMINATORS.has(this.peek())) this.pos++;
    }
    const terminated = !this.atEnd();
    if (!terminated) this.halted = true;
    const raw = this.text.slice(start, this.pos).trim();
    if (raw.length === 0) return undefined;
    return classifyBare(raw, terminated || this.final);
  }

  private skipWhitespace(): void {
    while (!this.atEnd() && /\s/.test(this.peek())) this.pos++;
  }

  private skipSeparators(): void {
    while (!this.atEnd() && (this.peek() === "," || /\s/.test(this.peek()))) this.pos++;
  }

  private peek(): string {
    return this.text[this.pos];
  }

  private atEnd(): boolean {
    return this.pos >= this.text.length;
  }
}

function classifyBare(raw: string, complete: boolean): JsonishNode {
  if (raw === "true" || raw === "false") return { kind: "boolean", complete, value: raw === "true" };
  if (raw === "null") return { kind: "null", complete };
  if (NUMBER.test(raw)) return { kind: "number", complete, value: Number(raw), raw };
  return { kind: "string", complete, value: raw, quoted: false };
}

interface LocatedValue {
  readonly body: string;
  /** A closing fence was seen, so the body can no longer grow. */
  readonly closed: boolean;
}

function firstIndexOf(text: string, chars: string[]): number {
  const hits = chars.map((c) => text.indexOf(c)).filter((i) => i !== -1);
  return hits.length > 0 ? Math.min(...hits) : -1;
}

/**
 * Find where the value starts. The chosen position never moves as the text
 * grows, which keeps successive parses consistent with each other.
 */
function locate(text: string, expect: ValueStart): LocatedValue | undefined {
  let body = text;
  let closed = false;

  const lead = body.trimStart();
  if (lead.startsWith(FENCE)) {
    const newline = lead.indexOf("\n");
    if (newline === -1) return undefined;
    body = lead.slice(newline + 1);
    const end = body.indexOf(FENCE);
    if (end !== -1) {
      body = body.slice(0, end);
      closed = true;
    }
  }

  const start =
    expect === "object" ? body.indexOf("{")
    : expect === "array" ? body.indexOf("[")
    : expect === "container" ? firstIndexOf(body, ["{", "["])
    : 0;
  if (start === -1) return undefined;
  return { body: body.slice(start), closed };
}

/**
 * Parse an accumulated payload into a jsonish tree; `undefined` while no
 * value has started.
 */
function parseJsonish(text: string, options: PartialJsonParseOptions = {}): JsonishNode | undefined {
  const located = locate(text, options.expect ?? "any");
  if (!located) return undefined;
  const parser = new JsonishParser(located.body, options.final === true || located.closed);
  return parser.parseRoot();
}

// =============================================================================
// Adapter factory
// =============================================================================

export function createDefaultPartialJsonAdapter(): PartialJsonPort {
  return { parse: parseJsonish };
}
