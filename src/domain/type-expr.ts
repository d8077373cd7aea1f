// =============================================================================
// Type expressions — Parse `map<string, Address[]>?` style text into a TypeRef
// =============================================================================

import { ValidationError } from "../errors.js";
import { PRIMITIVE_NAMES, t, type TypeRef } from "./type-ref.js";

type Token =
  | { type: "punct"; value: string; at: number }
  | { type: "ident"; value: string; at: number }
  | { type: "string"; value: string; at: number }
  | { type: "number"; value: number; at: number };

const PUNCTUATION = new Set(["(", ")", "<", ">", ",", "|", "?"]);

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < source.length) {
    const ch = source[i];
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (ch === "[" && source[i + 1] === "]") {
      tokens.push({ type: "punct", value: "[]", at: i });
      i += 2;
      continue;
    }
    if (PUNCTUATION.has(ch)) {
      tokens.push({ type: "punct", value: ch, at: i });
      i++;
      continue;
    }
    if (ch === '"') {
      const end = source.indexOf('"', i + 1);
      if (end === -1) throw new ValidationError(`unterminated string literal at ${i}`, "type");
      tokens.push({ type: "string", value: source.slice(i + 1, end), at: i });
      i = end + 1;
      continue;
    }
    const number = /^-?\d+(\.\d+)?/.exec(source.slice(i));
    if (number) {
      tokens.push({ type: "number", value: Number(number[0]), at: i });
      i += number[0].length;
      continue;
    }
    const ident = /^[A-Za-z_][A-Za-z0-9_]*/.exec(source.slice(i));
    if (ident) {
      tokens.push({ type: "ident", value: ident[0], at: i });
      i += ident[0].length;
      continue;
    }
    throw new ValidationError(`unexpected character "${ch}" at ${i}`, "type");
  }
  return tokens;
}

class TypeExpressionParser {
  private pos = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: Token[],
  ) {}

  parse(): TypeRef {
    const ref = this.parseUnion();
    const rest = this.tokens[this.pos];
    if (rest) this.fail(`unexpected "${String(rest.value)}"`, rest.at);
    return ref;
  }

  private parseUnion(): TypeRef {
    const members = [this.parsePostfix()];
    while (this.peekPunct("|")) {
      this.pos++;
      members.push(this.parsePostfix());
    }
    return members.length === 1 ? members[0] : t.union(...members);
  }

  private parsePostfix(): TypeRef {
    let ref = this.parseAtom();
    for (;;) {
      if (this.peekPunct("[]")) {
        this.pos++;
        ref = t.list(ref);
      } else if (this.peekPunct("?")) {
        this.pos++;
        ref = t.optional(ref);
      } else {
        return ref;
      }
    }
  }

  private parseAtom(): TypeRef {
    const token = this.tokens[this.pos];
    if (!token) return this.fail("unexpected end of type expression", this.source.length);
    this.pos++;

    switch (token.type) {
      case "string":
        return t.literal(token.value);
      case "number":
        return t.literal(token.value);
      case "punct":
        if (token.value === "(") {
          const inner = this.parseUnion();
          this.expectPunct(")");
          return inner;
        }
        return this.fail(`unexpected "${token.value}"`, token.at);
      case "ident":
        return this.identifier(token.value);
    }
  }

  private identifier(name: string): TypeRef {
    if (name === "map" && this.peekPunct("<")) {
      this.pos++;
      const key = this.parseUnion();
      this.expectPunct(",");
      const value = this.parseUnion();
      this.expectPunct(">");
      return t.map(key, value);
    }
    if (name === "true" || name === "false") return t.literal(name === "true");
    if (name === "image" || name === "audio") return { kind: "media", media: name };
    const primitive = PRIMITIVE_NAMES.find((p) => p === name);
    return primitive ? { kind: "primitive", name: primitive } : t.ref(name);
  }

  private peekPunct(value: string): boolean {
    const token = this.tokens[this.pos];
    return token !== undefined && token.type === "punct" && token.value === value;
  }

  private expectPunct(value: string): void {
    if (!this.peekPunct(value)) {
      const token = this.tokens[this.pos];
      this.fail(`expected "${value}"`, token ? token.at : this.source.length);
    }
    this.pos++;
  }

  private fail(message: string, at: number): never {
    throw new ValidationError(`${message} at ${at} in "${this.source}"`, "type");
  }
}

/**
 * Parse the textual form produced by `typeName()`.
 *
 * @throws ValidationError when the text is not a type expression
 */
export function parseTypeExpression(source: string): TypeRef {
  return new TypeExpressionParser(source, tokenize(source)).parse();
}
