// =============================================================================
// SchemaSnapshot — Immutable, validated view of a SchemaRegistry
// =============================================================================

import { UnknownTypeReferenceError } from "../errors.js";
import { describeSchema } from "./describe.js";
import type { ClassDef, Definition, EnumDef } from "./types.js";

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Produced by `SchemaRegistry.snapshot()`. Every type reference inside a
 * snapshot resolves, and nothing in it can be mutated, so one snapshot may be
 * shared by any number of concurrent decode sessions.
 */
export class SchemaSnapshot {
  private readonly classMap: Map<string, ClassDef>;
  private readonly enumMap: Map<string, EnumDef>;

  constructor(classes: readonly ClassDef[], enums: readonly EnumDef[]) {
    this.classMap = new Map(classes.map((c) => [c.name, deepFreeze(c)]));
    this.enumMap = new Map(enums.map((e) => [e.name, deepFreeze(e)]));
    Object.freeze(this);
  }

  get classes(): readonly ClassDef[] {
    return [...this.classMap.values()];
  }

  get enums(): readonly EnumDef[] {
    return [...this.enumMap.values()];
  }

  lookup(name: string): Definition | undefined {
    return this.classMap.get(name) ?? this.enumMap.get(name);
  }

  /** Resolve a name that validation guarantees to exist. */
  resolve(name: string): Definition {
    const def = this.lookup(name);
    if (!def) throw new UnknownTypeReferenceError(name, `"${name}" is not part of this schema snapshot`);
    return def;
  }

  describe(): string {
    return describeSchema(this.classMap.values(), this.enumMap.values());
  }
}
