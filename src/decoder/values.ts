// =============================================================================
// Decoded values — Shapes, leaf paths and freezing
// =============================================================================

import { MediaValue } from "../domain/media.js";

export type DecodedLeaf = string | number | boolean | null | MediaValue;

export type DecodedValue = DecodedLeaf | DecodedValue[] | DecodedObject;

export interface DecodedObject {
  [key: string]: DecodedValue;
}

export const ROOT_PATH = "<root>";

const PLAIN_KEY = /^[^.[\]"]+$/;

/** Keys that could be mistaken for path syntax are written as `["a.b"]`. */
export function childPath(parent: string, key: string): string {
  if (!PLAIN_KEY.test(key)) return `${parent}[${JSON.stringify(key)}]`;
  return parent === "" ? key : `${parent}.${key}`;
}

export function indexPath(parent: string, index: number): string {
  return `${parent}[${index}]`;
}

/** `""` is the root, shown as `<root>`. */
export function displayPath(path: string): string {
  return path === "" ? ROOT_PATH : path;
}

export function isLeaf(value: DecodedValue): value is DecodedLeaf {
  return value === null || typeof value !== "object" || value instanceof MediaValue;
}

/** Every leaf of `value` keyed by its path (`a.b[2].c`, `a["x.y"]`). Empty containers contribute nothing. */
export function collectLeaves(value: DecodedValue): Map<string, DecodedLeaf> {
  const leaves = new Map<string, DecodedLeaf>();
  const visit = (v: DecodedValue, path: string): void => {
    if (isLeaf(v)) {
      leaves.set(displayPath(path), v);
    } else if (Array.isArray(v)) {
      v.forEach((item, i) => visit(item, indexPath(path, i)));
    } else {
      for (const [key, item] of Object.entries(v)) visit(item, childPath(path, key));
    }
  };
  visit(value, "");
  return leaves;
}

export function leafEquals(a: DecodedLeaf, b: DecodedLeaf): boolean {
  if (a instanceof MediaValue) return b instanceof MediaValue && a.equals(b);
  return a === b;
}

export function sameLeaves(a: ReadonlyMap<string, DecodedLeaf>, b: ReadonlyMap<string, DecodedLeaf>): boolean {
  if (a.size !== b.size) return false;
  for (const [path, leaf] of a) {
    const other = b.get(path);
    if (other === undefined || !leafEquals(leaf, other)) return false;
  }
  return true;
}

export function renderLeaf(leaf: DecodedLeaf): string {
  return leaf instanceof MediaValue ? leaf.toString() : JSON.stringify(leaf);
}

export function freezeValue<T extends DecodedValue>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    if (Array.isArray(value)) {
      value.forEach(freezeValue);
    } else if (!(value instanceof MediaValue)) {
      Object.values(value).forEach(freezeValue);
    }
  }
  return value;
}
