/*
Structural path operations over JSON state trees.
Assumes paths address object keys only; arrays are replaced as whole values.
Only own properties are walked, and prototype keys are never valid segments.
*/

import { cloneJson, isJsonObject, type JsonObject, type JsonValue } from "../protocol/json.js";
import { RESERVED_PATH_SEGMENTS, type DeltaOp } from "../protocol/messages.js";

export type StatePath = readonly string[];

export function isValidPath(path: StatePath): boolean {
  return (
    path.length > 0 &&
    path.every((segment) => segment.length > 0 && !RESERVED_PATH_SEGMENTS.has(segment))
  );
}

export function normalizePath(path: string | StatePath): string[] {
  const segments = typeof path === "string" ? path.split(".") : [...path];
  assertValidPath(segments);
  return segments;
}

export function getAt(root: JsonObject, path: StatePath): JsonValue | undefined {
  let node: JsonValue | undefined = root;
  for (const segment of path) {
    if (!isJsonObject(node)) return undefined;
    node = ownValue(node, segment);
  }
  return node;
}

export function setAt(root: JsonObject, path: StatePath, value: JsonValue): void {
  assertValidPath(path);
  const leaf = leafOf(path);
  const parent = ensureParent(root, path);
  parent[leaf] = cloneJson(value);
}

export function deleteAt(root: JsonObject, path: StatePath): boolean {
  assertValidPath(path);
  const leaf = leafOf(path);
  let node: JsonObject = root;
  for (const segment of path.slice(0, -1)) {
    const next = ownValue(node, segment);
    if (!isJsonObject(next)) return false;
    node = next;
  }

  if (!Object.hasOwn(node, leaf)) return false;
  delete node[leaf];
  return true;
}

/** Applies ops in order and returns the ones skipped for an invalid path. */
export function applyOps(root: JsonObject, ops: readonly DeltaOp[]): DeltaOp[] {
  const rejected: DeltaOp[] = [];
  for (const op of ops) {
    if (!isValidPath(op.path)) {
      rejected.push(op);
    } else if (op.op === "set") {
      setAt(root, op.path, op.value);
    } else {
      deleteAt(root, op.path);
    }
  }
  return rejected;
}

function assertValidPath(path: StatePath): void {
  if (!isValidPath(path)) {
    throw new Error(`Invalid state path: ${JSON.stringify(path)}`);
  }
}

function ownValue(node: JsonObject, key: string): JsonValue | undefined {
  return Object.hasOwn(node, key) ? node[key] : undefined;
}

function leafOf(path: StatePath): string {
  const leaf = path[path.length - 1];
  if (leaf === undefined) {
    throw new Error("State path must not be empty");
  }
  return leaf;
}

function ensureParent(root: JsonObject, path: StatePath): JsonObject {
  let node = root;
  for (const segment of path.slice(0, -1)) {
    const next = ownValue(node, segment);
    if (isJsonObject(next)) {
      node = next;
      continue;
    }
    const created: JsonObject = {};
    node[segment] = created;
    node = created;
  }
  return node;
}
