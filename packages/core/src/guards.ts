/**
 * Structural Guards — narrow a raw document node to the shape a caller needs.
 *
 * The decoded YAML tree has three kinds of node: mapping, sequence and
 * scalar. Callers never inspect kinds themselves; a mismatch becomes a
 * SpecError carrying the caller's message verbatim.
 *
 * The YAML decoder yields mappings as `Map`s so that key order is document
 * order, including integer-like keys. Plain objects (trees built in code)
 * are accepted as well. Either way a caller gets a `Map` with string keys.
 */

import { SpecError } from './errors.js';

export type DocMapping = ReadonlyMap<string, unknown>;
export type DocSequence = unknown[];

export type NodeKind = 'mapping' | 'sequence' | 'scalar';

function isPlainObject(node: unknown): node is Record<string, unknown> {
  return typeof node === 'object' && node !== null && !Array.isArray(node)
    && !(node instanceof Date) && !(node instanceof Map) && !(node instanceof Set);
}

function isMapping(node: unknown): node is Map<unknown, unknown> | Record<string, unknown> {
  return node instanceof Map || isPlainObject(node);
}

export function nodeKind(node: unknown): NodeKind {
  if (Array.isArray(node)) return 'sequence';
  if (isMapping(node)) return 'mapping';
  return 'scalar';
}

export function expectMapping(node: unknown, message: string): DocMapping {
  if (node instanceof Map) {
    return withStringKeys(node);
  }
  if (isPlainObject(node)) {
    return new Map(Object.entries(node));
  }
  throw new SpecError(message);
}

function withStringKeys(node: Map<unknown, unknown>): DocMapping {
  const out = new Map<string, unknown>();
  for (const [key, value] of node) {
    const name = String(key);
    if (out.has(name)) {
      throw new SpecError(`Mapping key '${name}' appears more than once.`);
    }
    out.set(name, value);
  }
  return out;
}

export function expectSequence(node: unknown, message: string): DocSequence {
  if (!Array.isArray(node)) {
    throw new SpecError(message);
  }
  return node;
}

/**
 * Short name of a node's runtime kind, for error messages.
 */
export function describeNode(node: unknown): string {
  if (node === null || node === undefined) return 'null';
  if (Array.isArray(node)) return 'sequence';
  if (node instanceof Date) return 'timestamp';
  if (node instanceof Map) return 'mapping';
  switch (typeof node) {
    case 'string':
      return 'string';
    case 'boolean':
      return 'boolean';
    case 'number':
      return Number.isInteger(node) ? 'integer' : 'float';
    case 'object':
      return 'mapping';
    default:
      return typeof node;
  }
}

/**
 * Deep copy of a node with every `Map` turned into a plain object, for
 * values handed to consumers uninterpreted (step config, header metadata).
 * Anything that is not a `Map` or an array is kept by reference.
 */
export function toPlainValue(node: unknown): unknown {
  if (node instanceof Map) {
    return Object.fromEntries([...node].map(([key, value]) => [String(key), toPlainValue(value)]));
  }
  if (Array.isArray(node)) {
    return node.map(toPlainValue);
  }
  return node;
}
