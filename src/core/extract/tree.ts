// src/core/extract/tree.ts
import { isLosslessNumber } from 'lossless-json';
import type { TreeMapping, TreeScalar, TreeSequence, TreeValue } from '../types/index.js';

export function scalar(value: string | boolean | null): TreeScalar {
  return { kind: 'scalar', value };
}

export function mapping(entries: Iterable<readonly [string, TreeValue]>): TreeMapping {
  return { kind: 'mapping', entries: new Map(entries) };
}

export function sequence(items: readonly TreeValue[]): TreeSequence {
  return { kind: 'sequence', items };
}

export function stringMapping(fields: Readonly<Record<string, string>>): TreeMapping {
  return mapping(Object.entries(fields).map(([key, value]) => [key, scalar(value)] as const));
}

/**
 * Converts a lossless-json parse result. Numbers arrive as LosslessNumber and
 * are kept as their source text.
 */
export function fromParsed(value: unknown): TreeValue {
  if (isLosslessNumber(value)) {
    return scalar(value.value);
  }
  if (typeof value === 'string' || typeof value === 'boolean' || value === null) {
    return scalar(value);
  }
  if (Array.isArray(value)) {
    return sequence(value.map((item: unknown) => fromParsed(item)));
  }
  if (typeof value === 'object') {
    return mapping(Object.entries(value).map(([key, item]) => [key, fromParsed(item)] as const));
  }
  return scalar(String(value));
}

export function field(tree: TreeValue | undefined, key: string): TreeValue | undefined {
  return tree?.kind === 'mapping' ? tree.entries.get(key) : undefined;
}

// Non-empty string content of a scalar; booleans and nulls have none.
export function text(tree: TreeValue | undefined): string | undefined {
  if (tree?.kind !== 'scalar' || typeof tree.value !== 'string') {
    return undefined;
  }
  const value = tree.value.trim();
  return value ? value : undefined;
}

export function fieldText(tree: TreeValue | undefined, key: string): string | undefined {
  return text(field(tree, key));
}

export function items(tree: TreeValue | undefined): readonly TreeValue[] {
  if (!tree) {
    return [];
  }
  return tree.kind === 'sequence' ? tree.items : [tree];
}

export function firstText(tree: TreeValue | undefined): string | undefined {
  for (const item of items(tree)) {
    const value = text(item);
    if (value) {
      return value;
    }
  }
  return undefined;
}

/** Mappings of a tree, depth-first, parents before children, in source order. */
export function* walkMappings(tree: TreeValue): Generator<TreeMapping> {
  if (tree.kind === 'mapping') {
    yield tree;
    for (const child of tree.entries.values()) {
      yield* walkMappings(child);
    }
  } else if (tree.kind === 'sequence') {
    for (const child of tree.items) {
      yield* walkMappings(child);
    }
  }
}

export function hasType(tree: TreeMapping, typeName: string): boolean {
  return items(tree.entries.get('@type')).some((item) => text(item) === typeName);
}

export function stringFields(tree: TreeValue): Record<string, string> {
  const result: Record<string, string> = {};
  if (tree.kind !== 'mapping') {
    return result;
  }
  for (const [key, value] of tree.entries) {
    const content = text(value);
    if (content !== undefined) {
      result[key] = content;
    }
  }
  return result;
}
