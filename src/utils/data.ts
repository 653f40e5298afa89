/**
 * Read-only views over untrusted nested data (decoded JSON from the dashboard API).
 * Every position is classified into one of four shapes before it is used, so callers
 * never inspect raw values directly.
 */

export type Scalar = string | number | boolean;

export type DataNode =
  | { kind: 'absent' }
  | { kind: 'scalar'; value: Scalar }
  | { kind: 'sequence'; items: readonly unknown[] }
  | { kind: 'mapping'; entries: Readonly<Record<string, unknown>> };

export type PathSegment = string | number;

export interface DataVisitor {
  mapping(entries: Readonly<Record<string, unknown>>, depth: number): void;
}

const ABSENT: DataNode = { kind: 'absent' };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Classify a value. null, undefined and anything that is not plain data
 * (functions, symbols, bigints) are treated as absent.
 */
export function inspect(value: unknown): DataNode {
  if (typeof value === 'string' || typeof value === 'boolean') {
    return { kind: 'scalar', value };
  }
  if (typeof value === 'number') {
    return Number.isNaN(value) ? ABSENT : { kind: 'scalar', value };
  }
  if (Array.isArray(value)) {
    return { kind: 'sequence', items: value };
  }
  if (isRecord(value)) {
    return { kind: 'mapping', entries: value };
  }
  return ABSENT;
}

/**
 * Follow a path of mapping keys and sequence indexes. Any mismatch along the way
 * yields undefined instead of throwing.
 *
 * pick(widget, 'rawConfiguration', 'nrqlQueries', 0, 'value')
 */
export function pick(value: unknown, ...path: PathSegment[]): unknown {
  let current: unknown = value;
  for (const segment of path) {
    const node = inspect(current);
    if (typeof segment === 'number') {
      if (node.kind !== 'sequence') return undefined;
      current = node.items[segment];
    } else {
      if (node.kind !== 'mapping') return undefined;
      current = Object.hasOwn(node.entries, segment) ? node.entries[segment] : undefined;
    }
  }
  return current;
}

/** Like pick, but only returns non-empty strings. */
export function pickString(value: unknown, ...path: PathSegment[]): string | undefined {
  const found = pick(value, ...path);
  return typeof found === 'string' && found.length > 0 ? found : undefined;
}

/**
 * Depth-first walk over arbitrarily nested sequences and mappings.
 * Stops descending past maxDepth and never enters the same object twice, so
 * self-referential input terminates.
 */
export function visitData(root: unknown, visitor: DataVisitor, maxDepth: number): void {
  const seen = new WeakSet<object>();

  const visit = (value: unknown, depth: number): void => {
    if (depth > maxDepth) return;
    const node = inspect(value);
    switch (node.kind) {
      case 'absent':
      case 'scalar':
        return;
      case 'sequence':
        if (seen.has(node.items)) return;
        seen.add(node.items);
        for (const item of node.items) visit(item, depth + 1);
        return;
      case 'mapping':
        if (seen.has(node.entries)) return;
        seen.add(node.entries);
        visitor.mapping(node.entries, depth);
        for (const child of Object.values(node.entries)) visit(child, depth + 1);
        return;
    }
  };

  visit(root, 0);
}
