/**
 * Tagged view over untyped payload values and a depth-bounded walker
 */

export type PayloadNode =
  | { kind: 'object'; entries: Readonly<Record<string, unknown>> }
  | { kind: 'list'; items: readonly unknown[] }
  | { kind: 'scalar'; value: unknown };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toNode(value: unknown): PayloadNode {
  if (Array.isArray(value)) {
    return { kind: 'list', items: value };
  }
  if (isRecord(value)) {
    return { kind: 'object', entries: value };
  }
  return { kind: 'scalar', value };
}

export type VisitResult = 'descend' | 'skip-children';

/**
 * Pre-order walk using an explicit stack. The root sits at depth 0 and nodes
 * deeper than maxDepth are never visited. Scalars are not handed to the visitor.
 */
export function walkPayload(
  root: unknown,
  maxDepth: number,
  visit: (node: Extract<PayloadNode, { kind: 'object' }>, depth: number) => VisitResult
): void {
  const stack: Array<{ value: unknown; depth: number }> = [{ value: root, depth: 0 }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame || frame.depth > maxDepth) {
      continue;
    }

    const node = toNode(frame.value);
    if (node.kind === 'scalar') {
      continue;
    }
    if (node.kind === 'object' && visit(node, frame.depth) === 'skip-children') {
      continue;
    }
    const children = node.kind === 'list' ? node.items : Object.values(node.entries);

    // reversed so the first child is popped first
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ value: children[i], depth: frame.depth + 1 });
    }
  }
}
