import { GraphCycleError } from "../core/errors";
import type { Tensor } from "../tensor";

export type GraphInfo = {
  /** Every reachable node, in discovery order. */
  nodes: Tensor[];
  /** Number of parent slots per node (0 for leaves). */
  parentCounts: Map<Tensor, number>;
  /** parent -> children, one entry per slot the child uses the parent in. */
  children: Map<Tensor, Tensor[]>;
};

/** Parents that participate in traversal. Leaves have none. */
export function graphParents(node: Tensor): Tensor[] {
  const recipe = node.recipe;
  if (node.isLeaf || recipe === null) {
    return [];
  }
  return Array.from(recipe.parents.values());
}

/**
 * Depth-first walk from `root` over the parent relation. Nodes are keyed by
 * identity; two tensors with equal values are still distinct nodes.
 */
export function collectGraph(root: Tensor): GraphInfo {
  const nodes: Tensor[] = [];
  const parentCounts = new Map<Tensor, number>();
  const children = new Map<Tensor, Tensor[]>();
  const stack: Tensor[] = [root];

  for (let node = stack.pop(); node !== undefined; node = stack.pop()) {
    if (parentCounts.has(node)) continue;
    const parents = graphParents(node);
    nodes.push(node);
    parentCounts.set(node, parents.length);
    for (const parent of parents) {
      const list = children.get(parent);
      if (list === undefined) {
        children.set(parent, [node]);
      } else {
        list.push(node);
      }
      if (!parentCounts.has(parent)) {
        stack.push(parent);
      }
    }
  }

  return { nodes, parentCounts, children };
}

/**
 * Kahn ordering of everything reachable from `root`: each node appears after
 * all of its parents, and `root` comes last.
 */
export function topologicalSort(root: Tensor): Tensor[] {
  const { nodes, parentCounts, children } = collectGraph(root);
  const remaining = new Map(parentCounts);
  const queue = nodes.filter((node) => remaining.get(node) === 0);
  const order: Tensor[] = [];

  for (let head = 0; head < queue.length; head += 1) {
    const node = queue[head];
    order.push(node);
    for (const child of children.get(node) ?? []) {
      const left = (remaining.get(child) ?? 0) - 1;
      remaining.set(child, left);
      if (left === 0) {
        queue.push(child);
      }
    }
  }

  if (order.length !== nodes.length) {
    throw new GraphCycleError(
      `Graph contains a cycle: ordered ${order.length} of ${nodes.length} nodes`,
    );
  }
  return order;
}
