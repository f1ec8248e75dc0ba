/**
 * Read-only helpers over a ConfigTree used by every renderer and show command.
 */

import type { ConfigTree, NodeId } from './ConfigTree';

export const MISSING_VALUE = '-';

export function childOptValue(tree: ConfigTree, id: NodeId, name: string): string | undefined {
  for (const child of tree.children(id)) {
    const node = tree.node(child);
    if (node.name === name) return node.value;
  }
  return undefined;
}

/** Canonical value of the named child, or "-" when absent. */
export function childValue(tree: ConfigTree, id: NodeId, name: string): string {
  return childOptValue(tree, id, name) ?? MISSING_VALUE;
}

interface PathStep {
  name: string;
  predicates: Array<[string, string]>;
}

const STEP_RE = /^([^[\]]+)((?:\[[^=\]]+='[^']*'\])*)$/;
const PREDICATE_RE = /\[([^=\]]+)='([^']*)'\]/g;
// a step runs to the next "/" outside a quoted predicate value
const PATH_STEP_RE = /(?:[^/[\]]|\[[^=\]]+='[^']*'\])+/g;

function parseStep(step: string): PathStep {
  const m = step.match(STEP_RE);
  if (!m) return { name: step, predicates: [] };
  const predicates: Array<[string, string]> = [];
  for (const p of m[2].matchAll(PREDICATE_RE)) {
    predicates.push([p[1], p[2]]);
  }
  return { name: m[1], predicates };
}

/**
 * Find the nodes reached from `from` by a "/"-separated path of child names.
 * Each step may filter on child values: "interface[name='eth0']"; a quoted
 * value may itself contain "/", as in "route[prefix='10.1.0.0/24']".
 * A leading "/" is ignored.
 */
export function findNodes(tree: ConfigTree, from: NodeId, path: string): NodeId[] {
  const steps = (path.match(PATH_STEP_RE) ?? []).map(parseStep);
  let current: NodeId[] = [from];

  for (const step of steps) {
    const next: NodeId[] = [];
    for (const id of current) {
      for (const child of tree.children(id)) {
        if (tree.node(child).name !== step.name) continue;
        if (step.predicates.every(([key, value]) => childOptValue(tree, child, key) === value)) {
          next.push(child);
        }
      }
    }
    current = next;
  }

  return current;
}
