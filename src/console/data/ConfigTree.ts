/**
 * ConfigTree - arena-stored, schema-typed configuration/state tree
 *
 * Nodes live in a flat array and refer to each other by NodeId; the parent
 * link is an index, never an owning reference. Node kinds and default-ness
 * are facts supplied by whoever builds the snapshot (the backend); the tree
 * only checks the structural rules the renderers rely on:
 *
 *   - list keys sit under a list and precede every non-key child
 *   - containers and lists carry no value
 *   - leaves, list keys and leaf-list entries carry a value and no children
 */

import { ConfigTreeError } from '../core/errors';

export type NodeId = number;

export type ConfigNodeKind =
  | 'container'      // presence container
  | 'np-container'   // non-presence container, grouping only
  | 'leaf'
  | 'list-key'
  | 'leaf-list'
  | 'list'
  | 'other';

export interface ConfigNode {
  readonly id: NodeId;
  readonly name: string;
  readonly kind: ConfigNodeKind;
  readonly value?: string;
  readonly isDefault: boolean;
  readonly parent: NodeId | null;
  readonly children: readonly NodeId[];
}

export interface ConfigNodeSpec {
  name: string;
  kind: ConfigNodeKind;
  value?: string;
  isDefault?: boolean;
}

/** Plain nested description of a subtree, as backends and fixtures supply it. */
export interface ConfigNodeInit extends ConfigNodeSpec {
  children?: ConfigNodeInit[];
}

interface MutableNode {
  id: NodeId;
  name: string;
  kind: ConfigNodeKind;
  value?: string;
  isDefault: boolean;
  parent: NodeId | null;
  children: NodeId[];
}

function carriesValue(kind: ConfigNodeKind): boolean {
  switch (kind) {
    case 'leaf':
    case 'list-key':
    case 'leaf-list':
      return true;
    case 'container':
    case 'np-container':
    case 'list':
      return false;
    case 'other':
      return false;
    default: {
      const unreachable: never = kind;
      return unreachable;
    }
  }
}

export class ConfigTree {
  private readonly nodes: MutableNode[] = [];
  readonly root: NodeId;

  constructor() {
    this.root = this.push({ name: '', kind: 'np-container' }, null);
  }

  static fromJSON(init: ConfigNodeInit[]): ConfigTree {
    const tree = new ConfigTree();
    const attach = (parent: NodeId, items: ConfigNodeInit[]): void => {
      for (const item of items) {
        const id = tree.add(parent, item);
        if (item.children) attach(id, item.children);
      }
    };
    attach(tree.root, init);
    return tree;
  }

  // ─── Construction ───────────────────────────────────────────────

  add(parent: NodeId, spec: ConfigNodeSpec): NodeId {
    const parentNode = this.get(parent);
    this.checkPlacement(parentNode, spec);
    const id = this.push(spec, parent);
    parentNode.children.push(id);
    return id;
  }

  private push(spec: ConfigNodeSpec, parent: NodeId | null): NodeId {
    const id = this.nodes.length;
    const node: MutableNode = {
      id,
      name: spec.name,
      kind: spec.kind,
      isDefault: spec.isDefault ?? false,
      parent,
      children: [],
    };
    if (spec.value !== undefined) node.value = spec.value;
    this.nodes.push(node);
    return id;
  }

  private checkPlacement(parent: MutableNode, spec: ConfigNodeSpec): void {
    if (carriesValue(parent.kind)) {
      throw new ConfigTreeError(`${parent.kind} "${parent.name}" cannot have children`);
    }
    if (carriesValue(spec.kind) && spec.value === undefined) {
      throw new ConfigTreeError(`${spec.kind} "${spec.name}" requires a value`);
    }
    if (!carriesValue(spec.kind) && spec.value !== undefined) {
      throw new ConfigTreeError(`${spec.kind} "${spec.name}" cannot carry a value`);
    }
    if (spec.kind === 'list-key') {
      if (parent.kind !== 'list') {
        throw new ConfigTreeError(`list key "${spec.name}" must be a child of a list`);
      }
      const last = parent.children[parent.children.length - 1];
      if (last !== undefined && this.get(last).kind !== 'list-key') {
        throw new ConfigTreeError(`list key "${spec.name}" must precede the non-key children of "${parent.name}"`);
      }
    }
  }

  // ─── Navigation ─────────────────────────────────────────────────

  node(id: NodeId): ConfigNode {
    return this.get(id);
  }

  private get(id: NodeId): MutableNode {
    const node = this.nodes[id];
    if (!node) throw new ConfigTreeError(`unknown node id ${id}`);
    return node;
  }

  children(id: NodeId): readonly NodeId[] {
    return this.get(id).children;
  }

  parent(id: NodeId): NodeId | null {
    return this.get(id).parent;
  }

  /** Pre-order (document order) walk of the subtree at `from`, `from` excluded. */
  *descendants(from: NodeId): Generator<NodeId> {
    const stack = [...this.get(from).children].reverse();
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined) break;
      yield id;
      const children = this.get(id).children;
      for (let i = children.length - 1; i >= 0; i--) stack.push(children[i]);
    }
  }

  /** Strict ancestors, nearest first, ending with the synthetic root. */
  ancestors(id: NodeId): NodeId[] {
    const result: NodeId[] = [];
    for (let cur = this.get(id).parent; cur !== null; cur = this.get(cur).parent) {
      result.push(cur);
    }
    return result;
  }

  /** Canonical values of a list entry's keys, in schema order. */
  listKeys(id: NodeId): string[] {
    const node = this.get(id);
    if (node.kind !== 'list') return [];
    const keys: string[] = [];
    for (const child of node.children) {
      const c = this.get(child);
      if (c.kind !== 'list-key') break;
      if (c.value !== undefined) keys.push(c.value);
    }
    return keys;
  }

  get size(): number {
    return this.nodes.length;
  }

  clone(): ConfigTree {
    const copy = new ConfigTree();
    const attach = (from: NodeId, to: NodeId): void => {
      for (const child of this.get(from).children) {
        const n = this.get(child);
        const id = copy.add(to, { name: n.name, kind: n.kind, value: n.value, isDefault: n.isDefault });
        attach(child, id);
      }
    };
    attach(this.root, copy.root);
    return copy;
  }
}
