/**
 * ConfigFlattener - renders a configuration tree as canonical command text
 *
 * Pure function: ConfigTree → string. Each eligible node becomes one command
 * line built from its path below the nearest enclosing list entry; list
 * entries open with a "!" separator and the text closes with a final "!".
 *
 *   !
 *   interfaces interface eth0
 *    description uplink
 *    mtu 1500
 *   !
 */

import type { ConfigNodeKind, ConfigTree, NodeId } from './ConfigTree';

export const INDENT_UNIT = ' ';
export const ENTRY_SEPARATOR = '!';

/** Whether a node of this kind stands for a command line of its own. */
export function isCommandNode(kind: ConfigNodeKind): boolean {
  switch (kind) {
    case 'container':
    case 'leaf':
    case 'leaf-list':
    case 'list':
      return true;
    case 'np-container':
    case 'list-key':
    case 'other':
      return false;
    default: {
      const unreachable: never = kind;
      return unreachable;
    }
  }
}

/**
 * Nodes that make up a command line: the node itself plus its ancestors up to
 * (not including) the nearest list or the tree root, top-down.
 */
function localPath(tree: ConfigTree, id: NodeId): NodeId[] {
  const path = [id];
  for (let cur = tree.parent(id); cur !== null && cur !== tree.root; cur = tree.parent(cur)) {
    if (tree.node(cur).kind === 'list') break;
    path.push(cur);
  }
  return path.reverse();
}

function commandTokens(tree: ConfigTree, id: NodeId): string[] {
  const tokens: string[] = [];
  for (const step of localPath(tree, id)) {
    const node = tree.node(step);
    tokens.push(node.name);
    if (node.kind === 'list') {
      tokens.push(...tree.listKeys(step));
    } else if (node.value !== undefined) {
      tokens.push(node.value);
    }
  }
  return tokens;
}

export function flattenConfig(tree: ConfigTree, withDefaults: boolean, from: NodeId = tree.root): string {
  let output = '';

  for (const id of tree.descendants(from)) {
    const node = tree.node(id);
    if (!isCommandNode(node.kind)) continue;
    if (!withDefaults && node.isDefault) continue;

    const depth = tree.ancestors(id).filter(a => tree.node(a).kind === 'list').length;
    const indent = INDENT_UNIT.repeat(depth);

    if (node.kind === 'list') {
      output += `${indent}${ENTRY_SEPARATOR}\n`;
    }
    output += `${indent}${commandTokens(tree, id).join(' ')}\n`;
  }

  output += `${ENTRY_SEPARATOR}\n`;
  return output;
}
