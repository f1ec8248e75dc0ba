/**
 * DataPrinter - structured (JSON / XML) renderings of a ConfigTree
 *
 * Lists and leaf-lists collapse their sibling entries into arrays in JSON and
 * repeat the element in XML. Default nodes are left out unless asked for.
 */

import { ShellCommandError } from '../core/errors';
import type { ConfigTree, NodeId } from './ConfigTree';

export type DataFormat = 'json' | 'xml';

type JsonValue = string | JsonValue[] | { [key: string]: JsonValue };

export function parseDataFormat(format: string): DataFormat {
  switch (format) {
    case 'json':
    case 'xml':
      return format;
    default:
      throw new ShellCommandError(`unknown format "${format}"`);
  }
}

function visibleChildren(tree: ConfigTree, id: NodeId, withDefaults: boolean): NodeId[] {
  return tree.children(id).filter(c => withDefaults || !tree.node(c).isDefault);
}

function toJson(tree: ConfigTree, id: NodeId, withDefaults: boolean): { [key: string]: JsonValue } {
  const obj: { [key: string]: JsonValue } = {};
  for (const child of visibleChildren(tree, id, withDefaults)) {
    const node = tree.node(child);
    switch (node.kind) {
      case 'leaf':
      case 'list-key':
        obj[node.name] = node.value ?? '';
        break;
      case 'leaf-list': {
        const existing = obj[node.name];
        const values = Array.isArray(existing) ? existing : [];
        values.push(node.value ?? '');
        obj[node.name] = values;
        break;
      }
      case 'list': {
        const existing = obj[node.name];
        const entries = Array.isArray(existing) ? existing : [];
        entries.push(toJson(tree, child, withDefaults));
        obj[node.name] = entries;
        break;
      }
      case 'container':
      case 'np-container':
      case 'other':
        obj[node.name] = toJson(tree, child, withDefaults);
        break;
      default: {
        const unreachable: never = node.kind;
        throw new Error(`unexpected node kind ${String(unreachable)}`);
      }
    }
  }
  return obj;
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

function toXml(tree: ConfigTree, id: NodeId, withDefaults: boolean, depth: number, out: string[]): void {
  const pad = '  '.repeat(depth);
  for (const child of visibleChildren(tree, id, withDefaults)) {
    const node = tree.node(child);
    if (node.value !== undefined) {
      out.push(`${pad}<${node.name}>${escapeXml(node.value)}</${node.name}>`);
    } else if (tree.children(child).length === 0) {
      out.push(`${pad}<${node.name}/>`);
    } else {
      out.push(`${pad}<${node.name}>`);
      toXml(tree, child, withDefaults, depth + 1, out);
      out.push(`${pad}</${node.name}>`);
    }
  }
}

export function printData(tree: ConfigTree, format: DataFormat, withDefaults: boolean): string {
  switch (format) {
    case 'json':
      return JSON.stringify(toJson(tree, tree.root, withDefaults), null, 2);
    case 'xml': {
      const out: string[] = [];
      toXml(tree, tree.root, withDefaults, 0, out);
      return out.join('\n');
    }
  }
}
