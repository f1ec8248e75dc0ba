/**
 * CommandTrie - arena-stored trie of command tokens
 *
 * Each token is a keyword, a parameter placeholder (word) or a literal taken
 * from a configuration schema node. A path from a root to a token carrying an
 * action is one complete executable command; tokens without an action only
 * extend a prefix.
 *
 * Children keep their registration order, which is also the order in which
 * commands are listed:
 *
 *   trie.register(root, 'show configuration <configuration>', handler);
 *   [...enumerateCommands(trie, root)]  →  ['SHOW CONFIGURATION configuration ']
 */

import type { Session } from './Session';
import type { Commands } from './Commands';

export type TokenId = number;

export type TokenKind =
  | 'keyword'   // fixed literal subcommand
  | 'word'      // free-form parameter placeholder
  | 'schema';   // literal named after a configuration schema node

/** Already-parsed command arguments, in the order they were typed. */
export type ParsedArgs = Array<[name: string, value: string]>;

export interface CommandContext {
  commands: Commands;
  session: Session;
  /** Token whose action is running */
  tokenId: TokenId;
}

/** Returns true when the shell should exit. */
export type CommandAction = (ctx: CommandContext, args: ParsedArgs) => boolean;

export interface CommandToken {
  readonly id: TokenId;
  readonly name: string;
  readonly kind: TokenKind;
  readonly action?: CommandAction;
  readonly parent: TokenId | null;
  readonly children: readonly TokenId[];
}

interface MutableToken {
  id: TokenId;
  name: string;
  kind: TokenKind;
  action?: CommandAction;
  parent: TokenId | null;
  children: TokenId[];
}

const PLACEHOLDER_RE = /^<(.+)>$/;

export class CommandTrie {
  private readonly tokens: MutableToken[] = [];

  // ─── Tree Construction ──────────────────────────────────────────

  /** Create a structural root token; roots are never listed themselves. */
  createRoot(name: string): TokenId {
    return this.push(name, 'keyword', null);
  }

  /**
   * Append a token under `parent`, or return the existing child with the
   * same name and kind. An action given here is attached to that token.
   */
  addToken(parent: TokenId, name: string, kind: TokenKind, action?: CommandAction): TokenId {
    const parentToken = this.get(parent);
    let id = parentToken.children.find(c => {
      const t = this.get(c);
      return t.name === name && t.kind === kind;
    });
    if (id === undefined) {
      id = this.push(name, kind, parent);
      parentToken.children.push(id);
    }
    if (action) this.get(id).action = action;
    return id;
  }

  /**
   * Register a command path under `root`.
   * Segments written as <name> become parameter placeholders, the rest keywords.
   *
   * Example:
   *   trie.register(root, 'hostname <hostname>', cmdHostname);
   */
  register(root: TokenId, path: string, action: CommandAction): TokenId {
    const segments = path.trim().split(/\s+/).filter(s => s.length > 0);
    let node = root;
    for (const segment of segments) {
      const placeholder = segment.match(PLACEHOLDER_RE);
      node = placeholder
        ? this.addToken(node, placeholder[1], 'word')
        : this.addToken(node, segment, 'keyword');
    }
    this.get(node).action = action;
    return node;
  }

  private push(name: string, kind: TokenKind, parent: TokenId | null): TokenId {
    const id = this.tokens.length;
    this.tokens.push({ id, name, kind, parent, children: [] });
    return id;
  }

  // ─── Navigation ─────────────────────────────────────────────────

  token(id: TokenId): CommandToken {
    return this.get(id);
  }

  private get(id: TokenId): MutableToken {
    const token = this.tokens[id];
    if (!token) throw new Error(`unknown token id ${id}`);
    return token;
  }

  /** Pre-order walk of the tokens below `root`, `root` excluded. */
  *descendants(root: TokenId): Generator<TokenId> {
    const stack = [...this.get(root).children].reverse();
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined) break;
      yield id;
      const children = this.get(id).children;
      for (let i = children.length - 1; i >= 0; i--) stack.push(children[i]);
    }
  }

  /** Exact-name lookup of a token path below `root`. */
  find(root: TokenId, names: readonly string[]): TokenId | undefined {
    let node = root;
    for (const name of names) {
      const next = this.get(node).children.find(c => this.get(c).name === name);
      if (next === undefined) return undefined;
      node = next;
    }
    return node;
  }

  /**
   * Tokens from just below `root` down to `id`, top-down.
   * Stops on reaching `root` itself; returns [] when `id` is not below it.
   */
  pathFrom(root: TokenId, id: TokenId): TokenId[] {
    const path: TokenId[] = [];
    let cur: TokenId | null = id;
    while (cur !== root) {
      if (cur === null) return [];
      path.push(cur);
      cur = this.get(cur).parent;
    }
    return path.reverse();
  }
}

// ─── Enumeration ─────────────────────────────────────────────────

export function renderTokenName(token: CommandToken): string {
  switch (token.kind) {
    case 'keyword':
      return token.name.toUpperCase();
    case 'word':
    case 'schema':
      return token.name;
    default: {
      const unreachable: never = token.kind;
      return unreachable;
    }
  }
}

/**
 * Every executable command below `root`, one line per command, in
 * registration order. Each call walks the trie afresh.
 */
export function* enumerateCommands(trie: CommandTrie, root: TokenId): Generator<string> {
  for (const id of trie.descendants(root)) {
    if (!trie.token(id).action) continue;
    const names = trie.pathFrom(root, id).map(t => renderTokenName(trie.token(t)));
    yield `${names.join(' ')} `;
  }
}
