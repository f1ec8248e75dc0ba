/**
 * Commands - the command trie plus the roots each mode draws from
 *
 *   execRoot                 operational mode commands
 *   configDefaultInternal    built-in commands valid at every configuration level
 *   configRootInternal       built-in commands of the configuration root
 *   configRoot               commands derived from the configuration schema
 */

import { CommandTrie, type TokenId } from './CommandTrie';

export class Commands {
  readonly trie = new CommandTrie();
  readonly execRoot: TokenId;
  readonly configDefaultInternal: TokenId;
  readonly configRootInternal: TokenId;
  readonly configRoot: TokenId;

  constructor() {
    this.execRoot = this.trie.createRoot('exec');
    this.configDefaultInternal = this.trie.createRoot('config-default');
    this.configRootInternal = this.trie.createRoot('config-internal');
    this.configRoot = this.trie.createRoot('config');
  }
}
