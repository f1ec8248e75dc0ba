/**
 * ManagementShell - mode-based command dispatcher
 *
 *   operational   router#
 *   configure     router(config)#, router(config-<node>)# when nested
 *
 * The line editor resolves what the operator typed to a token and its
 * arguments; the shell runs that token's action against the session.
 * A failing command prints "% <reason>" and the session carries on.
 */

import { loadConsoleConfig, type ConsoleConfig } from '../core/config';
import { errorMessage, formatUserError, ShellCommandError } from '../core/errors';
import { Logger } from '../core/Logger';
import { stdoutTerminal, type Terminal } from '../output/Pager';
import { Commands } from './Commands';
import type { ParsedArgs, TokenId } from './CommandTrie';
import { registerInternalCommands } from './commands/InternalCommands';
import { registerOspfShowCommands } from './commands/OspfShowCommands';
import { listRoots } from './ModeContext';
import { Session, type ConfigBackend } from './Session';

const log = Logger.scope('shell');

export interface ManagementShellOptions {
  config?: ConsoleConfig;
  terminal?: Terminal;
}

export class ManagementShell {
  readonly commands = new Commands();
  readonly session: Session;

  constructor(backend: ConfigBackend, options: ManagementShellOptions = {}) {
    const terminal = options.terminal ?? stdoutTerminal;
    this.session = new Session(backend, options.config ?? loadConsoleConfig(), terminal);
    registerInternalCommands(this.commands);
    registerOspfShowCommands(this.commands);
  }

  // ─── Prompt Generation ─────────────────────────────────────────

  getPrompt(): string {
    const host = this.session.hostname();
    const mode = this.session.mode();
    switch (mode.kind) {
      case 'operational':
        return `${host}# `;
      case 'configure': {
        const entry = mode.nestingPath[mode.nestingPath.length - 1];
        if (!entry) return `${host}(config)# `;
        return `${host}(config-${this.commands.trie.token(entry.tokenId).name})# `;
      }
    }
  }

  // ─── Command Lookup ────────────────────────────────────────────

  /** Exact-name lookup of a command path across the roots of the current mode. */
  resolve(names: readonly string[]): TokenId | undefined {
    for (const root of listRoots(this.session.mode(), this.commands)) {
      const found = this.commands.trie.find(root, names);
      if (found !== undefined) return found;
    }
    return undefined;
  }

  // ─── Main Execute ──────────────────────────────────────────────

  /**
   * Run the action of `tokenId` with already-parsed arguments.
   * Returns true when the operator asked to leave the shell.
   */
  run(tokenId: TokenId, args: ParsedArgs = []): boolean {
    const token = this.commands.trie.token(tokenId);
    if (!token.action) {
      this.session.print(formatUserError('incomplete command'));
      return false;
    }

    log.debug('command:run', token.name, { tokenId, args: args.map(([name]) => name) });
    try {
      return token.action({ commands: this.commands, session: this.session, tokenId }, [...args]);
    } catch (e) {
      if (!(e instanceof ShellCommandError)) throw e;
      log.warn('command:error', errorMessage(e), { tokenId });
      this.session.print(formatUserError(e.message));
      return false;
    }
  }

  /** Resolve and run in one step; unknown paths are reported like any failure. */
  execute(names: readonly string[], args: ParsedArgs = []): boolean {
    const tokenId = this.resolve(names);
    if (tokenId === undefined) {
      this.session.print(formatUserError(`unknown command "${names.join(' ')}"`));
      return false;
    }
    return this.run(tokenId, args);
  }
}
