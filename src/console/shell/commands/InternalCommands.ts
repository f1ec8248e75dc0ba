/**
 * InternalCommands - built-in console commands
 *
 * Registers commands on the Commands roots:
 *   - operational mode: configure, exit, list, hostname, show ...
 *   - every configuration level: exit, end, list, pwd, show configuration ...
 *   - configuration root: commit, discard, validate
 *
 * Handlers read the session, render and print; failures are raised as
 * ShellCommandError and reported by the dispatcher.
 */

import { errorMessage, PagerError, ShellCommandError } from '../../core/errors';
import { flattenConfig } from '../../data/ConfigFlattener';
import { parseDataFormat, printData } from '../../data/DataPrinter';
import { diffConfigurations } from '../../output/ConfigDiff';
import { pageTable, Table } from '../../output/Table';
import type { Commands } from '../Commands';
import { enumerateCommands, type CommandAction, type ParsedArgs, type TokenId } from '../CommandTrie';
import {
  enterConfigure, enterNested, exitConfigLevel, listRoots, modeDataPath, OPERATIONAL,
} from '../ModeContext';
import { parseConfigurationType, type Session } from '../Session';

export const LIST_SEPARATOR = '---';

// ─── Argument helpers ────────────────────────────────────────────────

/** Remove and return an optional argument. */
export function getOptArg(args: ParsedArgs, name: string): string | undefined {
  const idx = args.findIndex(([argName]) => argName === name);
  if (idx === -1) return undefined;
  const [[, value]] = args.splice(idx, 1);
  return value;
}

/** Remove and return a required argument. */
export function getArg(args: ParsedArgs, name: string): string {
  const value = getOptArg(args, name);
  if (value === undefined) throw new ShellCommandError(`missing argument "${name}"`);
  return value;
}

/** Page text, reporting pager failures with the given context. */
export function pageOrFail(session: Session, data: string, what: string): void {
  try {
    session.page(data);
  } catch (e) {
    if (e instanceof PagerError) {
      throw new ShellCommandError(`failed to print ${what}: ${errorMessage(e)}`, { cause: e });
    }
    throw e;
  }
}

export function pageTableOrFail(session: Session, table: Table): void {
  try {
    pageTable(session.terminal, session.pager(), table);
  } catch (e) {
    if (e instanceof PagerError) {
      throw new ShellCommandError(`failed to display data: ${errorMessage(e)}`, { cause: e });
    }
    throw e;
  }
}

// ─── Mode commands ───────────────────────────────────────────────────

export const cmdConfigure: CommandAction = ({ session }) => {
  session.setMode(enterConfigure());
  return false;
};

export const cmdExitExec: CommandAction = () => true;

export const cmdExitConfig: CommandAction = ({ session }) => {
  session.setMode(exitConfigLevel(session.mode()));
  return false;
};

export const cmdEnd: CommandAction = ({ session }) => {
  session.setMode(OPERATIONAL);
  return false;
};

/**
 * Build the action of a schema token that opens a nested configuration level.
 * The new data path is the current one plus "/segment[key='value']...".
 */
export function enterConfigNode(segment: string, keys: readonly string[] = []): CommandAction {
  return ({ session, tokenId }, args) => {
    const predicates = keys.map(key => {
      const value = getArg(args, key);
      // data paths quote key values with ' and have no escape for it
      if (value.includes("'")) throw new ShellCommandError(`invalid value for "${key}": ${value}`);
      return `[${key}='${value}']`;
    }).join('');
    const dataPath = `${modeDataPath(session.mode()) ?? ''}/${segment}${predicates}`;
    session.setMode(enterNested(session.mode(), { dataPath, tokenId }));
    return false;
  };
}

// ─── list ────────────────────────────────────────────────────────────

export const cmdList: CommandAction = ({ commands, session }) => {
  const roots = listRoots(session.mode(), commands);
  roots.forEach((root, i) => {
    if (i > 0) session.print(LIST_SEPARATOR);
    for (const line of enumerateCommands(commands.trie, root)) {
      session.print(line);
    }
  });
  return false;
};

// ─── Session commands ────────────────────────────────────────────────

export const cmdHostname: CommandAction = ({ session }, args) => {
  session.updateHostname(getArg(args, 'hostname'));
  return false;
};

export const cmdPwd: CommandAction = ({ session }) => {
  session.print(modeDataPath(session.mode()) ?? '/');
  return false;
};

export const cmdDiscard: CommandAction = ({ session }) => {
  session.candidateDiscard();
  return false;
};

export const cmdCommit: CommandAction = ({ session }, args) => {
  session.candidateCommit(getOptArg(args, 'comment'));
  session.print('% configuration committed successfully');
  return false;
};

export const cmdValidate: CommandAction = ({ session }) => {
  session.candidateValidate();
  session.print('% candidate configuration validated successfully');
  return false;
};

// ─── show configuration ──────────────────────────────────────────────

export const cmdShowConfig: CommandAction = ({ session }, args) => {
  const type = parseConfigurationType(getArg(args, 'configuration'));
  const withDefaults = getOptArg(args, 'with-defaults') !== undefined;
  const format = getOptArg(args, 'format');

  const config = session.getConfiguration(type);
  const data = format === undefined
    ? flattenConfig(config, withDefaults)
    : printData(config, parseDataFormat(format), withDefaults);

  pageOrFail(session, data, 'configuration');
  return false;
};

export const cmdShowConfigChanges: CommandAction = ({ session }) => {
  const diff = diffConfigurations(
    session.getConfiguration('running'),
    session.getConfiguration('candidate'),
  );
  session.terminal.write(diff);
  return false;
};

// ─── show state ──────────────────────────────────────────────────────

export const cmdShowState: CommandAction = ({ session }, args) => {
  const xpath = getOptArg(args, 'xpath');
  const format = getOptArg(args, 'format');
  const dataFormat = format === undefined ? 'json' : parseDataFormat(format);

  const state = session.fetchState(xpath);
  pageOrFail(session, printData(state, dataFormat, false), 'state data');
  return false;
};

// ─── show yang modules ───────────────────────────────────────────────

export const cmdShowYangModules: CommandAction = ({ session }) => {
  const table = new Table(['Module', 'Revision', 'Flags', 'Namespace']);
  for (const module of session.listModules()) {
    table.addRow([
      module.name,
      module.revision ?? '-',
      module.implemented ? 'I' : '',
      module.namespace,
    ]);
  }

  session.print(' Flags: I - Implemented');
  session.print('');
  session.print(table.render());
  session.print('');
  return false;
};

// ─── Registration ────────────────────────────────────────────────────

function registerShowConfig(commands: Commands, root: TokenId): void {
  const { trie } = commands;
  trie.register(root, 'show configuration <configuration>', cmdShowConfig);
  trie.register(root, 'show configuration <configuration> with-defaults', cmdShowConfig);
  trie.register(root, 'show configuration <configuration> format <format>', cmdShowConfig);
  trie.register(root, 'show configuration <configuration> with-defaults format <format>', cmdShowConfig);
  trie.register(root, 'show configuration changes', cmdShowConfigChanges);
}

export function registerInternalCommands(commands: Commands): void {
  const { trie } = commands;

  // Operational mode
  const exec = commands.execRoot;
  trie.register(exec, 'configure', cmdConfigure);
  trie.register(exec, 'exit', cmdExitExec);
  trie.register(exec, 'list', cmdList);
  trie.register(exec, 'hostname <hostname>', cmdHostname);
  registerShowConfig(commands, exec);
  trie.register(exec, 'show state', cmdShowState);
  trie.register(exec, 'show state xpath <xpath>', cmdShowState);
  trie.register(exec, 'show state format <format>', cmdShowState);
  trie.register(exec, 'show yang modules', cmdShowYangModules);

  // Every configuration level
  const dflt = commands.configDefaultInternal;
  trie.register(dflt, 'exit', cmdExitConfig);
  trie.register(dflt, 'end', cmdEnd);
  trie.register(dflt, 'list', cmdList);
  trie.register(dflt, 'pwd', cmdPwd);
  registerShowConfig(commands, dflt);

  // Configuration root
  const root = commands.configRootInternal;
  trie.register(root, 'commit', cmdCommit);
  trie.register(root, 'commit comment <comment>', cmdCommit);
  trie.register(root, 'discard', cmdDiscard);
  trie.register(root, 'validate', cmdValidate);
}
