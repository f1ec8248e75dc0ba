/**
 * ModeContext - the shell's operating mode as a tagged union
 *
 *   operational                   router#
 *   configure, empty path         router(config)#
 *   configure, nested path        router(config-interface)#
 *
 * Values are immutable; transitions return a new mode and the session swaps
 * it in.
 */

import type { Commands } from './Commands';
import type { TokenId } from './CommandTrie';

export interface NestingEntry {
  /** Data path of the configuration node entered, e.g. /interfaces/interface[name='eth0'] */
  dataPath: string;
  /** Schema token the entry was made through; its children are the commands of that level */
  tokenId: TokenId;
}

export type ModeContext =
  | { readonly kind: 'operational' }
  | { readonly kind: 'configure'; readonly nestingPath: readonly NestingEntry[] };

export const OPERATIONAL: ModeContext = { kind: 'operational' };

export function enterConfigure(): ModeContext {
  return { kind: 'configure', nestingPath: [] };
}

export function enterNested(mode: ModeContext, entry: NestingEntry): ModeContext {
  const path = mode.kind === 'configure' ? mode.nestingPath : [];
  return { kind: 'configure', nestingPath: [...path, entry] };
}

/** One level up; leaving the top configuration level returns to operational mode. */
export function exitConfigLevel(mode: ModeContext): ModeContext {
  switch (mode.kind) {
    case 'operational':
      return mode;
    case 'configure':
      if (mode.nestingPath.length === 0) return OPERATIONAL;
      return { kind: 'configure', nestingPath: mode.nestingPath.slice(0, -1) };
  }
}

function currentEntry(mode: ModeContext): NestingEntry | undefined {
  if (mode.kind !== 'configure') return undefined;
  return mode.nestingPath[mode.nestingPath.length - 1];
}

/** Root of the commands the current mode accepts. */
export function modeToken(mode: ModeContext, commands: Commands): TokenId {
  switch (mode.kind) {
    case 'operational':
      return commands.execRoot;
    case 'configure':
      return currentEntry(mode)?.tokenId ?? commands.configRoot;
  }
}

export function modeDataPath(mode: ModeContext): string | undefined {
  return currentEntry(mode)?.dataPath;
}

/** Roots consulted, in order, when listing or resolving commands. */
export function listRoots(mode: ModeContext, commands: Commands): TokenId[] {
  switch (mode.kind) {
    case 'operational':
      return [commands.execRoot];
    case 'configure':
      return [commands.configDefaultInternal, commands.configRootInternal, modeToken(mode, commands)];
  }
}
