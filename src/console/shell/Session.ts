/**
 * Session - per-operator console state
 *
 * Holds the mode, the hostname shown in the prompt, the running and candidate
 * configuration snapshots and the terminal/pager used for output. Everything
 * that talks to the device goes through the ConfigBackend collaborator.
 */

import type { ConsoleConfig, PagerOptions } from '../core/config';
import { errorMessage, ShellCommandError } from '../core/errors';
import { Logger } from '../core/Logger';
import type { ConfigTree } from '../data/ConfigTree';
import { pageOutput, type Terminal } from '../output/Pager';
import { OPERATIONAL, type ModeContext } from './ModeContext';

const log = Logger.scope('session');

export type ConfigurationType = 'running' | 'candidate';

export interface YangModuleInfo {
  name: string;
  revision?: string;
  namespace: string;
  implemented: boolean;
}

/**
 * Transport to the managed device. Implementations return validated
 * snapshots and throw on failure; the session turns failures into
 * user-facing errors.
 */
export interface ConfigBackend {
  getRunningConfiguration(): ConfigTree;
  validateConfiguration(candidate: ConfigTree): void;
  commitConfiguration(candidate: ConfigTree, comment?: string): void;
  getState(xpath?: string): ConfigTree;
  listModules(): YangModuleInfo[];
}

export function parseConfigurationType(value: string): ConfigurationType {
  switch (value) {
    case 'running':
    case 'candidate':
      return value;
    default:
      throw new ShellCommandError(`unknown configuration "${value}"`);
  }
}

export class Session {
  private currentMode: ModeContext = OPERATIONAL;
  private host: string;
  private running: ConfigTree;
  private candidate: ConfigTree;

  constructor(
    private readonly backend: ConfigBackend,
    private readonly config: ConsoleConfig,
    readonly terminal: Terminal,
  ) {
    this.host = config.hostname;
    this.running = backend.getRunningConfiguration();
    this.candidate = this.running.clone();
  }

  // ─── Mode ──────────────────────────────────────────────────────

  mode(): ModeContext {
    return this.currentMode;
  }

  setMode(mode: ModeContext): void {
    const depth = mode.kind === 'configure' ? mode.nestingPath.length : 0;
    log.debug('mode:change', `${this.currentMode.kind} → ${mode.kind}`, { depth });
    this.currentMode = mode;
  }

  // ─── Hostname ──────────────────────────────────────────────────

  hostname(): string {
    return this.host;
  }

  updateHostname(hostname: string): void {
    log.info('hostname:change', `hostname set to ${hostname}`);
    this.host = hostname;
  }

  // ─── Output ────────────────────────────────────────────────────

  pager(): PagerOptions {
    return this.config.pager;
  }

  print(text: string): void {
    this.terminal.write(`${text}\n`);
  }

  page(text: string): void {
    pageOutput(this.terminal, this.config.pager, text);
  }

  // ─── Configuration ─────────────────────────────────────────────

  getConfiguration(type: ConfigurationType): ConfigTree {
    switch (type) {
      case 'running':
        return this.running;
      case 'candidate':
        return this.candidate;
    }
  }

  /** Replace the candidate snapshot, e.g. after an editing collaborator changed it. */
  setCandidate(candidate: ConfigTree): void {
    this.candidate = candidate;
  }

  candidateDiscard(): void {
    log.info('candidate:discard', 'candidate reset to running configuration');
    this.candidate = this.running.clone();
  }

  candidateValidate(): void {
    try {
      this.backend.validateConfiguration(this.candidate);
    } catch (e) {
      log.warn('candidate:error', errorMessage(e));
      throw new ShellCommandError(`validation failed: ${errorMessage(e)}`, { cause: e });
    }
    log.info('candidate:validate', 'candidate configuration is valid');
  }

  candidateCommit(comment?: string): void {
    try {
      this.backend.commitConfiguration(this.candidate, comment);
    } catch (e) {
      log.warn('candidate:error', errorMessage(e));
      throw new ShellCommandError(`commit failed: ${errorMessage(e)}`, { cause: e });
    }
    log.info('candidate:commit', 'candidate configuration committed', { comment });
    this.running = this.candidate;
    this.candidate = this.running.clone();
  }

  // ─── State ─────────────────────────────────────────────────────

  fetchState(xpath?: string): ConfigTree {
    try {
      return this.backend.getState(xpath);
    } catch (e) {
      throw new ShellCommandError(`failed to fetch state data: ${errorMessage(e)}`, { cause: e });
    }
  }

  listModules(): YangModuleInfo[] {
    try {
      return this.backend.listModules();
    } catch (e) {
      throw new ShellCommandError(`failed to fetch modules: ${errorMessage(e)}`, { cause: e });
    }
  }
}
