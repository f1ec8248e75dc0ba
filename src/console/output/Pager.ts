/**
 * Pager - hands long command output to an external pager program
 *
 * Spawning, feeding and waiting on the pager happen in one synchronous call,
 * so the child is always reaped before pageOutput returns or throws.
 */

import { spawnSync } from 'node:child_process';
import type { PagerOptions } from '../core/config';
import { errorMessage, PagerError } from '../core/errors';
import { Logger } from '../core/Logger';

const log = Logger.scope('pager');

export interface Terminal {
  write(text: string): void;
}

export const stdoutTerminal: Terminal = {
  write(text: string): void {
    process.stdout.write(text);
  },
};

export function pageOutput(terminal: Terminal, pager: PagerOptions, data: string): void {
  if (!pager.enabled) {
    terminal.write(`${data}\n`);
    return;
  }

  log.debug('pager:spawn', `${pager.command} ${pager.args.join(' ')}`.trim());
  const result = spawnSync(pager.command, pager.args, {
    input: data,
    stdio: ['pipe', 'inherit', 'inherit'],
  });

  if (result.error) {
    log.warn('pager:error', errorMessage(result.error));
    throw new PagerError(errorMessage(result.error), { cause: result.error });
  }
  log.debug('pager:exit', `pager exited with status ${result.status ?? 'none'}`, {
    status: result.status,
    signal: result.signal,
  });
}
