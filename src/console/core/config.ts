/**
 * Console configuration: defaults, PAGER environment handling, overrides.
 */

export interface PagerOptions {
  enabled: boolean;
  command: string;
  args: string[];
}

export interface ConsoleConfig {
  hostname: string;
  pager: PagerOptions;
}

export interface ConsoleConfigOverrides {
  hostname?: string;
  pager?: Partial<PagerOptions>;
}

// -F: quit if the text fits on one screen; -X: leave the screen as is on exit
export const DEFAULT_PAGER: PagerOptions = {
  enabled: true,
  command: 'less',
  args: ['-F', '-X'],
};

export const DEFAULT_CONFIG: ConsoleConfig = {
  hostname: 'router',
  pager: DEFAULT_PAGER,
};

export function loadConsoleConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: ConsoleConfigOverrides = {},
): ConsoleConfig {
  let pager: PagerOptions = { ...DEFAULT_PAGER, args: [...DEFAULT_PAGER.args] };

  const fromEnv = env.PAGER;
  if (fromEnv !== undefined) {
    const [command, ...args] = fromEnv.trim().split(/\s+/).filter(p => p.length > 0);
    pager = command
      ? { enabled: true, command, args }
      : { ...pager, enabled: false };
  }

  return {
    hostname: overrides.hostname ?? DEFAULT_CONFIG.hostname,
    pager: { ...pager, ...overrides.pager },
  };
}
