/**
 * Console configuration loading tests
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_PAGER, loadConsoleConfig } from '@/console/core/config';

describe('loadConsoleConfig', () => {
  it('should fall back to the defaults', () => {
    expect(loadConsoleConfig({})).toEqual({
      hostname: 'router',
      pager: { enabled: true, command: 'less', args: ['-F', '-X'] },
    });
  });

  it('should take the pager command from PAGER', () => {
    expect(loadConsoleConfig({ PAGER: 'more' }).pager).toEqual({ enabled: true, command: 'more', args: [] });
    expect(loadConsoleConfig({ PAGER: '  most   -s ' }).pager).toEqual({ enabled: true, command: 'most', args: ['-s'] });
  });

  it('should disable paging for an empty PAGER', () => {
    expect(loadConsoleConfig({ PAGER: '' }).pager).toEqual({ enabled: false, command: 'less', args: ['-F', '-X'] });
    expect(loadConsoleConfig({ PAGER: '   ' }).pager.enabled).toBe(false);
  });

  it('should apply overrides last', () => {
    const config = loadConsoleConfig({ PAGER: 'more' }, { hostname: 'edge1', pager: { enabled: false } });
    expect(config).toEqual({
      hostname: 'edge1',
      pager: { enabled: false, command: 'more', args: [] },
    });
  });

  it('should not share the default argument list', () => {
    loadConsoleConfig({}).pager.args.push('-R');
    expect(DEFAULT_PAGER.args).toEqual(['-F', '-X']);
  });
});
