/**
 * ConfigDiff - unified diff between the running and candidate configurations
 *
 * Both snapshots are flattened under the same policy (defaults left out) so
 * that only configured changes show up; the hunks come from the diff package.
 */

import { structuredPatch } from 'diff';
import type { ConfigTree } from '../data/ConfigTree';
import { flattenConfig } from '../data/ConfigFlattener';

export const DIFF_CONTEXT_RADIUS = 9;
export const RUNNING_LABEL = 'running configuration';
export const CANDIDATE_LABEL = 'candidate configuration';

// "start,len", with the usual unified-diff shortcuts for one and zero lines
function formatRange(start: number, length: number): string {
  if (length === 1) return `${start}`;
  return `${length === 0 ? start - 1 : start},${length}`;
}

export function unifiedDiff(oldText: string, newText: string, oldLabel: string, newLabel: string): string {
  const patch = structuredPatch(oldLabel, newLabel, oldText, newText, undefined, undefined, {
    context: DIFF_CONTEXT_RADIUS,
  });
  if (patch.hunks.length === 0) return '';

  const lines = [`--- ${oldLabel}`, `+++ ${newLabel}`];
  for (const hunk of patch.hunks) {
    lines.push(`@@ -${formatRange(hunk.oldStart, hunk.oldLines)} +${formatRange(hunk.newStart, hunk.newLines)} @@`);
    lines.push(...hunk.lines);
  }
  return `${lines.join('\n')}\n`;
}

export function diffConfigurations(running: ConfigTree, candidate: ConfigTree): string {
  return unifiedDiff(
    flattenConfig(running, false),
    flattenConfig(candidate, false),
    RUNNING_LABEL,
    CANDIDATE_LABEL,
  );
}
