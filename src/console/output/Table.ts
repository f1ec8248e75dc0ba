/**
 * Borderless text tables for show commands.
 *
 *   Instance  Area     Name
 *   --------  -------  ----
 *   main      0.0.0.0  eth0
 */

import type { PagerOptions } from '../core/config';
import { pageOutput, type Terminal } from './Pager';

const COLUMN_GAP = '  ';

export class Table {
  private readonly rows: string[][] = [];

  constructor(private readonly titles: string[]) {}

  addRow(cells: string[]): void {
    this.rows.push(cells);
  }

  isEmpty(): boolean {
    return this.rows.length === 0;
  }

  render(): string {
    const widths = this.titles.map((title, col) =>
      Math.max(title.length, ...this.rows.map(r => (r[col] ?? '').length)),
    );
    const line = (cells: string[]): string =>
      widths.map((w, col) => (cells[col] ?? '').padEnd(w)).join(COLUMN_GAP).trimEnd();

    return [
      line(this.titles),
      line(widths.map(w => '-'.repeat(w))),
      ...this.rows.map(line),
    ].join('\n');
  }
}

/** Print a table followed by a blank line; an empty table prints nothing. */
export function pageTable(terminal: Terminal, pager: PagerOptions, table: Table): void {
  if (table.isEmpty()) return;
  pageOutput(terminal, pager, `${table.render()}\n`);
}
