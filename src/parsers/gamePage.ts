/**
 * Match Page Reader
 *
 * Reads the raw tables of a match page into plain structures. No value is
 * interpreted here; the box-score normalizer does that.
 */

import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { classList, dataClassKey } from './dom.js';

export interface ResultsRow {
  team: string;
  /** Q1..Q4 cell text, '0' where the cell is absent */
  quarters: [string, string, string, string];
}

export interface HeaderCell {
  text: string;
  /** Key from a `data-*` class on the header cell */
  classKey?: string;
}

export interface RawCell {
  text: string;
  /** Text and target of the cell's first link */
  linkText?: string;
  href?: string;
  /** `data-key` attribute */
  dataKey?: string;
  /** Key from a `data-*` class */
  classKey?: string;
  /** Cell carries the `data-name` class */
  isName: boolean;
}

export interface RawRow {
  classes: string[];
  cells: RawCell[];
}

export interface TeamStatLabel {
  label: string;
  value: string;
}

export interface PerformanceSection {
  /** Caption as printed, before team resolution */
  team: string;
  headers: HeaderCell[];
  bodyRows: RawRow[];
  footerRows: RawRow[];
  teamStats: TeamStatLabel[];
}

const QUARTER_CLASSES = ['data-one', 'data-two', 'data-three', 'data-four'] as const;

/**
 * Team rows of the line-score table (`table.sp-event-results`)
 *
 * Rows without a team name cell are left out.
 */
export function readResultsTable($: CheerioAPI): ResultsRow[] {
  const table = $('table.sp-event-results').first();
  if (!table.length) return [];

  const rows: ResultsRow[] = [];
  table.find('tbody tr').each((_, tr) => {
    const row = $(tr);
    const nameCell = row.find('td.data-name').first();
    if (!nameCell.length) return;

    const link = nameCell.find('a').first();
    const team = (link.length ? link.text() : nameCell.text()).trim();
    const [q1, q2, q3, q4] = QUARTER_CLASSES.map(cls => {
      const cell = row.find(`td.${cls}`).first();
      return cell.length ? cell.text().trim() : '0';
    });
    rows.push({ team, quarters: [q1, q2, q3, q4] });
  });
  return rows;
}

function readRow($: CheerioAPI, tr: Element): RawRow {
  const row = $(tr);
  const cells = row.find('td').toArray().map((td): RawCell => {
    const cell = $(td);
    const classes = classList(cell);
    const link = cell.find('a').first();
    return {
      text: cell.text().trim(),
      linkText: link.length ? link.text().trim() : undefined,
      href: link.length ? link.attr('href') : undefined,
      dataKey: cell.attr('data-key'),
      classKey: dataClassKey(classes),
      isName: classes.includes('data-name')
    };
  });
  return { classes: classList(row), cells };
}

/**
 * One section per team box score (`div.sp-template-event-performance-values`)
 *
 * Sections without a caption or a performance table are skipped.
 */
export function readPerformanceSections($: CheerioAPI): PerformanceSection[] {
  const sections: PerformanceSection[] = [];

  $('div.sp-template-event-performance-values').each((_, div) => {
    const section = $(div);
    const caption = section.find('h4.sp-table-caption').first();
    const table = section.find('table.sp-event-performance').first();
    if (!caption.length || !table.length) return;

    const headers = table.find('thead tr').first().find('th').toArray().map((th): HeaderCell => {
      const cell = $(th);
      return { text: cell.text().trim(), classKey: dataClassKey(classList(cell)) };
    });

    const teamStats: TeamStatLabel[] = section.find('div.team-stats label').toArray().flatMap(label => {
      const node = $(label);
      const span = node.find('span').first();
      if (!span.length) return [];
      return [{ label: node.contents().first().text().trim(), value: span.text().trim() }];
    });

    sections.push({
      team: caption.text().trim(),
      headers,
      bodyRows: table.find('tbody tr').toArray().map(tr => readRow($, tr)),
      footerRows: table.find('tfoot tr').toArray().map(tr => readRow($, tr)),
      teamStats
    });
  });

  return sections;
}
