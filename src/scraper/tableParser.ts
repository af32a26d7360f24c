import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { DataNotFoundError } from '../errors';
import type { ParsedRow, ParsedTable } from '../types';
import { normalizeCellText, normalizeRow } from './rowNormalizer';

export const HOME_AWAY_LABEL = 'Home_Away';
const HOME_AWAY_LABEL_INDEX = 3;

export interface TableContext {
  team: string;
  season: number;
}

/**
 * Header labels for the data cells. The game-number heading is a `<th>` in every row and has
 * no `<td>` counterpart, so it is dropped; the unlabelled away-marker heading becomes `Home_Away`.
 */
export function extractColumnLabels(dom: cheerio.CheerioAPI, table: cheerio.Cheerio<Element>): string[] {
  const headings = table
    .find('tr')
    .first()
    .find('th')
    .toArray()
    .map(cell => normalizeCellText(dom(cell).text()));

  const labels = headings.slice(1);
  if (labels.length > HOME_AWAY_LABEL_INDEX) {
    labels[HOME_AWAY_LABEL_INDEX] = HOME_AWAY_LABEL;
  }
  return labels;
}

function labelRow(labels: string[], cells: string[]): Map<string, string> {
  const values = new Map<string, string>();
  cells.forEach((text, position) => {
    const label = labels[position];
    if (!label) return;
    values.set(label, text);
  });
  return values;
}

export function parseScheduleTable(html: string, context: TableContext): ParsedTable {
  const dom = cheerio.load(html);
  const table = dom('table').first();
  if (!table.length) {
    throw new DataNotFoundError(context.team, context.season);
  }

  const labels = extractColumnLabels(dom, table);
  const bodyRows = table.find('tbody').first().find('tr').toArray();

  const rows: ParsedRow[] = [];
  // the last body row is the column legend
  for (const row of bodyRows.slice(0, -1)) {
    const cellTexts = dom(row)
      .find('td')
      .toArray()
      .map(cell => dom(cell).text());

    const classified = normalizeRow(cellTexts, context.team);
    if (classified.kind === 'empty') continue;

    rows.push({ status: classified.kind, values: labelRow(labels, classified.cells) });
  }

  return { columns: labels.filter(Boolean), rows };
}
