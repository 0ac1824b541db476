import { load, type Cheerio } from 'cheerio';
import type { Element as CheerioElement } from 'domhandler';

import { createExtractionError } from '../../errors.js';
import type { CatalogRow } from '../../types.js';

const WRITEUPS_TABLE_SELECTOR = 'table#writeups_table';

const COLUMN = {
  primaryLabel: 0,
  secondaryLabel: 1,
  detailPath: 4,
} as const;

/**
 * Reads the write-ups index table. A row that lacks one of the expected
 * anchors means the page layout changed, so it throws instead of returning a
 * partial row.
 */
export function extractRows(html: string): CatalogRow[] {
  const $ = load(html);
  const table = $(WRITEUPS_TABLE_SELECTOR);

  if (table.length === 0) {
    throw createExtractionError('Write-ups table not found on the index page.', {
      selector: WRITEUPS_TABLE_SELECTOR,
    });
  }

  const rows: CatalogRow[] = [];

  table
    .first()
    .children('tbody')
    .children('tr')
    .each((rowIndex: number, element: CheerioElement) => {
      const cells = $(element).children('td');

      rows.push({
        primaryLabel: anchorText(cells.eq(COLUMN.primaryLabel).children('a'), rowIndex, 1),
        secondaryLabel: anchorText(cells.eq(COLUMN.secondaryLabel).children('a'), rowIndex, 2),
        detailPath: anchorHref(cells.eq(COLUMN.detailPath).children('a'), rowIndex, 5),
      });
    });

  return rows;
}

function anchorText(anchors: Cheerio<CheerioElement>, rowIndex: number, column: number): string {
  const text = anchors.first().text().trim();
  if (anchors.length === 0 || text.length === 0) {
    throw missingColumn(rowIndex, column, 'anchor text');
  }

  return text;
}

function anchorHref(anchors: Cheerio<CheerioElement>, rowIndex: number, column: number): string {
  const href = anchors.first().attr('href')?.trim();
  if (!href) {
    throw missingColumn(rowIndex, column, 'anchor href');
  }

  return href;
}

function missingColumn(rowIndex: number, column: number, expected: string) {
  return createExtractionError(`Index row ${rowIndex + 1} has no ${expected} in column ${column}.`, {
    row: rowIndex + 1,
    column,
  });
}
