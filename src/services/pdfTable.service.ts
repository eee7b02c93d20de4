import fs from 'fs';
import logger from '../config/logger';
import { isResultHeader, TextTable } from './resultTable.service';

export interface PositionedText {
  text: string;
  x: number;
  y: number;
  width: number;
}

export interface TextCell {
  text: string;
  x: number;
  width: number;
}

export type TextLine = TextCell[];

export interface LayoutOptions {
  /** Items whose baselines differ by less than this sit on the same line. */
  lineTolerance?: number;
  /** Horizontal gap below which neighbouring items form one cell. */
  cellGap?: number;
  /** How far left of its header a cell may start and still belong to it. */
  columnSlack?: number;
}

const DEFAULT_LAYOUT: Required<LayoutOptions> = {
  lineTolerance: 2,
  cellGap: 4,
  columnSlack: 3,
};

/**
 * Groups positioned text into lines, top of the page first, each line's
 * cells ordered left to right. Close neighbours are merged into one cell.
 */
export const linesFromTextItems = (items: readonly PositionedText[], options: LayoutOptions = {}): TextLine[] => {
  const { lineTolerance, cellGap } = { ...DEFAULT_LAYOUT, ...options };
  const rows: PositionedText[][] = [];

  // PDF y grows upwards.
  const sorted = items.filter((i) => i.text.trim()).sort((a, b) => b.y - a.y || a.x - b.x);
  for (const item of sorted) {
    const current = rows[rows.length - 1];
    if (current && Math.abs(current[0].y - item.y) < lineTolerance) {
      current.push(item);
    } else {
      rows.push([item]);
    }
  }

  return rows.map((row) => {
    const cells: TextCell[] = [];
    for (const item of [...row].sort((a, b) => a.x - b.x)) {
      const last = cells[cells.length - 1];
      const text = item.text.trim();
      if (last && item.x - (last.x + last.width) < cellGap) {
        last.text = `${last.text} ${text}`;
        last.width = item.x + item.width - last.x;
      } else {
        cells.push({ text, x: item.x, width: item.width });
      }
    }
    return cells;
  });
};

const columnFor = (cell: TextCell, starts: readonly number[], slack: number): number => {
  const center = cell.x + cell.width / 2;
  let column = 0;
  starts.forEach((start, index) => {
    if (start - slack <= center) column = index;
  });
  return column;
};

/**
 * Cuts lines into tables. A line accepted by `isHeader` opens a table and
 * fixes its column positions; following lines are spread over those
 * columns until the next header. Lines before the first header are dropped.
 */
export const tablesFromLines = (
  lines: readonly TextLine[],
  isHeader: (cells: string[]) => boolean,
  options: LayoutOptions = {}
): TextTable[] => {
  const { columnSlack } = { ...DEFAULT_LAYOUT, ...options };
  const tables: TextTable[] = [];
  let starts: number[] | null = null;

  for (const line of lines) {
    const texts = line.map((c) => c.text);
    if (isHeader(texts)) {
      starts = line.map((c) => c.x);
      tables.push([texts]);
      continue;
    }
    if (!starts) continue;

    const row: string[] = starts.map(() => '');
    for (const cell of line) {
      const index = columnFor(cell, starts, columnSlack);
      row[index] = row[index] ? `${row[index]} ${cell.text}` : cell.text;
    }
    tables[tables.length - 1].push(row);
  }

  return tables;
};

export interface ResultDocumentReader {
  readTables(filePath: string): Promise<TextTable[]>;
}

/**
 * Reads result tables out of a PDF's text layer with pdf.js. Only text is
 * used, so scanned documents yield no tables.
 */
export class PdfResultReader implements ResultDocumentReader {
  constructor(private readonly options: LayoutOptions = {}) {}

  async readTables(filePath: string): Promise<TextTable[]> {
    const data = new Uint8Array(await fs.promises.readFile(filePath));
    const pdfjs = await import('pdfjs-dist');
    const pdf = await pdfjs.getDocument({
      data,
      isEvalSupported: false,
      useSystemFonts: false,
      disableFontFace: true,
      // pdf.js writes warnings straight to the console.
      verbosity: pdfjs.VerbosityLevel.ERRORS,
    }).promise;

    try {
      const lines: TextLine[] = [];
      for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
        const page = await pdf.getPage(pageNumber);
        const content = await page.getTextContent();
        const items: PositionedText[] = [];
        for (const item of content.items) {
          if (!('str' in item)) continue;
          items.push({
            text: item.str,
            x: Number(item.transform[4]),
            y: Number(item.transform[5]),
            width: item.width,
          });
        }
        lines.push(...linesFromTextItems(items, this.options));
        page.cleanup();
      }

      const tables = tablesFromLines(lines, isResultHeader, this.options);
      logger.debug(`Read ${tables.length} result table(s) from ${pdf.numPages} page(s) of ${filePath}`);
      return tables;
    } finally {
      await pdf.destroy();
    }
  }
}
