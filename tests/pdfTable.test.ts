import fs from 'fs';
import os from 'os';
import path from 'path';
import { linesFromTextItems, PdfResultReader, PositionedText, tablesFromLines } from '../src/services/pdfTable.service';
import { isResultHeader } from '../src/services/resultTable.service';
import { buildTablePdf } from './utils/pdf';

const items: PositionedText[] = [
  { text: 'Semester Result', x: 200, y: 750, width: 80 },
  { text: 'Roll No', x: 50, y: 700, width: 40 },
  { text: 'Name', x: 150, y: 700, width: 30 },
  { text: 'SGPA', x: 300, y: 700, width: 30 },
  { text: '21CS001', x: 50, y: 680.8, width: 45 },
  { text: 'Asha', x: 150, y: 680, width: 25 },
  { text: 'Rao', x: 177, y: 680, width: 20 },
  { text: '8.45', x: 302, y: 680.8, width: 20 },
  { text: '   ', x: 250, y: 680, width: 5 },
  { text: '7.90', x: 301, y: 660, width: 22 },
  { text: '21CS002', x: 50, y: 660, width: 45 },
];

describe('linesFromTextItems', () => {
  it('groups items into lines from the top and merges close neighbours', () => {
    expect(linesFromTextItems(items)).toEqual([
      [{ text: 'Semester Result', x: 200, width: 80 }],
      [
        { text: 'Roll No', x: 50, width: 40 },
        { text: 'Name', x: 150, width: 30 },
        { text: 'SGPA', x: 300, width: 30 },
      ],
      [
        { text: '21CS001', x: 50, width: 45 },
        { text: 'Asha Rao', x: 150, width: 47 },
        { text: '8.45', x: 302, width: 20 },
      ],
      [
        { text: '21CS002', x: 50, width: 45 },
        { text: '7.90', x: 301, width: 22 },
      ],
    ]);
  });

  it('keeps items apart when the line tolerance is tight', () => {
    const lines = linesFromTextItems(items, { lineTolerance: 0.5 });
    expect(lines.map((line) => line.map((c) => c.text))).toEqual([
      ['Semester Result'],
      ['Roll No', 'Name', 'SGPA'],
      ['21CS001', '8.45'],
      ['Asha Rao'],
      ['21CS002', '7.90'],
    ]);
  });
});

describe('tablesFromLines', () => {
  it('spreads cells over the header columns and drops the preamble', () => {
    const tables = tablesFromLines(linesFromTextItems(items), isResultHeader);
    expect(tables).toEqual([
      [
        ['Roll No', 'Name', 'SGPA'],
        ['21CS001', 'Asha Rao', '8.45'],
        ['21CS002', '', '7.90'],
      ],
    ]);
  });

  it('starts a new table at every header line', () => {
    const header = [
      { text: 'Roll No', x: 50, width: 40 },
      { text: 'SGPA', x: 200, width: 30 },
    ];
    const tables = tablesFromLines(
      [header, [{ text: '21CS001', x: 50, width: 45 }, { text: '8.1', x: 205, width: 15 }], header],
      isResultHeader
    );
    expect(tables).toEqual([
      [
        ['Roll No', 'SGPA'],
        ['21CS001', '8.1'],
      ],
      [['Roll No', 'SGPA']],
    ]);
  });
});

describe('PdfResultReader', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'result-pdf-'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads the result table out of a PDF text layer', async () => {
    const filePath = path.join(dir, 'sem1.pdf');
    fs.writeFileSync(
      filePath,
      buildTablePdf(
        [
          ['Roll No', 'Name', 'SGPA', 'Backlogs'],
          ['21CS001', 'Asha Rao', '8.50', '0'],
          ['21CS002', 'Vikram Shah', '7.25', '1'],
        ],
        { title: 'Semester 1 Results' }
      )
    );
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    try {
      const tables = await new PdfResultReader().readTables(filePath);

      expect(tables).toEqual([
        [
          ['Roll No', 'Name', 'SGPA', 'Backlogs'],
          ['21CS001', 'Asha Rao', '8.50', '0'],
          ['21CS002', 'Vikram Shah', '7.25', '1'],
        ],
      ]);
      expect(log).not.toHaveBeenCalledWith(expect.stringContaining('standardFontDataUrl'));
    } finally {
      log.mockRestore();
    }
  });

  it('returns no tables when no header is recognised', async () => {
    const filePath = path.join(dir, 'notice.pdf');
    fs.writeFileSync(filePath, buildTablePdf([['Notice', 'Exams start on Monday']]));

    await expect(new PdfResultReader().readTables(filePath)).resolves.toEqual([]);
  });
});
