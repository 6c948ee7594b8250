import { CsvFormatError } from './errors.js';
import { DOMAIN_COLUMN } from './checks/fields.js';
import type { RawRow } from './checks/record.js';

export interface ReportCsv {
  header: string[];
  rows: RawRow[];
}

const BOM = '\uFEFF';

/**
 * Splits CSV text into rows of cells. A leading byte order mark is dropped,
 * unquoted cells are trimmed while quoted cells keep their content verbatim
 * (`""` stands for one quote), and blank lines produce no row.
 */
export function parseCsv(csvText: string): string[][] {
  const text = csvText.startsWith(BOM) ? csvText.slice(BOM.length) : csvText;
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = '';
  let quoted = false;
  let inQuotes = false;

  const endCell = () => {
    row.push(quoted ? cell : cell.trim());
    cell = '';
    quoted = false;
  };
  const endRow = () => {
    const blank = row.length === 0 && !quoted && cell.trim() === '';
    endCell();
    if (!blank) rows.push(row);
    row = [];
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char !== '"') {
        cell += char;
      } else if (text[i + 1] === '"') {
        cell += '"';
        i++;
      } else {
        inQuotes = false;
      }
      continue;
    }

    switch (char) {
      case '"':
        // Only a quote opening the cell starts a quoted cell; anything after the closing quote is dropped.
        if (!quoted && cell.trim() === '') {
          cell = '';
          quoted = true;
          inQuotes = true;
        } else if (!quoted) {
          cell += char;
        }
        break;
      case ',':
        endCell();
        break;
      case '\r':
        if (text[i + 1] === '\n') i++;
        endRow();
        break;
      case '\n':
        endRow();
        break;
      default:
        if (!quoted) cell += char;
    }
  }

  if (row.length > 0 || quoted || cell.trim() !== '') endRow();
  return rows;
}

/**
 * Reads a report export into one column → cell map per row. Short rows are
 * padded with empty cells so every header column is present as a key.
 */
export function readReportCsv(csvText: string): ReportCsv {
  const rows = parseCsv(csvText);
  if (rows.length === 0) {
    throw new CsvFormatError('CSV file is empty');
  }

  const header = rows[0];
  if (!header.includes(DOMAIN_COLUMN)) {
    throw new CsvFormatError(`CSV header has no "${DOMAIN_COLUMN}" column`);
  }

  const parsedRows: RawRow[] = [];
  for (const row of rows.slice(1)) {
    if (row.every((cell) => cell === '')) {
      continue;
    }
    const parsedRow: Record<string, string> = {};
    header.forEach((column, index) => {
      parsedRow[column] = row[index] ?? '';
    });
    parsedRows.push(parsedRow);
  }

  return { header, rows: parsedRows };
}
