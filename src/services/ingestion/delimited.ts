// =============================================================================
// COURSEWORK — Delimited Text Reader
//
// Header row + data rows. Quoted fields may contain the delimiter, CR/LF
// and doubled quotes (""). A quote inside an unquoted field is literal.
// Blank lines are skipped and not numbered.
// =============================================================================

import { MalformedSource } from '../../errors';

export interface DelimitedRow {
  /** 1-based position among non-blank data rows */
  index: number;
  /** 1-based source line on which the row starts */
  line: number;
  cells: string[];
}

export interface DelimitedTable {
  /** Column names, trimmed and lower-cased */
  header: string[];
  rows: DelimitedRow[];
}

const BOM = '\uFEFF';

/**
 * Decode raw upload bytes. Anything that is not valid UTF-8 is a
 * malformed source rather than a row-level problem.
 */
export function decodeSource(source: Buffer | string): string {
  let text: string;
  if (typeof source === 'string') {
    text = source;
  } else {
    try {
      text = new TextDecoder('utf-8', { fatal: true }).decode(source);
    } catch {
      throw new MalformedSource('Source is not valid UTF-8 text');
    }
  }
  return text.startsWith(BOM) ? text.slice(1) : text;
}

interface RawRecord {
  line: number;
  cells: string[];
}

function splitRecords(text: string, delimiter: string): RawRecord[] {
  const records: RawRecord[] = [];
  let cells: string[] = [];
  let cell = '';
  let inQuotes = false;
  let quoteStartLine = 0;
  let line = 1;
  let recordLine = 1;
  let cellStarted = false;

  const endRecord = () => {
    cells.push(cell);
    records.push({ line: recordLine, cells });
    cells = [];
    cell = '';
    cellStarted = false;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          cell += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (ch === '\n') line++;
        cell += ch;
      }
      continue;
    }

    if (ch === '"' && !cellStarted) {
      inQuotes = true;
      cellStarted = true;
      quoteStartLine = line;
    } else if (ch === delimiter) {
      cells.push(cell);
      cell = '';
      cellStarted = false;
    } else if (ch === '\r' || ch === '\n') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      endRecord();
      line++;
      recordLine = line;
    } else {
      cell += ch;
      cellStarted = true;
    }
  }

  if (inQuotes) {
    throw new MalformedSource(`Unterminated quoted field starting on line ${quoteStartLine}`);
  }
  if (cellStarted || cells.length > 0) endRecord();

  return records;
}

function isBlank(record: RawRecord): boolean {
  return record.cells.length === 1 && record.cells[0].trim() === '';
}

/**
 * Parse a whole source into header and rows. Throws MalformedSource for
 * structural problems; column presence is the caller's concern.
 */
export function parseDelimited(
  text: string,
  options: { delimiter?: string; maxRows?: number } = {},
): DelimitedTable {
  const delimiter = options.delimiter ?? ',';
  if (delimiter.length !== 1 || delimiter === '"' || delimiter === '\n' || delimiter === '\r') {
    throw new MalformedSource(`Unsupported delimiter: ${JSON.stringify(delimiter)}`);
  }

  const records = splitRecords(text, delimiter).filter((record) => !isBlank(record));
  const [headerRecord, ...dataRecords] = records;
  if (!headerRecord) {
    throw new MalformedSource('Source has no header row');
  }

  const header = headerRecord.cells.map((name) => name.trim().toLowerCase());
  const seen = new Set<string>();
  for (const name of header) {
    if (name !== '' && seen.has(name)) {
      throw new MalformedSource(`Duplicate column in header: ${name}`);
    }
    seen.add(name);
  }

  if (options.maxRows !== undefined && dataRecords.length > options.maxRows) {
    throw new MalformedSource(
      `Source has ${dataRecords.length} rows; the limit is ${options.maxRows}`,
    );
  }

  return {
    header,
    rows: dataRecords.map((record, i) => ({
      index: i + 1,
      line: record.line,
      cells: record.cells,
    })),
  };
}
