/**
 * Delimited-text parser for snapshot tables.
 *
 * Handles:
 * - UTF-8 BOM stripping (the collector writes utf-8-sig)
 * - Windows (\r\n), old Mac (\r) and Unix (\n) line endings
 * - Quoted fields with embedded delimiters, newlines and escaped quotes ("")
 * - Blank lines, which are skipped
 *
 * Rows come back as raw string arrays; field-count checks belong to the caller.
 */

export interface DelimitedTable {
  header: string[];
  /** Data rows with the 1-based source line each one starts on */
  rows: Array<{ line: number; fields: string[] }>;
}

export interface ParseDelimitedOptions {
  /** Default: `;` */
  delimiter?: string;
}

function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Split text into records of fields, respecting quotes across line breaks.
 */
function splitRecords(text: string, delimiter: string): Array<{ line: number; fields: string[] }> {
  const records: Array<{ line: number; fields: string[] }> = [];
  let fields: string[] = [];
  let current = '';
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;
  let i = 0;

  const endRecord = () => {
    fields.push(current);
    const blank = fields.length === 1 && fields[0].trim().length === 0;
    if (!blank) records.push({ line: recordLine, fields });
    fields = [];
    current = '';
  };

  while (i < text.length) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          current += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
        i++;
        continue;
      }
      if (ch === '\n') line++;
      current += ch;
      i++;
      continue;
    }

    if (ch === '"' && current.trim().length === 0) {
      current = '';
      inQuotes = true;
      i++;
      continue;
    }
    if (ch === delimiter) {
      fields.push(current);
      current = '';
      i++;
      continue;
    }
    if (ch === '\n') {
      endRecord();
      line++;
      recordLine = line;
      i++;
      continue;
    }
    current += ch;
    i++;
  }

  if (current.length > 0 || fields.length > 0) {
    endRecord();
  }
  return records;
}

/**
 * Parse a delimited table whose first non-blank record is the header.
 */
export function parseDelimited(text: string, options: ParseDelimitedOptions = {}): DelimitedTable {
  const delimiter = options.delimiter ?? ';';
  const data = stripBom(text).replace(/\r\n/g, '\n').replace(/\r/g, '\n');

  const records = splitRecords(data, delimiter);
  const [first, ...rest] = records;
  if (!first) return { header: [], rows: [] };

  return {
    header: first.fields.map((h) => h.trim()),
    rows: rest,
  };
}

/**
 * Locate columns by header name, case-insensitively.
 * Returns -1 for a column that is absent.
 */
export function columnIndex(header: readonly string[], name: string): number {
  const wanted = name.toLowerCase();
  return header.findIndex((h) => h.toLowerCase() === wanted);
}
