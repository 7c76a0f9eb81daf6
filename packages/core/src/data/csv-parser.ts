/**
 * CSV parser for the tidy snapshot tables.
 *
 * The snapshots are written by the offline cleaning pipelines: comma
 * delimited, RFC 4180 quoting. A quoted field may span lines.
 */

// ── Types ────────────────────────────────────────────────────────────

export interface CsvParseResult {
  headers: string[];
  rows: string[][];
  totalRows: number;
}

export interface CsvParseError {
  message: string;
}

// ── BOM + Line Utilities ─────────────────────────────────────────────

function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/** Splits on LF / CRLF outside quoted fields. */
function splitRecords(text: string): string[] {
  const records: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const char = text.charAt(i);
    if (char === '"') inQuotes = !inQuotes;
    if (!inQuotes && (char === '\n' || (char === '\r' && text.charAt(i + 1) === '\n'))) {
      if (char === '\r') i++;
      records.push(current);
      current = '';
      continue;
    }
    current += char;
  }
  records.push(current);
  return records;
}

export function parseCsvLine(line: string, delimiter = ','): string[] {
  const result: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);
    if (char === '"') {
      if (inQuotes && line.charAt(i + 1) === '"') {
        current += '"';
        i++; // skip escaped quote
      } else {
        inQuotes = !inQuotes;
      }
    } else if (char === delimiter && !inQuotes) {
      result.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }
  result.push(current.trim());
  return result;
}

// ── Main Parser ──────────────────────────────────────────────────────

export function parseCsv(csvContent: string): CsvParseResult | CsvParseError {
  const lines = splitRecords(stripBom(csvContent)).filter((l) => l.trim() !== '');

  const [headerLine, ...dataLines] = lines;
  if (headerLine === undefined) {
    return { message: 'File is empty (no header row)' };
  }

  const headers = parseCsvLine(headerLine);
  if (headers.some((h) => h === '')) {
    return { message: 'Header row contains an empty column name' };
  }

  const rows: string[][] = [];
  for (const line of dataLines) {
    const values = parseCsvLine(line);
    // Skip completely empty rows
    if (values.every((v) => v === '')) continue;
    rows.push(values);
  }

  return { headers, rows, totalRows: rows.length };
}

// Type guard
export function isParseError(result: CsvParseResult | CsvParseError): result is CsvParseError {
  return 'message' in result && !('headers' in result);
}
