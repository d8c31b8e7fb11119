export type CsvParseResult = {
  headers: string[];
  rows: string[][];
  delimiter: string;
};

const DEFAULT_DELIMITERS = [',', '\t', ';'];

function detectDelimiter(line: string): string {
  let best = ',';
  let bestCount = -1;
  for (const delimiter of DEFAULT_DELIMITERS) {
    let count = 0;
    let inQuotes = false;
    for (let i = 0; i < line.length; i += 1) {
      const ch = line[i];
      if (ch === '"') {
        if (inQuotes && line[i + 1] === '"') {
          i += 1;
          continue;
        }
        inQuotes = !inQuotes;
        continue;
      }
      if (!inQuotes && ch === delimiter) count += 1;
    }
    if (count > bestCount) {
      bestCount = count;
      best = delimiter;
    }
  }
  return best;
}

function isBlank(row: string[]): boolean {
  return row.every((value) => value.trim() === '');
}

export function parseCsv(text: string): CsvParseResult {
  const sanitized = text.replace(/^\uFEFF/, '');
  const firstLineEnd = sanitized.search(/\r?\n/);
  const delimiter = detectDelimiter(firstLineEnd >= 0 ? sanitized.slice(0, firstLineEnd) : sanitized);

  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;

  for (let i = 0; i < sanitized.length; i += 1) {
    const ch = sanitized[i];

    if (inQuotes) {
      if (ch === '"' && sanitized[i + 1] === '"') {
        field += '"';
        i += 1;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === delimiter) {
      row.push(field);
      field = '';
    } else if (ch === '\n') {
      row.push(field);
      if (!isBlank(row)) rows.push(row);
      row = [];
      field = '';
    } else if (ch !== '\r') {
      field += ch;
    }
  }

  if (field.length > 0 || row.length > 0) {
    row.push(field);
    if (!isBlank(row)) rows.push(row);
  }

  const [headerRow, ...dataRows] = rows;
  return { headers: (headerRow ?? []).map(normalizeHeader), rows: dataRows, delimiter };
}

/** "Item ID" and "item-id" both become "item_id". */
export function normalizeHeader(header: string): string {
  return header
    .trim()
    .toLowerCase()
    .replace(/[\s-]+/g, '_')
    .replace(/[^a-z0-9_]/g, '');
}

export function csvRecords(result: CsvParseResult): Array<Record<string, string>> {
  return result.rows.map((row) => {
    const record: Record<string, string> = {};
    result.headers.forEach((header, index) => {
      record[header] = (row[index] ?? '').trim();
    });
    return record;
  });
}

function escapeField(value: string, delimiter: string): string {
  if (value.includes(delimiter) || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsv(headers: string[], rows: string[][], delimiter = ','): string {
  const lines = [headers, ...rows].map((row) => row.map((value) => escapeField(value, delimiter)).join(delimiter));
  return `${lines.join('\n')}\n`;
}
