/**
 * Minimal delimited-text reader for provider exports. Handles quoted fields
 * with doubled quotes; does not handle newlines inside quotes.
 */

export function parseDelimitedLine(line: string, delimiter = ";"): string[] {
  const fields: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
    } else if (ch === '"' && current.length === 0) {
      inQuotes = true;
    } else if (ch === delimiter) {
      fields.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  fields.push(current);
  return fields;
}

/** Split text into rows of fields, skipping blank lines */
export function parseDelimited(text: string, delimiter = ";"): string[][] {
  return text
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .map((line) => parseDelimitedLine(line, delimiter));
}

/**
 * Map each row onto a fixed column order. Missing trailing columns become
 * null; extra columns are dropped.
 */
export function rowsToRecords(
  rows: string[][],
  columns: readonly string[],
): Array<Record<string, string | null>> {
  return rows.map((row) =>
    Object.fromEntries(columns.map((column, index) => [column, row[index] ?? null])),
  );
}
