/**
 * Line-level readers for the AudioSet metadata tables.
 *
 * The segment CSVs use ", " between fields and wrap the label list in double
 * quotes; the class map quotes display names that contain commas. The strong
 * annotation tables are plain tab-separated values with a header row.
 */

export function splitLines(content: string): string[] {
  return content
    .split(/\r?\n/)
    .filter(line => line.trim().length > 0);
}

export function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (inQuotes) {
      if (char === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      fields.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }

  fields.push(current.trim());
  return fields;
}

export function splitTsvLine(line: string): string[] {
  return line.split('\t').map(field => field.trim());
}

/** Label lists are separated by commas or whitespace, sometimes still quoted. */
export function splitLabelCodes(value: string): string[] {
  return value
    .replace(/"/g, '')
    .split(/[,\s]+/)
    .filter(code => code.length > 0);
}

export function parseSeconds(value: string): number {
  const trimmed = value.trim();
  return trimmed === '' ? NaN : Number(trimmed);
}
