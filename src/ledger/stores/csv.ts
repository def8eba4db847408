const NEEDS_QUOTING = /[",\r\n]/;

export function formatCsvLine(fields: readonly string[]): string {
  return (
    fields
      .map((field) =>
        NEEDS_QUOTING.test(field) ? `"${field.replace(/"/g, '""')}"` : field,
      )
      .join(',') + '\n'
  );
}

/**
 * Splits one CSV line (RFC 4180 quoting, no embedded line breaks)
 */
export function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (quoted) {
      if (char === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      fields.push(current);
      current = '';
    } else {
      current += char;
    }
  }

  if (quoted) {
    throw new Error('Unterminated quoted field');
  }

  fields.push(current);
  return fields;
}
