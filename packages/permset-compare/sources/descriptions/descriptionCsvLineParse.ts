/**
 * Splits one CSV line into fields.
 * Commas inside double quotes do not split; a doubled quote inside quotes is a literal quote.
 * Quote characters themselves are dropped, wherever they appear in a field.
 */
export function descriptionCsvLineParse(line: string): string[] {
  const fields: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let index = 0; index < line.length; index += 1) {
    const char = line[index];
    if (char === '"') {
      if (inQuotes && line[index + 1] === '"') {
        current += '"';
        index += 1;
        continue;
      }
      inQuotes = !inQuotes;
      continue;
    }
    if (char === "," && !inQuotes) {
      fields.push(current);
      current = "";
      continue;
    }
    current += char;
  }

  fields.push(current);
  return fields;
}
