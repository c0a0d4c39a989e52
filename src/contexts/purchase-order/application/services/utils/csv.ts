/**
 * Splits CSV text into cell rows.
 * Handles quoted fields, escaped quotes ("") and commas or line breaks inside quotes.
 */
export function parseCsvMatrix(csvText: string): string[][] {
  const rows: string[][] = [];
  let current: string[] = [];
  let field = '';
  let inQuotes = false;

  const pushField = () => {
    current.push(field);
    field = '';
  };
  const pushRow = () => {
    rows.push(current);
    current = [];
  };

  const text = csvText.charCodeAt(0) === 0xfeff ? csvText.slice(1) : csvText;

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (inQuotes) {
      if (c === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += c;
      }
    } else if (c === '"') {
      inQuotes = true;
    } else if (c === ',') {
      pushField();
    } else if (c === '\n') {
      pushField();
      pushRow();
    } else if (c !== '\r') {
      field += c;
    }
  }
  pushField();
  pushRow();

  // trailing newline leaves one empty row
  if (rows.length && rows[rows.length - 1].every((v) => v === '')) rows.pop();

  return rows;
}
