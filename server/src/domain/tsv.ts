const QUOTE = '"';
const TAB = '\t';

/**
 * Splits tab-delimited text into rows of fields. Fields wrapped in double quotes may
 * contain tabs, newlines and doubled quotes; everything else is taken literally.
 */
export const parseTsvRows = (text: string): string[][] => {
  const source = text.startsWith('\uFEFF') ? text.slice(1) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let atFieldStart = true;

  const endField = () => {
    row.push(field);
    field = '';
    atFieldStart = true;
  };

  const endRow = () => {
    endField();
    rows.push(row);
    row = [];
  };

  for (let i = 0; i < source.length; i += 1) {
    const char = source[i];

    if (inQuotes) {
      if (char === QUOTE && source[i + 1] === QUOTE) {
        field += QUOTE;
        i += 1;
      } else if (char === QUOTE) {
        inQuotes = false;
      } else {
        field += char;
      }
      continue;
    }

    if (char === QUOTE && atFieldStart) {
      inQuotes = true;
      atFieldStart = false;
    } else if (char === TAB) {
      endField();
    } else if (char === '\n') {
      endRow();
    } else if (char === '\r') {
      if (source[i + 1] === '\n') {
        i += 1;
      }
      endRow();
    } else {
      field += char;
      atFieldStart = false;
    }
  }

  if (field.length > 0 || row.length > 0) {
    endRow();
  }

  // Blank lines carry no record.
  return rows.filter((entry) => !(entry.length === 1 && entry[0] === ''));
};

/** Maps every data row onto the header row. Missing trailing cells read as `undefined`. */
export const parseTsvRecords = (text: string): Array<Record<string, string | undefined>> => {
  const [header, ...rows] = parseTsvRows(text);
  if (!header) {
    return [];
  }
  return rows.map((cells) => {
    const record: Record<string, string | undefined> = {};
    header.forEach((name, index) => {
      record[name] = cells[index];
    });
    return record;
  });
};
