/** Parses RFC 4180 CSV (quoted fields, doubled quotes, CRLF or LF). Blank lines are skipped. */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let quoted = false;

  const endRow = () => {
    row.push(field);
    field = "";
    if (row.length > 1 || row[0] !== "") rows.push(row);
    row = [];
  };

  for (let idx = 0; idx < text.length; idx++) {
    const char = text[idx];
    if (quoted) {
      if (char === "\"") {
        if (text[idx + 1] === "\"") {
          field += "\"";
          idx++;
        }
        else {
          quoted = false;
        }
      }
      else {
        field += char;
      }
      continue;
    }

    if (char === "\"") {
      quoted = true;
    }
    else if (char === ",") {
      row.push(field);
      field = "";
    }
    else if (char === "\n") {
      endRow();
    }
    else if (char !== "\r") {
      field += char;
    }
  }
  if (field !== "" || row.length) endRow();

  return rows;
}

/** Rows as objects keyed by the trimmed header row. */
export function parseCsvRecords(text: string): { header: string[]; records: Array<Record<string, string>> } {
  const [headerRow, ...rows] = parseCsv(text);
  if (!headerRow) return { header: [], records: [] };
  const header = headerRow.map((name) => name.trim());
  const records = rows.map((cells) => {
    const record: Record<string, string> = {};
    header.forEach((name, idx) => {
      record[name] = cells[idx] ?? "";
    });
    return record;
  });
  return { header, records };
}
