export class ParseError extends Error {
  readonly line: string;
  readonly lineNumber: number;

  constructor(message: string, line: string, lineNumber: number) {
    super(`${message} at line ${lineNumber}: ${JSON.stringify(line)}`);
    this.name = "ParseError";
    this.line = line;
    this.lineNumber = lineNumber;
  }
}

export type HeaderLine = { text: string; lineNumber: number };

export type DocumentDate = {
  year: number;
  month: number;
  day: number;
  sortKey: [number, number, number];
  text: string;
};

export type Metadata = {
  title?: string;
  author?: string;
  date?: DocumentDate;
  template?: string;
  static: boolean;
  fields: Record<string, string | null>;
};

export const MONTH_NAMES: readonly string[] = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

const SEPARATOR_RE = /^---\s*$/;
const HEADER_LINE_RE = /^([a-z][a-z0-9_-]*)(?:[ \t]+(.*))?$/;

export function splitHeader(text: string): { header: HeaderLine[]; body: string } {
  const lines = text.replace(/\r\n?/g, "\n").split("\n");
  const header: HeaderLine[] = [];
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (SEPARATOR_RE.test(line)) {
      return { header, body: lines.slice(i + 1).join("\n") };
    }
    if (line.trim() === "") continue;
    if (!HEADER_LINE_RE.test(line.trimEnd())) break;
    header.push({ text: line.trimEnd(), lineNumber: i + 1 });
  }
  return { header: [], body: text };
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function formatDate(year: number, month: number, day: number): string {
  return `${MONTH_NAMES[month - 1]} ${day}, ${year}`;
}

export function parseDate(value: string, line = value, lineNumber = 0): DocumentDate {
  const m = /^(\d{4})-(\d{1,2})-(\d{1,2})$/.exec(value.trim());
  if (!m) throw new ParseError("invalid date", line, lineNumber);
  const year = parseInt(m[1], 10);
  const month = parseInt(m[2], 10);
  const day = parseInt(m[3], 10);
  if (month < 1 || month > 12) throw new ParseError("month out of range", line, lineNumber);
  if (day < 1 || day > daysInMonth(year, month)) {
    throw new ParseError("day out of range", line, lineNumber);
  }
  return { year, month, day, sortKey: [year, month, day], text: formatDate(year, month, day) };
}

export function parseMetadata(header: readonly HeaderLine[]): Metadata {
  const meta: Metadata = { static: false, fields: {} };
  for (const { text, lineNumber } of header) {
    const m = HEADER_LINE_RE.exec(text);
    if (!m) throw new ParseError("invalid header line", text, lineNumber);
    const key = m[1];
    const value = m[2] === undefined || m[2].trim() === "" ? null : m[2].trim();
    meta.fields[key] = value;
    switch (key) {
      case "title":
        meta.title = value ?? "";
        break;
      case "author":
        meta.author = value ?? "";
        break;
      case "template":
        if (value !== null) meta.template = value;
        break;
      case "date":
        if (value === null) throw new ParseError("date without value", text, lineNumber);
        meta.date = parseDate(value, text, lineNumber);
        break;
      case "static":
        meta.static = true;
        break;
    }
  }
  return meta;
}

export function compareDates(a: DocumentDate | undefined, b: DocumentDate | undefined): number {
  if (!a || !b) return a ? -1 : b ? 1 : 0;
  for (let i = 0; i < 3; i++) {
    const d = a.sortKey[i] - b.sortKey[i];
    if (d !== 0) return d;
  }
  return 0;
}
