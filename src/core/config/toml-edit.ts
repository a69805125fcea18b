/**
 * Line-level TOML editing.
 *
 * Edits touch only the lines of the entry being written; comments, ordering,
 * whitespace and line endings elsewhere in the document stay as they were.
 */

const BARE_KEY = /^[A-Za-z0-9_-]+$/;
const KEY_SEGMENT = String.raw`(?:[A-Za-z0-9_-]+|"(?:[^"\\]|\\.)*"|'[^']*')`;
const KEY_LINE = new RegExp(String.raw`^\s*(${KEY_SEGMENT}(?:\s*\.\s*${KEY_SEGMENT})*)\s*=`);
const TABLE_HEADER = /^\s*\[([^[\]]*(?:"[^"]*"[^[\]]*)*)\]\s*(?:#.*)?$/;
const ARRAY_TABLE_HEADER = /^\s*\[\[(.*)\]\]\s*(?:#.*)?$/;

export type TomlEntry = [key: string, value: string];

interface Header {
  index: number;
  path: string[];
  isArray: boolean;
}

export function formatTomlKey(key: string): string {
  return BARE_KEY.test(key) ? key : JSON.stringify(key);
}

export function formatTomlString(value: string): string {
  return JSON.stringify(value);
}

export function formatInlineTable(entries: TomlEntry[]): string {
  const body = entries.map(([key, value]) => `${formatTomlKey(key)} = ${formatTomlString(value)}`).join(', ');
  return `{ ${body} }`;
}

/** Split a dotted key (`a."b.c".d`) into its segments */
export function parseKeyPath(source: string): string[] | undefined {
  const segments: string[] = [];
  let i = 0;

  for (;;) {
    while (i < source.length && /\s/.test(source[i])) i++;
    if (i >= source.length) return undefined;

    if (source[i] === '"') {
      const match = /^"(?:[^"\\]|\\.)*"/.exec(source.slice(i));
      if (!match) return undefined;
      try {
        const decoded: unknown = JSON.parse(match[0]);
        if (typeof decoded !== 'string') return undefined;
        segments.push(decoded);
      } catch {
        return undefined;
      }
      i += match[0].length;
    } else if (source[i] === "'") {
      const close = source.indexOf("'", i + 1);
      if (close === -1) return undefined;
      segments.push(source.slice(i + 1, close));
      i = close + 1;
    } else {
      const match = /^[A-Za-z0-9_-]+/.exec(source.slice(i));
      if (!match) return undefined;
      segments.push(match[0]);
      i += match[0].length;
    }

    while (i < source.length && /\s/.test(source[i])) i++;
    if (i >= source.length) return segments;
    if (source[i] !== '.') return undefined;
    i++;
  }
}

function splitLines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

function stripEol(line: string): string {
  return line.replace(/\r?\n$/, '');
}

function isBlankOrComment(line: string): boolean {
  const trimmed = line.trim();
  return trimmed === '' || trimmed.startsWith('#');
}

function samePath(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((segment, i) => segment === b[i]);
}

function findHeaders(lines: string[]): Header[] {
  const headers: Header[] = [];
  lines.forEach((line, index) => {
    const content = stripEol(line);
    const arrayMatch = ARRAY_TABLE_HEADER.exec(content);
    if (arrayMatch) {
      headers.push({ index, path: parseKeyPath(arrayMatch[1]) ?? [], isArray: true });
      return;
    }
    const tableMatch = TABLE_HEADER.exec(content);
    if (tableMatch) {
      headers.push({ index, path: parseKeyPath(tableMatch[1]) ?? [], isArray: false });
    }
  });
  return headers;
}

function sectionEnd(headers: Header[], start: number, total: number): number {
  return headers.find(header => header.index > start)?.index ?? total;
}

function withEol(line: string, eol: string): string {
  return line.endsWith('\n') ? line : `${line}${eol}`;
}

/**
 * Insert or overwrite `<tablePath>.<key>` with the given string entries.
 *
 * - `[table.key]` sub-table present: its body is replaced.
 * - `[table]` present: the `key = …` line is replaced, or a new line is
 *   added after the section's last entry.
 * - Neither: a `[table]` section is appended.
 */
export function upsertTableEntry(text: string, tablePath: string[], key: string, entries: TomlEntry[]): string {
  const eol = text.includes('\r\n') ? '\r\n' : '\n';
  const lines = splitLines(text);
  const headers = findHeaders(lines);

  const subTable = headers.find(header => !header.isArray && samePath(header.path, [...tablePath, key]));
  if (subTable) {
    const end = sectionEnd(headers, subTable.index, lines.length);
    let bodyEnd = end;
    while (bodyEnd > subTable.index + 1 && lines[bodyEnd - 1].trim() === '') bodyEnd--;

    lines[subTable.index] = withEol(lines[subTable.index], eol);
    const body = entries.map(([entryKey, value]) => `${formatTomlKey(entryKey)} = ${formatTomlString(value)}${eol}`);
    if (bodyEnd === lines.length && body.length > 0 && !text.endsWith('\n')) {
      body[body.length - 1] = stripEol(body[body.length - 1]);
    }
    lines.splice(subTable.index + 1, bodyEnd - subTable.index - 1, ...body);
    return lines.join('');
  }

  const entryText = `${formatTomlKey(key)} = ${formatInlineTable(entries)}`;
  const section = headers.find(header => !header.isArray && samePath(header.path, tablePath));

  if (section) {
    const end = sectionEnd(headers, section.index, lines.length);
    const matches: number[] = [];
    for (let i = section.index + 1; i < end; i++) {
      const keyMatch = KEY_LINE.exec(stripEol(lines[i]));
      const path = keyMatch ? parseKeyPath(keyMatch[1]) : undefined;
      if (path && path[0] === key) matches.push(i);
    }

    if (matches.length > 0) {
      const first = matches[0];
      const original = lines[first];
      const indent = /^\s*/.exec(original)?.[0] ?? '';
      const terminator = original.endsWith('\r\n') ? '\r\n' : original.endsWith('\n') ? '\n' : '';
      lines[first] = `${indent}${entryText}${terminator}`;
      for (const index of matches.slice(1).reverse()) {
        lines.splice(index, 1);
      }
      return lines.join('');
    }

    let insertAt = section.index + 1;
    for (let i = section.index + 1; i < end; i++) {
      if (!isBlankOrComment(lines[i])) insertAt = i + 1;
    }
    lines[insertAt - 1] = withEol(lines[insertAt - 1], eol);
    lines.splice(insertAt, 0, `${entryText}${eol}`);
    return lines.join('');
  }

  let out = text;
  if (out.length > 0 && !out.endsWith('\n')) out += eol;
  if (out.trim().length > 0) out += eol;
  return `${out}[${tablePath.map(formatTomlKey).join('.')}]${eol}${entryText}${eol}`;
}
