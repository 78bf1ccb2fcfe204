/**
 * Locate a `NAME = [ ... ]` list literal spanning several lines of a
 * Python module.
 */

import { ParseError } from '../core/index.js';

export interface ListBlock {
  /** Line holding `NAME = [` */
  start: number;
  /** Line holding the closing bracket; new entries go right before it */
  end: number;
  indent: string;
  /** Trimmed, non-comment lines between start and end */
  entries: string[];
}

export interface SplitText {
  lines: string[];
  eol: string;
}

const DEFAULT_INDENT = '    ';

export function splitLines(text: string): SplitText {
  const eol = text.includes('\r\n') ? '\r\n' : '\n';
  return { lines: text.split(eol), eol };
}

function isComment(line: string): boolean {
  return line.trim().startsWith('#');
}

function leadingWhitespace(line: string): string {
  return line.slice(0, line.length - line.trimStart().length);
}

interface BracketScan {
  depth: number;
}

/**
 * Walk `line` from `from`, tracking bracket depth outside string literals
 * and comments. Returns the column where the depth drops back to zero, or -1.
 */
function scanBrackets(line: string, from: number, scan: BracketScan): number {
  let quote: string | null = null;
  for (let i = from; i < line.length; i += 1) {
    const ch = line[i];
    if (quote !== null) {
      if (ch === '\\') {
        i += 1;
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }
    if (ch === '#') return -1;
    if (ch === "'" || ch === '"') {
      quote = ch;
    } else if (ch === '[' || ch === '(' || ch === '{') {
      scan.depth += 1;
    } else if (ch === ']' || ch === ')' || ch === '}') {
      scan.depth -= 1;
      if (scan.depth === 0) return i;
    }
  }
  return -1;
}

export function locateListBlock(lines: string[], name: string): ListBlock {
  const start = lines.findIndex((line) => line.trim().startsWith(name) && line.includes('['));
  if (start === -1) {
    throw new ParseError(`${name} list not found`);
  }

  const scan: BracketScan = { depth: 0 };
  if (scanBrackets(lines[start], lines[start].indexOf('['), scan) !== -1) {
    throw new ParseError(`${name} is written on a single line; expected one entry per line`);
  }

  let end = -1;
  let closingColumn = -1;
  for (let i = start + 1; i < lines.length; i += 1) {
    closingColumn = scanBrackets(lines[i], 0, scan);
    if (closingColumn !== -1) {
      end = i;
      break;
    }
  }
  if (end === -1) {
    throw new ParseError(`${name} list is not closed`);
  }

  const body = lines.slice(start + 1, end);
  const entries = body.filter((line) => line.trim() !== '' && !isComment(line)).map((line) => line.trim());
  const firstEntry = body.find((line) => line.trim() !== '' && !isComment(line));

  // A closing line such as `    'x',]` also holds an entry
  const closingEntry = lines[end].slice(0, closingColumn).trim();
  if (closingEntry !== '') {
    throw new ParseError(`${name} closing bracket shares a line with an entry`);
  }

  return {
    start,
    end,
    indent: firstEntry !== undefined ? leadingWhitespace(firstEntry) : DEFAULT_INDENT,
    entries,
  };
}

/**
 * True when any entry contains one of the quoted forms of `needles`.
 */
export function entriesMention(entries: string[], needles: string[]): boolean {
  const quoted = needles.flatMap((needle) => [`'${needle}'`, `"${needle}"`]);
  return entries.some((entry) => quoted.some((form) => entry.includes(form)));
}
