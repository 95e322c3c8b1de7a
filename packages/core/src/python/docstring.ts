/**
 * Docstring lookup: the first statement of a function body, when it is a
 * plain string literal, decoded and cleaned the way Python's
 * inspect.cleandoc() presents it.
 */

import type { PyNode } from './parser.js';

const STRING_LITERAL = /^([A-Za-z]*)('''|"""|'|")([\s\S]*)\2$/;

const SIMPLE_ESCAPES: Record<string, string> = {
  '\n': '',
  '\\': '\\',
  "'": "'",
  '"': '"',
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
};

const TAB_SIZE = 8;

/** The cleaned docstring of a function node, or undefined when it has none. */
export function docstringOf(fn: PyNode): string | undefined {
  const body = fn.childForFieldName('body');
  const first = body?.namedChildren.find((child) => child.type !== 'comment');
  if (!first || first.type !== 'expression_statement') return undefined;

  const values = first.namedChildren.filter((child) => child.type !== 'comment');
  if (values.length !== 1) return undefined;

  const raw = literalValue(values[0]);
  return raw === undefined ? undefined : cleanDocstring(raw);
}

/**
 * Value of a string or implicitly concatenated string node. Bytes and
 * f-strings are not docstrings.
 */
export function literalValue(node: PyNode): string | undefined {
  if (node.type === 'string') return decodeStringLiteral(node.text);
  if (node.type !== 'concatenated_string') return undefined;

  let value = '';
  for (const part of node.namedChildren) {
    if (part.type === 'comment') continue;
    const decoded = part.type === 'string' ? decodeStringLiteral(part.text) : undefined;
    if (decoded === undefined) return undefined;
    value += decoded;
  }
  return value;
}

export function decodeStringLiteral(text: string): string | undefined {
  const match = STRING_LITERAL.exec(text);
  if (!match) return undefined;

  const prefix = match[1].toLowerCase();
  if (prefix.includes('b') || prefix.includes('f')) return undefined;

  const body = match[3].replace(/\r\n?/g, '\n');
  if (prefix.includes('r')) return body;

  return body.replace(
    /\\(x[0-9a-fA-F]{2}|u[0-9a-fA-F]{4}|U[0-9a-fA-F]{8}|[0-7]{1,3}|[\s\S])/g,
    (whole, escape: string) => {
      if (escape.length > 1 || /[0-7]/.test(escape)) {
        if (/^[xuU]/.test(escape)) return String.fromCodePoint(parseInt(escape.slice(1), 16));
        return String.fromCodePoint(parseInt(escape, 8));
      }
      return SIMPLE_ESCAPES[escape] ?? whole;
    },
  );
}

/**
 * Equivalent of inspect.cleandoc(): expand tabs, strip the first line's
 * leading whitespace, remove the common indentation of the remaining
 * lines, and drop leading and trailing blank lines.
 */
export function cleanDocstring(doc: string): string {
  const lines = doc.split('\n').map(expandTabs);

  let margin = Infinity;
  for (const line of lines.slice(1)) {
    const content = line.trimStart();
    if (content.length > 0) margin = Math.min(margin, line.length - content.length);
  }

  const cleaned = lines.map((line, index) => {
    if (index === 0) return line.trimStart();
    return margin === Infinity ? line : line.slice(margin);
  });

  while (cleaned.length > 0 && cleaned[0].trim() === '') cleaned.shift();
  while (cleaned.length > 0 && cleaned[cleaned.length - 1].trim() === '') cleaned.pop();

  return cleaned.join('\n');
}

function expandTabs(line: string): string {
  if (!line.includes('\t')) return line;
  let out = '';
  for (const ch of line) {
    if (ch === '\t') out += ' '.repeat(TAB_SIZE - (out.length % TAB_SIZE));
    else out += ch;
  }
  return out;
}
