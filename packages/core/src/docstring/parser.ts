/**
 * Docstring contract parser for Google-style sections.
 *
 * Pure text matching: nothing here validates what a section says, and no
 * input makes it throw. Missing sections give empty values.
 */

import { INSTANCE_PARAMETER } from '../python/signature.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DocstringContract {
  /** Parameter name → documented type text, verbatim (may end in ", optional"). */
  parameterDocs: ReadonlyMap<string, string>;
  /** Parameter names in the order the parameters section lists them. */
  parameterOrder: readonly string[];
  returnTypeText?: string;
}

// ---------------------------------------------------------------------------
// Patterns
// ---------------------------------------------------------------------------

const PARAMETER_HEADER = /^\s*(?:args|arguments|parameters|params)\s*:\s*$/i;
const RETURN_HEADER = /^\s*returns?\s*:(.*)$/i;

/** `name (type-text):` — the type group stops at the first `)`. */
const PARAMETER_ENTRY = /^\s*([\p{L}\p{N}_]+)\s*\(([^)]+)\):/u;

/** `name`, an optional `(type)`, then a colon. */
const ORDER_ENTRY = /^\s*([\p{L}_][\p{L}\p{N}_]*)\s*(?:\([^)]*\))?\s*:/u;
const IDENTIFIER_START = /^[\p{L}_]/u;

/** Google-style section titles that end a parameters block. */
const SECTION_TITLES = [
  'args', 'arguments', 'parameters', 'params',
  'keyword args', 'keyword arguments', 'other parameters',
  'returns', 'return', 'yields', 'yield', 'raises',
  'attributes', 'example', 'examples', 'note', 'notes',
  'references', 'see also', 'todo', 'warning', 'warnings', 'warns',
];
const SECTION_HEADER = new RegExp(`^\\s*(?:${SECTION_TITLES.join('|')})\\s*:\\s*$`, 'i');

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function emptyContract(): DocstringContract {
  return { parameterDocs: new Map(), parameterOrder: [] };
}

export function parseDocstring(docstring: string | undefined): DocstringContract {
  if (!docstring) return emptyContract();
  const lines = docstring.replace(/\r\n?/g, '\n').split('\n');
  return {
    parameterDocs: extractParameterDocs(lines),
    parameterOrder: extractParameterOrder(lines),
    returnTypeText: extractReturnType(lines),
  };
}

/**
 * Entries of the parameters block, which runs from its header to the first
 * blank line. Lines that do not look like `name (type):` are ignored.
 */
export function extractParameterDocs(lines: readonly string[]): Map<string, string> {
  const docs = new Map<string, string>();
  const start = lines.findIndex((line) => PARAMETER_HEADER.test(line));
  if (start < 0) return docs;

  for (const line of lines.slice(start + 1)) {
    if (line.trim() === '') break;
    const match = PARAMETER_ENTRY.exec(line);
    if (match && !docs.has(match[1])) docs.set(match[1], match[2]);
  }
  return docs;
}

/**
 * Names in the parameters block, in order. The block ends at the first line
 * that does not start with an identifier character, or at another section
 * header. Continuation lines that start with a word are skipped.
 */
export function extractParameterOrder(lines: readonly string[]): string[] {
  const order: string[] = [];
  const start = lines.findIndex((line) => PARAMETER_HEADER.test(line));
  if (start < 0) return order;

  for (const line of lines.slice(start + 1)) {
    if (!IDENTIFIER_START.test(line.trimStart()) || SECTION_HEADER.test(line)) break;
    const match = ORDER_ENTRY.exec(line);
    if (match && match[1] !== INSTANCE_PARAMETER) order.push(match[1]);
  }
  return order;
}

/**
 * The documented return type: text after `Returns:` on the same line, or
 * else the first non-blank line below it, cut at its first colon or
 * whitespace outside brackets: `Dict[str, int]: Mapping.` gives
 * `Dict[str, int]`, `bool True when found.` gives `bool`.
 */
export function extractReturnType(lines: readonly string[]): string | undefined {
  const start = lines.findIndex((line) => RETURN_HEADER.test(line));
  if (start < 0) return undefined;

  const inline = RETURN_HEADER.exec(lines[start])?.[1].trim() ?? '';
  let candidate = inline;
  if (!candidate) {
    const next = lines.slice(start + 1).find((line) => line.trim() !== '');
    if (next === undefined || SECTION_HEADER.test(next)) return undefined;
    candidate = next.trim();
  }

  const typeText = candidate.slice(0, typeEnd(candidate)).trim();
  return typeText || undefined;
}

// ---------------------------------------------------------------------------
// Internal
// ---------------------------------------------------------------------------

/** Index of the first `:` or whitespace not nested in brackets, or the text length. */
function typeEnd(text: string): number {
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '[' || ch === '(' || ch === '{') depth++;
    else if ((ch === ']' || ch === ')' || ch === '}') && depth > 0) depth--;
    else if (depth === 0 && (ch === ':' || /\s/.test(ch))) return i;
  }
  return text.length;
}
