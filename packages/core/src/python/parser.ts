/**
 * Python source parsing via tree-sitter.
 *
 * The node interfaces below describe only the slice of tree-sitter's
 * SyntaxNode that the extractors read, so tests and callers can work with
 * plain structural types. tree-sitter's parse() is synchronous; the parser
 * instance is created on first use and reused for every file.
 */

import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import { ParseError } from '../errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PyPoint {
  row: number;
  column: number;
}

/** Minimal SyntaxNode interface. */
export interface PyNode {
  type: string;
  text: string;
  startIndex: number;
  endIndex: number;
  startPosition: PyPoint;
  children: readonly PyNode[];
  namedChildren: readonly PyNode[];
  childForFieldName(fieldName: string): PyNode | null;
}

/** A `def` (or `async def`) found in a module, with its reporting identity. */
export interface FunctionNode {
  name: string;
  /** 1-based line of the `def` keyword. */
  line: number;
  node: PyNode;
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

/** Source is fed to tree-sitter in chunks; large single strings overflow its input buffer. */
const CHUNK_SIZE = 8 * 1024;

let parserInstance: Parser | null = null;

function getParser(): Parser {
  if (!parserInstance) {
    parserInstance = new Parser();
    parserInstance.setLanguage(Python);
  }
  return parserInstance;
}

/**
 * Parse a module and return its root node.
 *
 * @throws ParseError when the source contains a syntax error
 */
export function parseModule(source: string): PyNode {
  const tree = getParser().parse((index: number) => source.slice(index, index + CHUNK_SIZE));
  const root: PyNode = tree.rootNode;
  const broken = findSyntaxError(root);
  if (broken) {
    const line = broken.startPosition.row + 1;
    throw new ParseError(`Invalid syntax at line ${line}`, { line });
  }
  return root;
}

/**
 * All function definitions in source order, nested ones included.
 *
 * @throws ParseError when the source contains a syntax error
 */
export function parseFunctions(source: string): FunctionNode[] {
  const functions: FunctionNode[] = [];
  visit(parseModule(source), (node) => {
    if (node.type !== 'function_definition') return;
    const name = node.childForFieldName('name');
    if (!name) return;
    functions.push({ name: name.text, line: node.startPosition.row + 1, node });
  });
  return functions;
}

// ---------------------------------------------------------------------------
// Internal
// ---------------------------------------------------------------------------

function visit(node: PyNode, visitor: (n: PyNode) => void): void {
  visitor(node);
  for (const child of node.children) visit(child, visitor);
}

/**
 * First ERROR node, or first token tree-sitter had to invent (a zero-width
 * leaf) during error recovery.
 */
function findSyntaxError(root: PyNode): PyNode | null {
  const stack = [...root.children].reverse();
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (node.type === 'ERROR') return node;
    if (node.children.length === 0 && node.startIndex === node.endIndex) return node;
    for (let i = node.children.length - 1; i >= 0; i--) stack.push(node.children[i]);
  }
  return null;
}
