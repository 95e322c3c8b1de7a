/**
 * Signature extraction — turns a function_definition node into the
 * declared contract the rule engine compares against.
 *
 * Annotation and default texts are taken verbatim from the source; nothing
 * is evaluated or resolved.
 */

import { ParseError } from '../errors.js';
import type { FunctionNode, PyNode } from './parser.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Parameter {
  name: string;
  declaredType?: string;
  hasDefault: boolean;
  defaultValueText?: string;
}

/**
 * What the `->` annotation says. `none` is an explicit `-> None`, which is
 * different from having no annotation at all.
 */
export type ReturnAnnotation =
  | { kind: 'absent' }
  | { kind: 'none' }
  | { kind: 'declared'; text: string };

export interface FunctionSignature {
  name: string;
  /** Declaration order, instance parameter excluded. */
  parameters: Parameter[];
  returnAnnotation: ReturnAnnotation;
  /** True iff some `return` in the body (outside nested functions) carries a value. */
  returnsValue: boolean;
  line: number;
}

/** The conventional name of the bound-instance parameter. */
export const INSTANCE_PARAMETER = 'self';

const NONE_ANNOTATION = 'None';

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

/**
 * Build the signature of one function.
 *
 * @throws ParseError on a repeated parameter name, or a required parameter
 * after a defaulted one outside the keyword-only part, which Python rejects
 * at compile time
 */
export function extractSignature(fn: FunctionNode): FunctionSignature {
  const body = fn.node.childForFieldName('body');
  return {
    name: fn.name,
    parameters: extractParameters(fn),
    returnAnnotation: extractReturnAnnotation(fn.node),
    returnsValue: body ? containsValueReturn(body) : false,
    line: fn.line,
  };
}

export function extractParameters(fn: FunctionNode): Parameter[] {
  const list = fn.node.childForFieldName('parameters');
  if (!list) return [];

  const nodes = list.namedChildren.filter((child) => child.type !== 'comment');
  const keywordOnlyFrom = list.children.find(isStarMarker)?.startIndex ?? Infinity;
  const parameters: Parameter[] = [];
  const seen = new Set<string>();
  let defaultSeen = false;

  nodes.forEach((node, index) => {
    const parameter = toParameter(node);
    if (!parameter) return;
    if (index === 0 && parameter.name === INSTANCE_PARAMETER) return;
    const line = node.startPosition.row + 1;
    if (seen.has(parameter.name)) {
      throw new ParseError(`Duplicate argument '${parameter.name}' in function '${fn.name}'`, { line });
    }
    if (parameter.hasDefault) {
      defaultSeen = true;
    } else if (defaultSeen && node.startIndex < keywordOnlyFrom) {
      throw new ParseError(
        `Non-default argument '${parameter.name}' follows default argument in function '${fn.name}'`,
        { line },
      );
    }
    seen.add(parameter.name);
    parameters.push(parameter);
  });

  return parameters;
}

export function extractReturnAnnotation(node: PyNode): ReturnAnnotation {
  const annotation = node.childForFieldName('return_type');
  if (!annotation) return { kind: 'absent' };
  if (annotation.text === NONE_ANNOTATION) return { kind: 'none' };
  return { kind: 'declared', text: annotation.text };
}

/**
 * Scan a body for a value-carrying `return`, descending through compound
 * statements but not into nested functions or lambdas.
 */
export function containsValueReturn(node: PyNode): boolean {
  for (const child of node.namedChildren) {
    switch (child.type) {
      case 'function_definition':
      case 'lambda':
        continue;
      case 'return_statement':
        if (child.namedChildren.some((value) => value.type !== 'comment')) return true;
        continue;
      default:
        if (containsValueReturn(child)) return true;
    }
  }
  return false;
}

// ---------------------------------------------------------------------------
// Internal
// ---------------------------------------------------------------------------

/** A bare `*` or `*args`; parameters after it are keyword-only. */
function isStarMarker(node: PyNode): boolean {
  switch (node.type) {
    case '*':
    case 'keyword_separator':
    case 'list_splat_pattern':
      return true;
    case 'typed_parameter':
      return node.namedChildren[0]?.type === 'list_splat_pattern';
    default:
      return false;
  }
}

/**
 * Map one entry of a `parameters` node. Variadic parameters, the bare `*`
 * and `/` separators and tuple patterns yield null.
 */
function toParameter(node: PyNode): Parameter | null {
  switch (node.type) {
    case 'identifier':
      return { name: node.text, hasDefault: false };

    case 'typed_parameter': {
      const target = node.namedChildren[0];
      if (!target || target.type !== 'identifier') return null;
      return {
        name: target.text,
        declaredType: node.childForFieldName('type')?.text,
        hasDefault: false,
      };
    }

    case 'default_parameter':
    case 'typed_default_parameter': {
      const name = node.childForFieldName('name');
      if (!name || name.type !== 'identifier') return null;
      return {
        name: name.text,
        declaredType: node.childForFieldName('type')?.text,
        hasDefault: true,
        defaultValueText: node.childForFieldName('value')?.text,
      };
    }

    default:
      return null;
  }
}
