/**
 * @sigdoc/core
 *
 * Signature/docstring consistency checking for Python sources:
 *
 * - Python parsing (tree-sitter) and signature extraction
 * - Google-style docstring contract parsing
 * - The comparison rule engine and its finding kinds
 * - Per-file pipeline, file discovery and run orchestration
 */

// Errors and logging
export * from './errors.js';
export * from './logger.js';

// Extraction
export { parseModule, parseFunctions, type PyNode, type PyPoint, type FunctionNode } from './python/parser.js';
export {
  extractSignature,
  INSTANCE_PARAMETER,
  type FunctionSignature,
  type Parameter,
  type ReturnAnnotation,
} from './python/signature.js';
export { docstringOf, cleanDocstring } from './python/docstring.js';
export { parseDocstring, emptyContract, type DocstringContract } from './docstring/parser.js';

// Rules
export { compareSignature, type RuleOptions } from './rules/engine.js';
export * from './rules/findings.js';

// Pipeline
export * from './check/check-source.js';
export * from './check/aggregator.js';
export * from './check/run.js';
export * from './discovery/ignore.js';
export * from './discovery/walk.js';
