/**
 * Rule engine — compares one FunctionSignature with its DocstringContract.
 *
 * Output order is fixed: parameter findings in declaration order, then at
 * most one return finding, then the verbose-only order finding. Absent data
 * always maps to a rule branch; nothing here throws.
 */

import type { DocstringContract } from '../docstring/parser.js';
import type { FunctionSignature, Parameter } from '../python/signature.js';
import { createFinding, type Finding, type FindingDetail } from './findings.js';

export interface RuleOptions {
  /** Report soft findings (untyped parameters, argument order). */
  verbose: boolean;
}

const OPTIONAL_MARKER = 'optional';
const OPTIONAL_SUFFIX = `, ${OPTIONAL_MARKER}`;

export function compareSignature(
  signature: FunctionSignature,
  contract: DocstringContract,
  options: RuleOptions,
): Finding[] {
  const details: FindingDetail[] = [];

  for (const parameter of signature.parameters) {
    const detail = checkParameter(parameter, contract.parameterDocs.get(parameter.name), options);
    if (detail) details.push(detail);
  }

  const returnDetail = checkReturn(signature, contract.returnTypeText);
  if (returnDetail) {
    details.push(returnDetail);
  } else if (options.verbose) {
    const orderDetail = checkOrder(signature, contract.parameterOrder);
    if (orderDetail) details.push(orderDetail);
  }

  const location = { functionName: signature.name, line: signature.line };
  return details.map((detail) => createFinding(location, detail));
}

/**
 * Parameter rules. The documented type is accepted either bare or with the
 * ", optional" suffix; the marker itself is then checked against the default.
 */
export function checkParameter(
  parameter: Parameter,
  documentedType: string | undefined,
  options: RuleOptions,
): FindingDetail | null {
  const { name, declaredType, hasDefault } = parameter;

  if (declaredType === undefined) {
    if (documentedType !== undefined) {
      return { kind: 'UndeclaredTypeDocumented', parameter: name, documentedType };
    }
    return options.verbose ? { kind: 'UntypedParameterWarning', parameter: name } : null;
  }

  if (documentedType === undefined) {
    return { kind: 'MissingFromDocstring', parameter: name, declaredType };
  }

  if (documentedType !== declaredType && documentedType !== declaredType + OPTIONAL_SUFFIX) {
    return { kind: 'TypeMismatch', parameter: name, declaredType, documentedType };
  }
  const marked = documentedType.includes(OPTIONAL_MARKER);
  if (hasDefault && !marked) {
    return { kind: 'MissingOptionalMarker', parameter: name, documentedType };
  }
  if (!hasDefault && marked) {
    return { kind: 'SpuriousOptionalMarker', parameter: name, documentedType };
  }
  return null;
}

/** Return rules in priority order; the first that applies wins. */
export function checkReturn(
  signature: FunctionSignature,
  documentedType: string | undefined,
): FindingDetail | null {
  const annotation = signature.returnAnnotation;

  if (annotation.kind === 'absent') {
    return { kind: 'NoReturnTypeDeclared' };
  }
  if (annotation.kind === 'none') {
    return signature.returnsValue ? { kind: 'ReturnValueButNoneDeclared' } : null;
  }
  if (!signature.returnsValue) {
    return { kind: 'ReturnDeclaredButNoValue', declaredType: annotation.text };
  }
  if (documentedType === undefined) {
    return { kind: 'ReturnTypeUndocumented', declaredType: annotation.text };
  }
  if (documentedType !== annotation.text) {
    return { kind: 'ReturnTypeMismatch', declaredType: annotation.text, documentedType };
  }
  return null;
}

export function checkOrder(
  signature: FunctionSignature,
  docstringOrder: readonly string[],
): FindingDetail | null {
  const signatureOrder = signature.parameters.map((parameter) => parameter.name);
  const same = signatureOrder.length === docstringOrder.length
    && signatureOrder.every((name, index) => name === docstringOrder[index]);
  if (same) return null;
  return { kind: 'ArgumentOrderMismatch', signatureOrder, docstringOrder: [...docstringOrder] };
}
