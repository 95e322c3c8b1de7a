/**
 * Finding kinds and their messages.
 */

export const FINDING_KINDS = [
  'MissingFromDocstring',
  'UndeclaredTypeDocumented',
  'UntypedParameterWarning',
  'TypeMismatch',
  'MissingOptionalMarker',
  'SpuriousOptionalMarker',
  'NoReturnTypeDeclared',
  'ReturnValueButNoneDeclared',
  'ReturnDeclaredButNoValue',
  'ReturnTypeMismatch',
  'ReturnTypeUndocumented',
  'ArgumentOrderMismatch',
] as const;

export type FindingKind = (typeof FINDING_KINDS)[number];

/** Kinds that are only reported in verbose mode. */
export const VERBOSE_ONLY_KINDS: ReadonlySet<FindingKind> = new Set([
  'UntypedParameterWarning',
  'ArgumentOrderMismatch',
]);

/** Kind-specific payload of a finding. */
export type FindingDetail =
  | { kind: 'MissingFromDocstring'; parameter: string; declaredType: string }
  | { kind: 'UndeclaredTypeDocumented'; parameter: string; documentedType: string }
  | { kind: 'UntypedParameterWarning'; parameter: string }
  | { kind: 'TypeMismatch'; parameter: string; declaredType: string; documentedType: string }
  | { kind: 'MissingOptionalMarker'; parameter: string; documentedType: string }
  | { kind: 'SpuriousOptionalMarker'; parameter: string; documentedType: string }
  | { kind: 'NoReturnTypeDeclared' }
  | { kind: 'ReturnValueButNoneDeclared' }
  | { kind: 'ReturnDeclaredButNoValue'; declaredType: string }
  | { kind: 'ReturnTypeMismatch'; declaredType: string; documentedType: string }
  | { kind: 'ReturnTypeUndocumented'; declaredType: string }
  | { kind: 'ArgumentOrderMismatch'; signatureOrder: string[]; docstringOrder: string[] };

export interface FindingLocation {
  functionName: string;
  line: number;
}

export type Finding = FindingDetail & FindingLocation & { message: string };

export function describeFinding(detail: FindingDetail): string {
  switch (detail.kind) {
    case 'MissingFromDocstring':
      return `Argument '${detail.parameter}' not in docstring.`;
    case 'UndeclaredTypeDocumented':
      return `Argument '${detail.parameter}' has no type hint, but the docstring documents '${detail.documentedType}'.`;
    case 'UntypedParameterWarning':
      return `Argument '${detail.parameter}' has no type hint and is not documented.`;
    case 'TypeMismatch':
      return `TypeMismatch '${detail.parameter}': function '${detail.declaredType}', docstring '${detail.documentedType}'.`;
    case 'MissingOptionalMarker':
      return `Argument '${detail.parameter}' has a default value, but 'optional' is missing in the docstring.`;
    case 'SpuriousOptionalMarker':
      return `Argument '${detail.parameter}' has NO default value, but the docstring contains 'optional'.`;
    case 'NoReturnTypeDeclared':
      return 'Function has no return type annotation.';
    case 'ReturnValueButNoneDeclared':
      return "Function returns a value, but its return type is 'None'.";
    case 'ReturnDeclaredButNoValue':
      return `Return-type '${detail.declaredType}' declared, but the function never returns a value.`;
    case 'ReturnTypeMismatch':
      return `Return TypeMismatch: function '${detail.declaredType}', docstring '${detail.documentedType}'.`;
    case 'ReturnTypeUndocumented':
      return `Return-type '${detail.declaredType}' not in docstring.`;
    case 'ArgumentOrderMismatch':
      return `Argument order differs: function (${detail.signatureOrder.join(', ')}), docstring (${detail.docstringOrder.join(', ')}).`;
  }
}

export function createFinding(location: FindingLocation, detail: FindingDetail): Finding {
  return { ...detail, ...location, message: describeFinding(detail) };
}
