/**
 * Signature extraction tests — covers python/signature.ts:
 *   - parameter kinds, verbatim annotation and default text
 *   - instance parameter exclusion
 *   - the three return annotation states
 *   - value-return scanning
 */

import { describe, it, expect } from 'vitest';
import { parseFunctions } from '../python/parser.js';
import { extractSignature, type FunctionSignature } from '../python/signature.js';
import { ParseError } from '../errors.js';

function signatureOf(source: string, name?: string): FunctionSignature {
  const functions = parseFunctions(source);
  const fn = name ? functions.find((candidate) => candidate.name === name) : functions[0];
  if (!fn) throw new Error(`no function ${name ?? ''} in source`);
  return extractSignature(fn);
}

// ---------------------------------------------------------------------------
// Parameters
// ---------------------------------------------------------------------------

describe('extractSignature parameters', () => {
  it('captures names, annotations and defaults in declaration order', () => {
    const sig = signatureOf('def f(a, b: int, c=3, d: str = "x"):\n    pass\n');
    expect(sig.parameters).toEqual([
      { name: 'a', hasDefault: false },
      { name: 'b', declaredType: 'int', hasDefault: false },
      { name: 'c', hasDefault: true, defaultValueText: '3' },
      { name: 'd', declaredType: 'str', hasDefault: true, defaultValueText: '"x"' },
    ]);
  });

  it('keeps annotation and default source text verbatim', () => {
    const sig = signatureOf('def f(items: Dict[str, List[int]] = {}, n: Optional[int] = None):\n    pass\n');
    expect(sig.parameters.map((p) => [p.declaredType, p.defaultValueText])).toEqual([
      ['Dict[str, List[int]]', '{}'],
      ['Optional[int]', 'None'],
    ]);
  });

  it('drops a leading self parameter, typed or not', () => {
    const source = [
      'class A:',
      '    def m(self, x: int):',
      '        pass',
      '    def n(self: "A", y: str):',
      '        pass',
      '',
    ].join('\n');
    expect(signatureOf(source, 'm').parameters.map((p) => p.name)).toEqual(['x']);
    expect(signatureOf(source, 'n').parameters.map((p) => p.name)).toEqual(['y']);
  });

  it('keeps self when it is not the first parameter', () => {
    const sig = signatureOf('def f(other, self):\n    pass\n');
    expect(sig.parameters.map((p) => p.name)).toEqual(['other', 'self']);
  });

  it('skips variadic parameters and separators but keeps keyword-only ones', () => {
    const sig = signatureOf('def f(a: int, /, b: int, *args: int, c: int = 1, **kwargs: str):\n    pass\n');
    expect(sig.parameters.map((p) => p.name)).toEqual(['a', 'b', 'c']);
  });

  it('keeps keyword-only parameters after a bare star', () => {
    const sig = signatureOf('def f(a, *, key: str):\n    pass\n');
    expect(sig.parameters).toEqual([
      { name: 'a', hasDefault: false },
      { name: 'key', declaredType: 'str', hasDefault: false },
    ]);
  });

  it('rejects duplicate parameter names', () => {
    expect(() => signatureOf('def f(a, a):\n    pass\n')).toThrow(ParseError);
  });

  it('rejects a required parameter after a defaulted one', () => {
    expect(() => signatureOf('def f(x=1, y):\n    pass\n')).toThrow(
      "Non-default argument 'y' follows default argument in function 'f'",
    );
    expect(() => signatureOf('def f(x: int = 1, y: int):\n    pass\n')).toThrow(ParseError);
  });

  it('allows required keyword-only parameters after defaults', () => {
    expect(signatureOf('def f(x=1, *, y):\n    pass\n').parameters.map((p) => p.name)).toEqual(['x', 'y']);
    expect(signatureOf('def f(x=1, *rest, y: int):\n    pass\n').parameters.map((p) => p.name)).toEqual(['x', 'y']);
  });
});

// ---------------------------------------------------------------------------
// Return annotation
// ---------------------------------------------------------------------------

describe('extractSignature return annotation', () => {
  it('is absent when there is no annotation', () => {
    expect(signatureOf('def f():\n    pass\n').returnAnnotation).toEqual({ kind: 'absent' });
  });

  it('is none for -> None', () => {
    expect(signatureOf('def f() -> None:\n    pass\n').returnAnnotation).toEqual({ kind: 'none' });
  });

  it('is declared with verbatim text otherwise', () => {
    expect(signatureOf('def f() -> Optional[int]:\n    return 1\n').returnAnnotation).toEqual({
      kind: 'declared',
      text: 'Optional[int]',
    });
  });

  it('records the def line', () => {
    expect(signatureOf('\n\ndef f():\n    pass\n').line).toBe(3);
  });
});

// ---------------------------------------------------------------------------
// returnsValue
// ---------------------------------------------------------------------------

describe('extractSignature returnsValue', () => {
  it('is true for a return with a value', () => {
    expect(signatureOf('def f():\n    return 1\n').returnsValue).toBe(true);
  });

  it('is false for a bare return', () => {
    expect(signatureOf('def f():\n    return\n').returnsValue).toBe(false);
  });

  it('is false without any return', () => {
    expect(signatureOf('def f():\n    x = 1\n').returnsValue).toBe(false);
  });

  it('finds returns inside nested control flow', () => {
    const source = [
      'def f(items):',
      '    for item in items:',
      '        try:',
      '            if item:',
      '                return item',
      '        except ValueError:',
      '            pass',
      '',
    ].join('\n');
    expect(signatureOf(source).returnsValue).toBe(true);
  });

  it('does not look into nested functions or lambdas', () => {
    const source = [
      'def outer():',
      '    def inner():',
      '        return 1',
      '    key = lambda x: x',
      '    inner()',
      '',
    ].join('\n');
    expect(signatureOf(source, 'outer').returnsValue).toBe(false);
    expect(signatureOf(source, 'inner').returnsValue).toBe(true);
  });

  it('counts tuple returns', () => {
    expect(signatureOf('def f():\n    return 1, 2\n').returnsValue).toBe(true);
  });
});
