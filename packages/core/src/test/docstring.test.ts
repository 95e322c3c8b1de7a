/**
 * Docstring tests — covers python/docstring.ts and docstring/parser.ts:
 *   - docstring lookup and cleaning
 *   - parameter section, parameter order and return section parsing
 */

import { describe, it, expect } from 'vitest';
import { parseFunctions } from '../python/parser.js';
import { cleanDocstring, decodeStringLiteral, docstringOf } from '../python/docstring.js';
import {
  extractParameterOrder,
  extractReturnType,
  parseDocstring,
} from '../docstring/parser.js';

function docOf(source: string): string | undefined {
  const [fn] = parseFunctions(source);
  return docstringOf(fn.node);
}

// ---------------------------------------------------------------------------
// docstringOf
// ---------------------------------------------------------------------------

describe('docstringOf', () => {
  it('returns the cleaned triple-quoted docstring', () => {
    const source = [
      'def f(a):',
      '    """Summary line.',
      '',
      '    Args:',
      '        a (int): Value.',
      '    """',
      '    return a',
      '',
    ].join('\n');
    expect(docOf(source)).toBe('Summary line.\n\nArgs:\n    a (int): Value.');
  });

  it('is undefined without a leading string statement', () => {
    expect(docOf('def f():\n    x = "not a docstring"\n')).toBeUndefined();
  });

  it('is undefined when the string is not the first statement', () => {
    expect(docOf('def f():\n    x = 1\n    """late"""\n')).toBeUndefined();
  });

  it('skips a comment before the docstring', () => {
    expect(docOf('def f():\n    # note\n    """Doc."""\n')).toBe('Doc.');
  });

  it('ignores bytes and f-strings', () => {
    expect(docOf('def f():\n    b"""Doc."""\n')).toBeUndefined();
    expect(docOf('def f():\n    f"""Doc."""\n')).toBeUndefined();
  });

  it('joins implicitly concatenated strings', () => {
    expect(docOf('def f():\n    "Part one. " "Part two."\n')).toBe('Part one. Part two.');
  });
});

describe('decodeStringLiteral', () => {
  it('decodes escapes in normal strings', () => {
    expect(decodeStringLiteral('"a\\tb\\nc"')).toBe('a\tb\nc');
  });

  it('keeps raw strings as written', () => {
    expect(decodeStringLiteral('r"a\\tb"')).toBe('a\\tb');
  });

  it('keeps unknown escapes', () => {
    expect(decodeStringLiteral("'\\d'")).toBe('\\d');
  });
});

describe('cleanDocstring', () => {
  it('removes the common indentation and surrounding blank lines', () => {
    expect(cleanDocstring('\n    First.\n      Indented.\n    Last.\n    ')).toBe('First.\n  Indented.\nLast.');
  });

  it('expands tabs before measuring indentation', () => {
    expect(cleanDocstring('Head.\n\tBody.')).toBe('Head.\nBody.');
  });
});

// ---------------------------------------------------------------------------
// parseDocstring
// ---------------------------------------------------------------------------

describe('parseDocstring', () => {
  it('returns an empty contract for a missing docstring', () => {
    const contract = parseDocstring(undefined);
    expect(contract.parameterDocs.size).toBe(0);
    expect(contract.parameterOrder).toEqual([]);
    expect(contract.returnTypeText).toBeUndefined();
  });

  it('returns an empty contract for free text', () => {
    const contract = parseDocstring('Just a description (with parens): nothing else.');
    expect(contract.parameterDocs.size).toBe(0);
    expect(contract.parameterOrder).toEqual([]);
    expect(contract.returnTypeText).toBeUndefined();
  });

  it('reads parameter types verbatim, optional marker included', () => {
    const contract = parseDocstring([
      'Summary.',
      '',
      'Args:',
      '    path (str): Where to look.',
      '    depth (int, optional): How deep.',
      '    mapping (Dict[str, int]): Lookup.',
    ].join('\n'));

    expect([...contract.parameterDocs]).toEqual([
      ['path', 'str'],
      ['depth', 'int, optional'],
      ['mapping', 'Dict[str, int]'],
    ]);
  });

  it('accepts the header case-insensitively and its synonyms', () => {
    expect(parseDocstring('ARGS:\n    a (int): x').parameterDocs.get('a')).toBe('int');
    expect(parseDocstring('Parameters:\n    a (int): x').parameterDocs.get('a')).toBe('int');
    expect(parseDocstring('arguments:\n    a (int): x').parameterDocs.get('a')).toBe('int');
  });

  it('stops the parameter block at the first blank line', () => {
    const contract = parseDocstring([
      'Args:',
      '    a (int): First.',
      '',
      '    b (int): After the gap.',
    ].join('\n'));
    expect([...contract.parameterDocs.keys()]).toEqual(['a']);
  });

  it('ignores entries without a parenthesized type', () => {
    const contract = parseDocstring('Args:\n    a: untyped.\n    b (int): typed.');
    expect([...contract.parameterDocs.keys()]).toEqual(['b']);
  });

  it('does not treat "Keyword Args:" as a parameters header', () => {
    expect(parseDocstring('Keyword Args:\n    a (int): x').parameterDocs.size).toBe(0);
  });
});

describe('extractParameterOrder', () => {
  it('lists names in documented order, typed or not, without self', () => {
    const lines = [
      'Args:',
      '    self: The instance.',
      '    b (int): Second.',
      '    a: First.',
    ];
    expect(extractParameterOrder(lines)).toEqual(['b', 'a']);
  });

  it('skips continuation lines', () => {
    const lines = [
      'Args:',
      '    a (int): First, described',
      '        over two lines.',
      '    b (str): Second.',
    ];
    expect(extractParameterOrder(lines)).toEqual(['a', 'b']);
  });

  it('ends at a line that does not start with an identifier', () => {
    const lines = [
      'Args:',
      '    a (int): First.',
      '    - b (int): Bulleted, so the block is over.',
      '    c (int): Not reached.',
    ];
    expect(extractParameterOrder(lines)).toEqual(['a']);
  });

  it('ends at the next section header', () => {
    const lines = [
      'Args:',
      '    a (int): First.',
      'Returns:',
      '    int: Result.',
    ];
    expect(extractParameterOrder(lines)).toEqual(['a']);
  });
});

describe('extractReturnType', () => {
  it('takes the type before the colon on the next line', () => {
    expect(extractReturnType(['Returns:', '    int: The count.'])).toBe('int');
  });

  it('keeps bracketed types whole', () => {
    expect(extractReturnType(['Returns:', '    Dict[str, int]: Mapping.'])).toBe('Dict[str, int]');
  });

  it('stops the type at the first whitespace outside brackets', () => {
    expect(extractReturnType(['Returns:', '    bool True when the file exists.'])).toBe('bool');
    expect(extractReturnType(['Returns:', '    Tuple[int, str] pair of values.'])).toBe('Tuple[int, str]');
    expect(extractReturnType(['Returns: int count of rows'])).toBe('int');
  });

  it('reads a type on the header line', () => {
    expect(extractReturnType(['Returns: bool'])).toBe('bool');
  });

  it('skips blank lines after the header', () => {
    expect(extractReturnType(['Returns:', '', '    str'])).toBe('str');
  });

  it('is undefined without a header or content', () => {
    expect(extractReturnType(['Summary.'])).toBeUndefined();
    expect(extractReturnType(['Returns:'])).toBeUndefined();
    expect(extractReturnType(['Returns:', 'Raises:', '    ValueError: bad.'])).toBeUndefined();
  });
});
