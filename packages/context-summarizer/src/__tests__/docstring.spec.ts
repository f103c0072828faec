import { describe, it, expect } from 'vitest';
import { cleanDocstring, docstringValue } from '../python/docstring.js';

describe('Docstrings', () => {
  it('should read plain and raw string literals', () => {
    expect(docstringValue('"""x"""')).toBe('x');
    expect(docstringValue("'single'")).toBe('single');
    expect(docstringValue('"a\\tb"')).toBe('a\tb');
    expect(docstringValue("r'a\\n'")).toBe('a\\n');
  });

  it('should reject bytes and f-strings', () => {
    expect(docstringValue('b"x"')).toBeUndefined();
    expect(docstringValue('f"x"')).toBeUndefined();
  });

  it('should strip the common margin and surrounding blank lines', () => {
    expect(cleanDocstring('  Summary.\n\n      indented\n    back\n')).toBe('Summary.\n\n  indented\nback');
    expect(cleanDocstring('\n    Only body.\n    ')).toBe('Only body.');
  });
});
