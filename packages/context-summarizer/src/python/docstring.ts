/**
 * Python string literal helpers for docstrings
 */

const STRING_LITERAL = /^([rRuU]?)("""|'''|"|')([\s\S]*)\2$/;

const SIMPLE_ESCAPES: Record<string, string> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  n: '\n',
  t: '\t',
  r: '\r',
};

function decodeEscapes(text: string): string {
  return text.replace(/\\(\r?\n|[\\'"ntr])/g, (_match, escaped: string) => {
    if (escaped.endsWith('\n')) return '';
    return SIMPLE_ESCAPES[escaped] ?? escaped;
  });
}

/**
 * Value of a string literal usable as a docstring, or undefined for bytes,
 * f-strings and anything else that is not a plain string literal
 */
export function docstringValue(literal: string): string | undefined {
  const match = STRING_LITERAL.exec(literal);
  if (!match) return undefined;
  const [, prefix = '', , body = ''] = match;
  return prefix.toLowerCase() === 'r' ? body : decodeEscapes(body);
}

/**
 * Clean indentation the way Python's inspect.cleandoc does
 */
export function cleanDocstring(doc: string): string {
  const lines = doc.replace(/\t/g, '        ').split('\n');

  let margin = Number.POSITIVE_INFINITY;
  for (const line of lines.slice(1)) {
    const content = line.trimStart();
    if (content) {
      margin = Math.min(margin, line.length - content.length);
    }
  }

  const cleaned = lines.map((line, index) => {
    if (index === 0) return line.trimStart();
    return Number.isFinite(margin) ? line.slice(margin) : line;
  });

  while (cleaned.length > 0 && cleaned[0]?.trim() === '') cleaned.shift();
  while (cleaned.length > 0 && cleaned[cleaned.length - 1]?.trim() === '') cleaned.pop();
  return cleaned.join('\n');
}
