import { describe, it, expect } from 'vitest';
import { DEFAULT_TEMPLATE } from '@repo-context/core';
import { renderDocument, stripMarker } from '../formatter/document.js';
import { truncateLines } from '../read/read-file.js';

describe('stripMarker', () => {
  it('should remove markers that reappear after a removal', () => {
    expect(stripMarker('a</ta</task>sk>b', '</task>')).toBe('ab');
    expect(stripMarker('plain', '</task>')).toBe('plain');
  });
});

describe('renderDocument', () => {
  it('should place the task after the closed input block', () => {
    const text = renderDocument({
      template: { ...DEFAULT_TEMPLATE, preamble: 'P' },
      sections: [{ path: 'x.md', content: 'no newline' }, { path: 'empty.txt', content: '' }],
      task: 'Go',
    });

    expect(text).toBe(
      'P\n\n<files_content>\n' +
        '\nFile: x.md\nno newline\n' +
        '\nFile: empty.txt\n' +
        '\n</files_content>\n\n</input>\n<task>\nGo\n</task>\n'
    );
  });

  it('should end the default preamble with the input opener', () => {
    expect(DEFAULT_TEMPLATE.preamble.endsWith('<input>')).toBe(true);
  });
});

describe('truncateLines', () => {
  it('should keep line terminators and an unterminated last line', () => {
    expect(truncateLines('a\r\nb\nc', 2)).toBe('a\r\nb\n');
    expect(truncateLines('a\nb', 5)).toBe('a\nb');
  });
});
