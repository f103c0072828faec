import { describe, it, expect } from 'vitest';
import { extensionOf, isInsideRoot, makeRelativeToRoot, splitLinesKeepEnds, toPosix } from '../utils/paths.js';

describe('Path utilities', () => {
  it('should convert to POSIX', () => {
    expect(toPosix('a\\b\\c.py')).toBe('a/b/c.py');
    expect(toPosix('a/b')).toBe('a/b');
  });

  it('should make paths relative to the root', () => {
    expect(makeRelativeToRoot('/repo/src/a.py', '/repo')).toBe('src/a.py');
  });

  it('should detect paths inside the root', () => {
    expect(isInsideRoot('/repo/src/a.py', '/repo')).toBe(true);
    expect(isInsideRoot('/repo', '/repo')).toBe(true);
    expect(isInsideRoot('/repo/src/../a.py', '/repo')).toBe(true);
  });

  it('should detect paths escaping the root', () => {
    expect(isInsideRoot('/repo/../etc/passwd', '/repo')).toBe(false);
    expect(isInsideRoot('/repository/a.py', '/repo')).toBe(false);
    expect(isInsideRoot('/elsewhere', '/repo')).toBe(false);
  });

  it('should return lower-cased extensions', () => {
    expect(extensionOf('src/A.PY')).toBe('.py');
    expect(extensionOf('Makefile')).toBe('');
    expect(extensionOf('.gitignore')).toBe('');
  });

  it('should split lines keeping terminators', () => {
    expect(splitLinesKeepEnds('a\nb\n')).toEqual(['a\n', 'b\n']);
    expect(splitLinesKeepEnds('a\nb')).toEqual(['a\n', 'b']);
    expect(splitLinesKeepEnds('a\n\nb')).toEqual(['a\n', '\n', 'b']);
    expect(splitLinesKeepEnds('')).toEqual([]);
  });
});
