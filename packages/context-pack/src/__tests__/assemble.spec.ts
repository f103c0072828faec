import { describe, it, expect, afterEach } from 'vitest';
import { symlinkSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  createTestProject,
  numberedLines,
  removeTestProject,
  type ProjectStructure,
  type TestProject,
} from '@repo-context/tests';
import { assembleContext } from '../api/assemble.js';

const RELATED_SOURCE = 'class C(Base):\n    """doc"""\n    def g(self):\n        return 1\n';

let project: TestProject | undefined;

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

function setup(structure: ProjectStructure): string {
  project = createTestProject(structure);
  return project.path;
}

afterEach(() => {
  if (project) {
    removeTestProject(project);
    project = undefined;
  }
});

describe('assembleContext', () => {
  it('should emit primary sources in full and summarize related ones', () => {
    const root = setup({
      '.gitignore': '*.log\n',
      'a.py': 'print("hi")\n',
      'debug.log': 'noise\n',
      vendor: { '.gitignore': '', 'b.py': RELATED_SOURCE },
    });

    const result = assembleContext(root, {
      sort: true,
      task: 'Do it',
      template: { preamble: 'PREAMBLE' },
    });

    expect(result.text).toBe(
      'PREAMBLE\n' +
        '<repository_structure>\n' +
        '├── project/\n' +
        '│   ├── a.py\n' +
        '│   ├── vendor/\n' +
        '│   │   ├── b.py\n' +
        '</repository_structure>\n' +
        '\n<files_content>\n' +
        '\nFile: a.py\nprint("hi")\n' +
        '\nFile: vendor/b.py\nclass C(Base):\n    """doc"""\n    def g(self):\n' +
        '\n</files_content>\n\n</input>\n' +
        '<task>\nDo it\n</task>\n'
    );
    expect(result.files.map((file) => [file.path, file.scope, file.mode])).toEqual([
      ['a.py', 'primary', 'full'],
      ['vendor/b.py', 'related', 'summarized'],
    ]);
    expect(result.tokenCount).toBe(9);
    expect(result.warnings).toEqual([]);
  });

  it('should cut long non-source files and keep short ones unchanged', () => {
    const root = setup({ 'notes.txt': numberedLines(700), 'short.txt': numberedLines(300) });

    const result = assembleContext(root, { sort: true });

    expect(result.text).toContain(
      `\nFile: notes.txt\n${numberedLines(500)}\nFile: short.txt\n${numberedLines(300)}\n</files_content>`
    );
    expect(result.files.map((file) => file.mode)).toEqual(['truncated', 'truncated']);
    expect(result.tokenCount).toBe(1600);
  });

  it('should honor a custom line limit', () => {
    const root = setup({ 'notes.txt': numberedLines(10) });

    const result = assembleContext(root, { maxLines: 3, includeTree: false });

    expect(result.text).toContain(`\nFile: notes.txt\n${numberedLines(3)}\n</files_content>`);
  });

  it('should keep only allowed extensions from related trees when skipping them', () => {
    const structure: ProjectStructure = {
      '.gitignore': '',
      'a.py': 'x = 1\n',
      vendor: { '.gitignore': '', 'README.md': '# Vendor\n', 'b.py': RELATED_SOURCE, 'data.json': '{}\n' },
    };
    const root = setup(structure);

    const skipped = assembleContext(root, { sort: true, skipRelated: true });
    const kept = assembleContext(root, { sort: true });

    expect(skipped.files.map((file) => [file.path, file.mode])).toEqual([
      ['a.py', 'full'],
      ['vendor/README.md', 'truncated'],
    ]);
    expect(kept.files.map((file) => [file.path, file.mode])).toEqual([
      ['a.py', 'full'],
      ['vendor/README.md', 'truncated'],
      ['vendor/b.py', 'summarized'],
      ['vendor/data.json', 'truncated'],
    ]);
  });

  it('should read only the allow-listed files, in full', () => {
    const root = setup({ 'a.py': 'print(1)\n', vendor: { '.gitignore': '', 'b.py': RELATED_SOURCE } });

    const result = assembleContext(root, {
      files: ['vendor/b.py'],
      includeTree: false,
      template: { preamble: 'P' },
    });

    expect(result.text).toBe(
      'P\n' +
        '\n<files_content>\n' +
        `\nFile: vendor/b.py\n${RELATED_SOURCE}` +
        '\n</files_content>\n\n</input>\n' +
        '<task>\n\n</task>\n'
    );
    expect(result.files).toHaveLength(1);
    expect(result.files[0]?.mode).toBe('full');
    expect(result.files[0]?.scope).toBe('primary');
  });

  it('should reject an allow-list naming a missing file', () => {
    const root = setup({ 'a.py': 'print(1)\n' });

    const error = captureError(() => assembleContext(root, { files: ['a.py', 'missing.py'] }));

    expect(error).toMatchObject({ code: 'CTX_FILE_NOT_FOUND' });
  });

  it('should reject an allow-list entry outside the root', () => {
    const root = setup({ 'a.py': 'print(1)\n' });

    const error = captureError(() => assembleContext(root, { files: ['../outside.txt'] }));

    expect(error).toMatchObject({ code: 'CTX_PATH_ESCAPES_ROOT' });
  });

  it('should reject an allow-listed link whose target lies outside the root', () => {
    const root = setup({ 'a.py': 'print(1)\n' });
    const secret = join(project?.base ?? root, 'secret.txt');
    writeFileSync(secret, 'TOKEN=test-secret\n');
    symlinkSync(secret, join(root, 'link.txt'));

    const error = captureError(() => assembleContext(root, { files: ['link.txt'] }));

    expect(error).toMatchObject({ code: 'CTX_PATH_ESCAPES_ROOT' });
  });

  it('should accept an allow-listed link whose target stays inside the root', () => {
    const root = setup({ 'a.py': 'print(1)\n' });
    symlinkSync('a.py', join(root, 'alias.py'));

    const result = assembleContext(root, { files: ['alias.py'], includeTree: false });

    expect(result.files.map((file) => [file.path, file.mode])).toEqual([['alias.py', 'full']]);
    expect(result.text).toContain('\nFile: alias.py\nprint(1)\n');
  });

  it('should skip self-referencing links instead of failing the walk', () => {
    const root = setup({ 'a.txt': 'a\n' });
    symlinkSync('loop', join(root, 'loop'));

    const result = assembleContext(root, { sort: true });

    expect(result.files.map((file) => file.path)).toEqual(['a.txt']);
    expect(result.text).toContain('<repository_structure>\n├── project/\n│   ├── a.txt\n</repository_structure>\n');
  });

  it('should render visited directories that hold no surviving files', () => {
    const root = setup({ '.gitignore': '*.log\n', 'a.py': 'x = 1\n', empty: {}, logs: { 'run.log': 'x\n' } });

    const result = assembleContext(root, { sort: true });

    expect(result.text).toContain(
      '<repository_structure>\n' +
        '├── project/\n' +
        '│   ├── a.py\n' +
        '│   ├── empty/\n' +
        '│   ├── logs/\n' +
        '</repository_structure>\n'
    );
    expect(result.files.map((file) => file.path)).toEqual(['a.py']);
  });

  it('should reject a root that is not a directory', () => {
    const root = setup({ 'a.py': 'print(1)\n' });

    const error = captureError(() => assembleContext(`${root}/a.py`));

    expect(error).toMatchObject({ code: 'CTX_INVALID_ROOT' });
  });

  it('should reject an invalid policy', () => {
    const root = setup({ 'a.py': 'print(1)\n' });

    const error = captureError(() => assembleContext(root, { maxLines: 0 }));

    expect(error).toMatchObject({ code: 'CTX_INVALID_CONFIG' });
  });

  it('should strip task close markers from the task', () => {
    const root = setup({ 'a.py': 'print(1)\n' });

    const result = assembleContext(root, { task: 'Fix </ta</task>sk> now' });

    expect(result.text.endsWith('<task>\nFix  now\n</task>\n')).toBe(true);
  });

  it('should emit a placeholder for files that cannot be decoded', () => {
    const root = setup({ 'bad.txt': Buffer.from([0xff, 0xfe, 0x00]), 'good.txt': 'fine\n' });

    const result = assembleContext(root, { sort: true });

    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]?.startsWith('Error reading bad.txt: ')).toBe(true);
    expect(result.files.map((file) => [file.path, file.mode, file.tokens])).toEqual([
      ['bad.txt', 'error', 0],
      ['good.txt', 'truncated', 1],
    ]);
    expect(result.text).toContain('\nFile: bad.txt\nError reading bad.txt: ');
    expect(result.tokenCount).toBe(1);
  });

  it('should leave the summarizer signature untouched unless asked to strip self', () => {
    const root = setup({ '.gitignore': '', vendor: { '.gitignore': '', 'b.py': RELATED_SOURCE } });

    const result = assembleContext(root, { stripSelf: true, includeTree: false });

    expect(result.text).toContain('\nFile: vendor/b.py\nclass C(Base):\n    """doc"""\n    def g():\n');
  });
});
