/**
 * Test helpers for repo-context
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

/**
 * Nested file layout: strings are file contents, objects are directories
 */
export interface ProjectStructure {
  [name: string]: string | Buffer | ProjectStructure;
}

export interface TestProject {
  /** Root of the created project; its base name is `name` */
  path: string;
  name: string;
  /** Temporary directory holding the project */
  base: string;
}

export function writeStructure(basePath: string, structure: ProjectStructure): void {
  mkdirSync(basePath, { recursive: true });
  for (const [name, content] of Object.entries(structure)) {
    const fullPath = join(basePath, name);
    if (typeof content === 'string' || Buffer.isBuffer(content)) {
      mkdirSync(dirname(fullPath), { recursive: true });
      writeFileSync(fullPath, content);
    } else {
      writeStructure(fullPath, content);
    }
  }
}

/**
 * Create `structure` under a fresh temporary directory, inside a folder named `name`
 */
export function createTestProject(structure: ProjectStructure, name = 'project'): TestProject {
  const base = mkdtempSync(join(tmpdir(), 'repo-context-'));
  const path = join(base, name);
  writeStructure(path, structure);
  return { path, name, base };
}

export function removeTestProject(project: TestProject): void {
  rmSync(project.base, { recursive: true, force: true });
}

/**
 * `count` newline-terminated lines: "line 1\n" ... "line <count>\n"
 */
export function numberedLines(count: number, prefix = 'line'): string {
  let text = '';
  for (let i = 1; i <= count; i++) {
    text += `${prefix} ${i}\n`;
  }
  return text;
}
