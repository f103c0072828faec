/**
 * Context document layout
 */

import type { ContextTemplate } from '@repo-context/core';

export const STRUCTURE_OPEN = '<repository_structure>';
export const STRUCTURE_CLOSE = '</repository_structure>';
export const FILES_OPEN = '<files_content>';
export const FILES_CLOSE = '</files_content>';
export const INPUT_CLOSE = '</input>';

export interface DocumentSection {
  path: string;
  content: string;
}

export interface DocumentParts {
  template: ContextTemplate;
  /** Formatted tree lines; the block is left out when undefined */
  treeLines?: readonly string[];
  sections: readonly DocumentSection[];
  task: string;
}

/**
 * Remove every occurrence of `marker`, again and again, until none is left
 */
export function stripMarker(text: string, marker: string): string {
  if (!marker) return text;
  let current = text;
  while (current.includes(marker)) {
    current = current.split(marker).join('');
  }
  return current;
}

function withTrailingNewline(text: string): string {
  return text === '' || text.endsWith('\n') ? text : `${text}\n`;
}

export function renderFileSection(section: DocumentSection): string {
  return `\nFile: ${section.path}\n${withTrailingNewline(section.content)}`;
}

export function renderDocument(parts: DocumentParts): string {
  const { template } = parts;
  let text = `${template.preamble}\n`;

  if (parts.treeLines) {
    text += `${STRUCTURE_OPEN}\n`;
    for (const line of parts.treeLines) {
      text += `${line}\n`;
    }
    text += `${STRUCTURE_CLOSE}\n`;
  }

  text += `\n${FILES_OPEN}\n`;
  for (const section of parts.sections) {
    text += renderFileSection(section);
  }
  text += `\n${FILES_CLOSE}\n\n${INPUT_CLOSE}\n`;

  text += `${template.taskOpen}\n${stripMarker(parts.task, template.taskClose)}\n${template.taskClose}\n`;
  return text;
}
