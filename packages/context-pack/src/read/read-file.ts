/**
 * File reading for assembly
 */

import { readFileSync } from 'node:fs';
import { splitLinesKeepEnds } from '@repo-context/core';

const decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Read `filePath` as strict UTF-8; invalid byte sequences reject
 */
export function readText(filePath: string): string {
  return decoder.decode(readFileSync(filePath));
}

/**
 * First `maxLines` lines of `text`, terminators kept; shorter text is unchanged
 */
export function truncateLines(text: string, maxLines: number): string {
  const lines = splitLinesKeepEnds(text);
  if (lines.length <= maxLines) {
    return text;
  }
  return lines.slice(0, maxLines).join('');
}
