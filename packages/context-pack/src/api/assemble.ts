/**
 * Assemble context document API
 */

import { realpathSync, statSync } from 'node:fs';
import path from 'node:path';
import {
  createContextError,
  defaultTokenEstimator,
  errorMessage,
  extensionOf,
  getLogger,
  isInsideRoot,
  makeRelativeToRoot,
  parsePolicy,
  wrapError,
  type AssemblyPolicy,
  type ContentMode,
} from '@repo-context/core';
import {
  IgnoreMatcher,
  buildTree,
  buildTreeFromFiles,
  formatTree,
  rootName,
  walkForTree,
  type ScannedFile,
} from '@repo-context/scanner';
import { createDefaultRegistry, type SummarizerRegistry } from '@repo-context/summarizer';
import { decideContent, type ContentDecision } from '../policy/content-policy.js';
import { readText, truncateLines } from '../read/read-file.js';
import { renderDocument, type DocumentSection } from '../formatter/document.js';
import type { AssembleOptions, AssembleResult, AssembledFile, AssemblyPolicyInput } from '../types/index.js';

const logger = getLogger('repo-context:pack:assemble');

interface PlannedFile {
  file: ScannedFile;
  decision: Exclude<ContentDecision, 'skip'>;
}

function assertRootDirectory(root: string): void {
  if (!statSync(root, { throwIfNoEntry: false })?.isDirectory()) {
    throw createContextError('CTX_INVALID_ROOT', `Root ${root} is not an existing directory`, { root });
  }
}

function isExistingFile(file: string): boolean {
  try {
    return statSync(file, { throwIfNoEntry: false })?.isFile() ?? false;
  } catch (error) {
    logger.debug('Cannot stat listed file', { file, error: errorMessage(error) });
    return false;
  }
}

/**
 * Resolve and check every allow-list entry before anything is read.
 * An entry must stay inside the root both as written and once its links are
 * resolved.
 */
export function resolveAllowList(root: string, names: readonly string[]): ScannedFile[] {
  const realRoot = realpathSync(root);

  return names.map((name) => {
    const absolutePath = path.resolve(root, name);
    if (!isInsideRoot(absolutePath, root)) {
      throw createContextError('CTX_PATH_ESCAPES_ROOT', `Listed file ${name} is outside the root ${root}`, { file: name, root });
    }
    if (!isExistingFile(absolutePath)) {
      throw createContextError('CTX_FILE_NOT_FOUND', `Listed file ${name} does not exist under ${root}`, { file: name, root });
    }
    const target = realpathSync(absolutePath);
    if (!isInsideRoot(target, realRoot)) {
      throw createContextError(
        'CTX_PATH_ESCAPES_ROOT',
        `Listed file ${name} links to ${target}, outside the root ${root}`,
        { file: name, root, target }
      );
    }
    return {
      absolutePath,
      relativePath: makeRelativeToRoot(absolutePath, root),
      name: path.basename(absolutePath),
      extension: extensionOf(absolutePath),
      scope: 'primary',
    };
  });
}

function planWalkedFiles(
  files: readonly ScannedFile[],
  policy: AssemblyPolicy,
  registry: SummarizerRegistry
): PlannedFile[] {
  const planned: PlannedFile[] = [];
  for (const file of files) {
    const decision = decideContent(file, policy, registry);
    if (decision === 'skip') {
      logger.debug('Skipping related file', { file: file.relativePath });
      continue;
    }
    planned.push({ file, decision });
  }
  return planned;
}

/**
 * Build the context document for `root`.
 *
 * Runs synchronously: one walk, then one read per file in walk order.
 * Configuration problems (bad root, bad policy, allow-list entries that escape
 * the root or do not exist) throw before anything is read. Unreadable files
 * are replaced by a placeholder and reported in `warnings`.
 */
export function assembleContext(
  root: string,
  policyInput: AssemblyPolicyInput = {},
  options: AssembleOptions = {}
): AssembleResult {
  const policy = parsePolicy(policyInput);
  const resolvedRoot = path.resolve(root);
  assertRootDirectory(resolvedRoot);

  const listed = policy.files ? resolveAllowList(resolvedRoot, policy.files) : undefined;
  const registry = options.registry ?? createDefaultRegistry({ stripSelf: policy.stripSelf });
  const estimator = options.estimator ?? defaultTokenEstimator;

  const matcher = new IgnoreMatcher({
    root: resolvedRoot,
    includeIgnored: policy.includeIgnored,
    exclude: policy.exclude,
    ruleFileName: policy.ruleFileName,
  });
  const walkOptions = { sort: policy.sort };

  let treeLines: string[] | undefined;
  let planned: PlannedFile[];
  if (listed) {
    planned = listed.map((file): PlannedFile => ({ file, decision: 'full' }));
    if (policy.includeTree) {
      treeLines = formatTree(buildTree(resolvedRoot, matcher, walkOptions));
    }
  } else {
    const walked = walkForTree(resolvedRoot, matcher, walkOptions);
    if (policy.includeTree) {
      treeLines = formatTree(buildTreeFromFiles(rootName(resolvedRoot), walked.entries));
    }
    planned = planWalkedFiles(walked.files, policy, registry);
  }

  const sections: DocumentSection[] = [];
  const files: AssembledFile[] = [];
  const warnings: string[] = [];

  for (const { file, decision } of planned) {
    let content: string;
    let mode: ContentMode = decision;
    try {
      const raw = readText(file.absolutePath);
      if (decision === 'truncated') {
        content = truncateLines(raw, policy.maxLines);
      } else if (decision === 'summarized') {
        content = registry.forPath(file.relativePath)?.summarize(raw, file.name) ?? raw;
      } else {
        content = raw;
      }
    } catch (error) {
      const wrapped = wrapError(error, 'CTX_READ_ERROR');
      content = `Error reading ${file.relativePath}: ${wrapped.message}`;
      mode = 'error';
      warnings.push(content);
      logger.warn('Cannot read file, emitting placeholder', { file: file.relativePath, error: wrapped.message });
    }

    const tokens = mode === 'error' ? 0 : estimator.estimate(content);
    sections.push({ path: file.relativePath, content });
    files.push({
      path: file.relativePath,
      absolutePath: file.absolutePath,
      scope: file.scope,
      mode,
      tokens,
    });
  }

  const text = renderDocument({
    template: policy.template,
    ...(treeLines ? { treeLines } : {}),
    sections,
    task: policy.task,
  });
  const tokenCount = files.reduce((sum, file) => sum + file.tokens, 0);

  logger.info('Assembled context', { root: resolvedRoot, files: files.length, tokens: tokenCount, warnings: warnings.length });
  return { text, tokenCount, files, warnings };
}
