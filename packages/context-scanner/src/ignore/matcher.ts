/**
 * @module @repo-context/scanner/ignore/matcher
 * Incremental exclusion matcher.
 *
 * Rule sets are registered as the walk enters the directories declaring them,
 * so the answer for a path depends on which rule sets are known when it is
 * asked. The walker's listing order is therefore part of the contract.
 */

import { readFileSync, statSync } from 'node:fs';
import path from 'node:path';
import {
  DEFAULT_RULE_FILE,
  HIDDEN_PREFIX,
  errorMessage,
  getLogger,
  isInsideRoot,
  makeRelativeToRoot,
  toPosix,
} from '@repo-context/core';
import { compilePatterns, parseRulePatterns, type PathTest } from './rule-set.js';
import type { MatcherOptions, RuleSet } from '../types/index.js';

const logger = getLogger('repo-context:scanner:matcher');

interface CompiledRuleSet {
  ruleSet: RuleSet;
  test: PathTest;
}

export class IgnoreMatcher {
  readonly root: string;
  readonly ruleFileName: string;
  private readonly includeIgnored: boolean;
  private readonly denyNames: ReadonlySet<string>;
  private readonly compiled: CompiledRuleSet[] = [];

  constructor(options: MatcherOptions) {
    this.root = path.resolve(options.root);
    this.ruleFileName = options.ruleFileName ?? DEFAULT_RULE_FILE;
    this.includeIgnored = options.includeIgnored ?? false;
    this.denyNames = new Set((options.exclude ?? []).map((entry) => toPosix(entry).replace(/^\.\//, '').replace(/\/+$/, '')));
  }

  /**
   * Rule sets discovered so far, in discovery order
   */
  get ruleSets(): readonly RuleSet[] {
    return this.compiled.map((entry) => entry.ruleSet);
  }

  /**
   * Read the rule file of `directory`, if it has one, and register it.
   * A rule file that cannot be read still marks the directory as declaring
   * a rule set, with no patterns.
   */
  discover(directory: string): RuleSet | undefined {
    const ruleFile = path.join(directory, this.ruleFileName);
    try {
      if (!statSync(ruleFile, { throwIfNoEntry: false })?.isFile()) {
        return undefined;
      }
    } catch (error) {
      logger.warn('Cannot stat rule file, treating the directory as declaring none', {
        ruleFile,
        error: errorMessage(error),
      });
      return undefined;
    }

    let patterns: string[] = [];
    try {
      patterns = parseRulePatterns(readFileSync(ruleFile, 'utf8'));
    } catch (error) {
      logger.warn('Cannot read rule file, registering it without patterns', {
        ruleFile,
        error: errorMessage(error),
      });
    }
    return this.registerRuleSet(directory, patterns);
  }

  /**
   * Register the rule set declared by `directory`. The first one registered
   * is primary; every later one starts a related tree.
   */
  registerRuleSet(directory: string, patterns: readonly string[]): RuleSet {
    const resolved = path.resolve(directory);
    const existing = this.compiled.find((entry) => entry.ruleSet.directory === resolved);
    if (existing) {
      return existing.ruleSet;
    }

    const ruleSet: RuleSet = {
      directory: resolved,
      patterns: [...patterns],
      scope: this.compiled.length === 0 ? 'primary' : 'related',
      order: this.compiled.length,
    };
    this.compiled.push({ ruleSet, test: compilePatterns(resolved, ruleSet.patterns) });
    logger.debug('Discovered rule set', {
      directory: makeRelativeToRoot(resolved, this.root) || '.',
      scope: ruleSet.scope,
      patterns: ruleSet.patterns.length,
    });
    return ruleSet;
  }

  /**
   * Whether `filePath` must be left out. The deny-list always excludes;
   * hidden names and rule matches exclude unless `includeIgnored` is set.
   */
  isExcluded(filePath: string): boolean {
    const absolute = path.resolve(filePath);
    if (this.isDenied(absolute)) {
      return true;
    }
    if (this.includeIgnored) {
      return false;
    }
    if (path.basename(absolute).startsWith(HIDDEN_PREFIX)) {
      return true;
    }
    return this.matchesRules(absolute);
  }

  /**
   * Whether the walk must not descend into `directory`. Hidden directories
   * are pruned even when ignored paths are included.
   */
  isPruned(directory: string): boolean {
    const absolute = path.resolve(directory);
    if (absolute === this.root) {
      return false;
    }
    if (path.basename(absolute).startsWith(HIDDEN_PREFIX)) {
      return true;
    }
    return this.isExcluded(absolute);
  }

  /**
   * Deepest related rule-set directory containing `filePath`
   */
  relatedRootOf(filePath: string): string | undefined {
    let found: string | undefined;
    for (const { ruleSet } of this.compiled) {
      if (ruleSet.scope !== 'related' || !isInsideRoot(filePath, ruleSet.directory)) continue;
      if (!found || ruleSet.directory.length > found.length) {
        found = ruleSet.directory;
      }
    }
    return found;
  }

  private isDenied(absolute: string): boolean {
    if (this.denyNames.size === 0) return false;
    if (this.denyNames.has(path.basename(absolute))) return true;
    return isInsideRoot(absolute, this.root) && this.denyNames.has(makeRelativeToRoot(absolute, this.root));
  }

  /**
   * A path matches when it, or one of its ancestors below the root, matches
   * a known rule set.
   */
  private matchesRules(absolute: string): boolean {
    if (this.compiled.length === 0) return false;

    const candidates = [absolute];
    if (isInsideRoot(absolute, this.root)) {
      let current = path.dirname(absolute);
      while (current !== this.root && isInsideRoot(current, this.root)) {
        candidates.push(current);
        current = path.dirname(current);
      }
    }

    return candidates.some((candidate) => {
      const posix = toPosix(candidate);
      return this.compiled.some((entry) => entry.test(posix));
    });
  }
}
