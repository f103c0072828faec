/**
 * @module @repo-context/summarizer/python/python-summarizer
 * Python declaration digest built on tree-sitter
 */

import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import { errorMessage, getLogger } from '@repo-context/core';
import { cleanDocstring, docstringValue } from './docstring.js';
import type { Summarizer, SummarizerOptions } from '../types/index.js';

type SyntaxNode = Parser.SyntaxNode;

const logger = getLogger('repo-context:summarizer:python');

const INDENT = '    ';
const DOC_QUOTES = '"""';
export const PYTHON_PARSE_ERROR_PREFIX = '# SyntaxError while parsing: ';

function position(node: SyntaxNode): string {
  return `line ${node.startPosition.row + 1}, column ${node.startPosition.column + 1}`;
}

/**
 * Statements the grammar still accepts but Python 3 rejects
 */
const PYTHON2_STATEMENTS: ReadonlyMap<string, string> = new Map([
  ['print_statement', 'print'],
  ['exec_statement', 'exec'],
]);

/**
 * First ERROR node, zero-width (missing) node or Python 2 statement,
 * depth-first in source order
 */
function findSyntaxProblem(root: SyntaxNode): string | undefined {
  const stack: SyntaxNode[] = [root];
  for (let node = stack.pop(); node; node = stack.pop()) {
    if (node.type === 'ERROR') {
      return `invalid syntax (${position(node)})`;
    }
    const keyword = PYTHON2_STATEMENTS.get(node.type);
    if (keyword !== undefined) {
      return `Missing parentheses in call to '${keyword}' (${position(node)})`;
    }
    if (node !== root && node.startIndex === node.endIndex) {
      return `missing ${JSON.stringify(node.type)} (${position(node)})`;
    }
    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i];
      if (child) stack.push(child);
    }
  }
  return undefined;
}

function oneLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function parameterNames(parameters: SyntaxNode | null, stripSelf: boolean): string[] {
  if (!parameters) return [];
  const names: string[] = [];
  for (const parameter of parameters.namedChildren) {
    switch (parameter.type) {
      case 'identifier':
      case 'list_splat_pattern':
      case 'dictionary_splat_pattern':
        names.push(oneLine(parameter.text));
        break;
      case 'default_parameter':
      case 'typed_default_parameter':
        names.push(oneLine(parameter.childForFieldName('name')?.text ?? parameter.text));
        break;
      case 'typed_parameter':
        names.push(oneLine(parameter.namedChildren[0]?.text ?? parameter.text));
        break;
      case 'keyword_separator':
        names.push('*');
        break;
      case 'positional_separator':
        names.push('/');
        break;
      default:
        break;
    }
  }
  if (stripSelf && names[0] === 'self') {
    names.shift();
  }
  return names;
}

export class PythonSummarizer implements Summarizer {
  readonly id = 'python-tree-sitter';
  readonly language = 'python';
  readonly extensions: readonly string[] = ['.py', '.pyi'];
  private readonly stripSelf: boolean;
  private parser: Parser | null = null;

  constructor(options: SummarizerOptions = {}) {
    this.stripSelf = options.stripSelf ?? false;
  }

  summarize(source: string, fileName?: string): string {
    let root: SyntaxNode;
    try {
      root = this.getParser().parse(source, undefined, {
        bufferSize: Math.max(32 * 1024, source.length * 2),
      }).rootNode;
    } catch (error) {
      logger.debug('Parser failed', { fileName, error: errorMessage(error) });
      return `${PYTHON_PARSE_ERROR_PREFIX}${errorMessage(error)}`;
    }

    const problem = findSyntaxProblem(root);
    if (problem) {
      logger.debug('Source does not parse', { fileName, problem });
      return `${PYTHON_PARSE_ERROR_PREFIX}${problem}`;
    }

    const lines: string[] = [];
    this.emitStatements(root.namedChildren, 0, false, lines);
    return lines.join('\n');
  }

  private getParser(): Parser {
    if (!this.parser) {
      const parser = new Parser();
      parser.setLanguage(Python);
      this.parser = parser;
    }
    return this.parser;
  }

  private emitStatements(statements: SyntaxNode[], depth: number, inClass: boolean, lines: string[]): void {
    for (const statement of statements) {
      const node = statement.type === 'decorated_definition'
        ? statement.childForFieldName('definition')
        : statement;
      if (!node) continue;

      switch (node.type) {
        case 'function_definition':
          this.emitFunction(node, depth, lines);
          break;
        case 'class_definition':
          this.emitClass(node, depth, lines);
          break;
        case 'expression_statement':
          if (inClass) this.emitField(node, depth, lines);
          break;
        default:
          break;
      }
    }
  }

  // Bodies are not entered: nested definitions inside functions stay out.
  private emitFunction(node: SyntaxNode, depth: number, lines: string[]): void {
    const name = node.childForFieldName('name')?.text ?? '';
    const isAsync = node.children.some((child) => child.type === 'async');
    const params = parameterNames(node.childForFieldName('parameters'), this.stripSelf);
    lines.push(`${INDENT.repeat(depth)}${isAsync ? 'async ' : ''}def ${name}(${params.join(', ')}):`);
    this.emitDocstring(node.childForFieldName('body'), depth + 1, lines);
  }

  private emitClass(node: SyntaxNode, depth: number, lines: string[]): void {
    const name = node.childForFieldName('name')?.text ?? '';
    const superclasses = node.childForFieldName('superclasses');
    const bases = (superclasses?.namedChildren ?? [])
      .filter((child) => child.type !== 'keyword_argument' && child.type !== 'comment')
      .map((child) => oneLine(child.text));
    lines.push(`${INDENT.repeat(depth)}class ${name}${bases.length > 0 ? `(${bases.join(', ')})` : ''}:`);

    const body = node.childForFieldName('body');
    this.emitDocstring(body, depth + 1, lines);
    if (body) {
      this.emitStatements(body.namedChildren, depth + 1, true, lines);
    }
  }

  private emitField(statement: SyntaxNode, depth: number, lines: string[]): void {
    const assignment = statement.namedChildren[0];
    if (!assignment || assignment.type !== 'assignment') return;

    const left = assignment.childForFieldName('left');
    if (!left) return;
    const type = assignment.childForFieldName('type');
    const right = assignment.childForFieldName('right');

    const target = oneLine(left.text);
    const line = type
      ? `${target}: ${oneLine(type.text)}${right ? ' = ...' : ''}`
      : `${target} = ...`;
    lines.push(`${INDENT.repeat(depth)}${line}`);
  }

  private emitDocstring(body: SyntaxNode | null, depth: number, lines: string[]): void {
    const first = body?.namedChildren.find((child) => child.type !== 'comment');
    if (!first || first.type !== 'expression_statement' || first.namedChildCount !== 1) return;

    const literal = first.namedChildren[0];
    if (!literal || literal.type !== 'string') return;

    const value = docstringValue(literal.text);
    if (value === undefined) return;
    const doc = cleanDocstring(value);
    if (!doc) return;

    const pad = INDENT.repeat(depth);
    for (const line of `${DOC_QUOTES}${doc}${DOC_QUOTES}`.split('\n')) {
      lines.push(line ? `${pad}${line}` : '');
    }
  }
}
