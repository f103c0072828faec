/**
 * TypeScript/JavaScript declaration digest using the TS Compiler API
 */

import * as ts from 'typescript';
import { errorMessage, extensionOf, getLogger } from '@repo-context/core';
import type { Summarizer } from '../types/index.js';

const logger = getLogger('repo-context:summarizer:typescript');

const INDENT = '  ';
export const TS_PARSE_ERROR_PREFIX = '// Parse error: ';

function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  const modifiers = ts.canHaveModifiers(node) ? ts.getModifiers(node) : undefined;
  return modifiers?.some((modifier) => modifier.kind === kind) ?? false;
}

function prefixFor(node: ts.Node): string {
  let prefix = '';
  if (hasModifier(node, ts.SyntaxKind.ExportKeyword)) prefix += 'export ';
  if (hasModifier(node, ts.SyntaxKind.DefaultKeyword)) prefix += 'default ';
  if (hasModifier(node, ts.SyntaxKind.StaticKeyword)) prefix += 'static ';
  if (hasModifier(node, ts.SyntaxKind.AbstractKeyword)) prefix += 'abstract ';
  if (hasModifier(node, ts.SyntaxKind.AsyncKeyword)) prefix += 'async ';
  return prefix;
}

function oneLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export class TypeScriptSummarizer implements Summarizer {
  readonly id = 'typescript-compiler';
  readonly language = 'typescript';
  readonly extensions: readonly string[] = ['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs'];

  summarize(source: string, fileName = 'module.ts'): string {
    try {
      const problem = this.findSyntaxProblem(source, fileName);
      if (problem) {
        logger.debug('Source does not parse', { fileName, problem });
        return `${TS_PARSE_ERROR_PREFIX}${problem}`;
      }

      const sourceFile = ts.createSourceFile(
        fileName,
        source,
        ts.ScriptTarget.Latest,
        true,
        this.getScriptKind(fileName)
      );
      const lines: string[] = [];
      this.emitStatements(sourceFile.statements, sourceFile, 0, lines);
      return lines.join('\n');
    } catch (error) {
      return `${TS_PARSE_ERROR_PREFIX}${errorMessage(error)}`;
    }
  }

  private getScriptKind(fileName: string): ts.ScriptKind {
    switch (extensionOf(fileName)) {
      case '.tsx': return ts.ScriptKind.TSX;
      case '.jsx': return ts.ScriptKind.JSX;
      case '.js':
      case '.mjs':
      case '.cjs': return ts.ScriptKind.JS;
      default: return ts.ScriptKind.TS;
    }
  }

  private findSyntaxProblem(source: string, fileName: string): string | undefined {
    const { diagnostics } = ts.transpileModule(source, {
      fileName,
      reportDiagnostics: true,
      compilerOptions: { jsx: ts.JsxEmit.Preserve },
    });
    const first = diagnostics?.find((diagnostic) => diagnostic.file !== undefined);
    if (!first?.file) return undefined;

    const message = ts.flattenDiagnosticMessageText(first.messageText, ' ');
    const { line, character } = first.file.getLineAndCharacterOfPosition(first.start ?? 0);
    return `${message} (line ${line + 1}, column ${character + 1})`;
  }

  private emitStatements(
    statements: readonly ts.Statement[],
    sourceFile: ts.SourceFile,
    depth: number,
    lines: string[]
  ): void {
    const pad = INDENT.repeat(depth);
    for (const node of statements) {
      if (ts.isFunctionDeclaration(node)) {
        const name = node.name?.text ?? '';
        lines.push(`${pad}${prefixFor(node)}function ${name}(${this.parameters(node.parameters, sourceFile)})`);
        this.emitDoc(node, depth + 1, lines);
      } else if (ts.isClassDeclaration(node)) {
        lines.push(`${pad}${prefixFor(node)}class ${node.name?.text ?? ''}${this.heritage(node.heritageClauses, sourceFile)}`);
        this.emitDoc(node, depth + 1, lines);
        this.emitClassMembers(node, sourceFile, depth + 1, lines);
      } else if (ts.isInterfaceDeclaration(node)) {
        lines.push(`${pad}${prefixFor(node)}interface ${node.name.text}${this.heritage(node.heritageClauses, sourceFile)}`);
        this.emitDoc(node, depth + 1, lines);
        this.emitInterfaceMembers(node, sourceFile, depth + 1, lines);
      } else if (ts.isTypeAliasDeclaration(node)) {
        lines.push(`${pad}${prefixFor(node)}type ${node.name.text}`);
        this.emitDoc(node, depth + 1, lines);
      } else if (ts.isEnumDeclaration(node)) {
        lines.push(`${pad}${prefixFor(node)}enum ${node.name.text}`);
        this.emitDoc(node, depth + 1, lines);
      } else if (ts.isModuleDeclaration(node)) {
        lines.push(`${pad}${prefixFor(node)}namespace ${node.name.getText(sourceFile)}`);
        this.emitDoc(node, depth + 1, lines);
        if (node.body && ts.isModuleBlock(node.body)) {
          this.emitStatements(node.body.statements, sourceFile, depth + 1, lines);
        }
      } else if (ts.isVariableStatement(node)) {
        this.emitVariables(node, sourceFile, depth, lines);
      }
    }
  }

  // Function-valued bindings are always listed; other values only when exported.
  private emitVariables(node: ts.VariableStatement, sourceFile: ts.SourceFile, depth: number, lines: string[]): void {
    const pad = INDENT.repeat(depth);
    const exported = hasModifier(node, ts.SyntaxKind.ExportKeyword);
    const keyword = node.declarationList.flags & ts.NodeFlags.Const
      ? 'const'
      : node.declarationList.flags & ts.NodeFlags.Let ? 'let' : 'var';

    for (const declaration of node.declarationList.declarations) {
      if (!ts.isIdentifier(declaration.name)) continue;
      const name = declaration.name.text;
      const initializer = declaration.initializer;
      const prefix = `${pad}${exported ? 'export ' : ''}${keyword} ${name}`;

      if (initializer && (ts.isArrowFunction(initializer) || ts.isFunctionExpression(initializer))) {
        const isAsync = hasModifier(initializer, ts.SyntaxKind.AsyncKeyword);
        lines.push(`${prefix} = ${isAsync ? 'async ' : ''}(${this.parameters(initializer.parameters, sourceFile)}) =>`);
        this.emitDoc(declaration, depth + 1, lines);
      } else if (exported) {
        const type = declaration.type ? `: ${oneLine(declaration.type.getText(sourceFile))}` : '';
        lines.push(`${prefix}${type}${initializer ? ' = ...' : ''}`);
        this.emitDoc(declaration, depth + 1, lines);
      }
    }
  }

  private emitClassMembers(node: ts.ClassDeclaration, sourceFile: ts.SourceFile, depth: number, lines: string[]): void {
    const pad = INDENT.repeat(depth);
    for (const member of node.members) {
      let line: string | undefined;
      if (ts.isConstructorDeclaration(member)) {
        line = `constructor(${this.parameters(member.parameters, sourceFile)})`;
      } else if (ts.isMethodDeclaration(member)) {
        line = `${prefixFor(member)}${member.name.getText(sourceFile)}(${this.parameters(member.parameters, sourceFile)})`;
      } else if (ts.isGetAccessorDeclaration(member)) {
        line = `${prefixFor(member)}get ${member.name.getText(sourceFile)}()`;
      } else if (ts.isSetAccessorDeclaration(member)) {
        line = `${prefixFor(member)}set ${member.name.getText(sourceFile)}(${this.parameters(member.parameters, sourceFile)})`;
      } else if (ts.isPropertyDeclaration(member)) {
        const type = member.type ? `: ${oneLine(member.type.getText(sourceFile))}` : '';
        line = `${prefixFor(member)}${member.name.getText(sourceFile)}${type}${member.initializer ? ' = ...' : ''}`;
      }
      if (line === undefined) continue;
      lines.push(`${pad}${line}`);
      this.emitDoc(member, depth + 1, lines);
    }
  }

  private emitInterfaceMembers(node: ts.InterfaceDeclaration, sourceFile: ts.SourceFile, depth: number, lines: string[]): void {
    const pad = INDENT.repeat(depth);
    for (const member of node.members) {
      let line: string | undefined;
      if (ts.isPropertySignature(member)) {
        const optional = member.questionToken ? '?' : '';
        const type = member.type ? `: ${oneLine(member.type.getText(sourceFile))}` : '';
        line = `${member.name.getText(sourceFile)}${optional}${type}`;
      } else if (ts.isMethodSignature(member)) {
        line = `${member.name.getText(sourceFile)}(${this.parameters(member.parameters, sourceFile)})`;
      }
      if (line === undefined) continue;
      lines.push(`${pad}${line}`);
      this.emitDoc(member, depth + 1, lines);
    }
  }

  private parameters(parameters: ts.NodeArray<ts.ParameterDeclaration>, sourceFile: ts.SourceFile): string {
    return parameters
      .map((parameter) => `${parameter.dotDotDotToken ? '...' : ''}${oneLine(parameter.name.getText(sourceFile))}`)
      .join(', ');
  }

  private heritage(clauses: ts.NodeArray<ts.HeritageClause> | undefined, sourceFile: ts.SourceFile): string {
    if (!clauses) return '';
    return clauses
      .map((clause) => {
        const keyword = clause.token === ts.SyntaxKind.ExtendsKeyword ? 'extends' : 'implements';
        return ` ${keyword} ${clause.types.map((type) => oneLine(type.getText(sourceFile))).join(', ')}`;
      })
      .join('');
  }

  private emitDoc(node: ts.Node, depth: number, lines: string[]): void {
    const comment = ts.getJSDocCommentsAndTags(node).find(ts.isJSDoc)?.comment;
    if (!comment) return;

    const text = (typeof comment === 'string' ? comment : comment.map((part) => part.text).join('')).trim();
    if (!text) return;

    const pad = INDENT.repeat(depth);
    for (const line of `/** ${text} */`.split('\n')) {
      lines.push(line ? `${pad}${line}` : '');
    }
  }
}
