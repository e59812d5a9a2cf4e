import ts from 'typescript';

import { detectLanguage, fileExtension, type CodeBlockNode, type FunctionNode, type LocalFile } from '../infographic/index.js';
import { scanTokens, type Token } from './tokenScanner.js';

export type FunctionBlock = {
  name: string;
  signature: string;
  startLine: number; // 1-based
  endLine: number; // 1-based, line containing closing brace
  startPos: number;
  bodyEndPos: number; // position of matching "}"
};

const OUTLINE_EXTENSIONS = new Set(['ts', 'tsx', 'mts', 'cts', 'js', 'jsx', 'mjs', 'cjs']);
const JSX_EXTENSIONS = new Set(['tsx', 'jsx']);

export const MAX_FUNCTIONS_PER_FILE = 50;

function isMethodModifier(kind: ts.SyntaxKind): boolean {
  return (
    kind === ts.SyntaxKind.PublicKeyword ||
    kind === ts.SyntaxKind.PrivateKeyword ||
    kind === ts.SyntaxKind.ProtectedKeyword ||
    kind === ts.SyntaxKind.AsyncKeyword ||
    kind === ts.SyntaxKind.StaticKeyword ||
    kind === ts.SyntaxKind.ReadonlyKeyword ||
    kind === ts.SyntaxKind.AbstractKeyword ||
    kind === ts.SyntaxKind.OverrideKeyword
  );
}

function findMatching(tokens: Token[], openIndex: number, open: ts.SyntaxKind, close: ts.SyntaxKind): number | null {
  let depth = 0;
  for (let i = openIndex; i < tokens.length; i += 1) {
    const k = tokens[i]?.kind;
    if (k === open) depth += 1;
    else if (k === close) depth -= 1;
    if (depth === 0) return i;
  }
  return null;
}

const TYPE_POSITION_BEFORE_BRACE = new Set<ts.SyntaxKind>([
  ts.SyntaxKind.ColonToken,
  ts.SyntaxKind.BarToken,
  ts.SyntaxKind.AmpersandToken,
  ts.SyntaxKind.LessThanToken,
  ts.SyntaxKind.CommaToken,
  ts.SyntaxKind.OpenParenToken,
  ts.SyntaxKind.OpenBracketToken,
  ts.SyntaxKind.EqualsGreaterThanToken,
]);

/** Index of the body's `{` after a parameter list, skipping a return type annotation. */
function findBodyStart(tokens: Token[], closeParenIndex: number): number | null {
  let j = closeParenIndex + 1;
  if (tokens[j]?.kind === ts.SyntaxKind.OpenBraceToken) return j;
  if (tokens[j]?.kind !== ts.SyntaxKind.ColonToken) return null;

  j += 1;
  while (j < tokens.length) {
    const t = tokens[j];
    if (!t) return null;
    if (t.kind === ts.SyntaxKind.SemicolonToken || t.kind === ts.SyntaxKind.CloseBraceToken) return null;
    if (t.kind === ts.SyntaxKind.EqualsGreaterThanToken && tokens[j - 1]?.kind !== ts.SyntaxKind.CloseParenToken) return null;
    if (t.kind === ts.SyntaxKind.OpenBraceToken) {
      const prev = tokens[j - 1];
      if (!prev || !TYPE_POSITION_BEFORE_BRACE.has(prev.kind)) return j;
      const close = findMatching(tokens, j, ts.SyntaxKind.OpenBraceToken, ts.SyntaxKind.CloseBraceToken);
      if (close === null) return null;
      j = close + 1;
      continue;
    }
    if (t.kind === ts.SyntaxKind.OpenParenToken) {
      const close = findMatching(tokens, j, ts.SyntaxKind.OpenParenToken, ts.SyntaxKind.CloseParenToken);
      if (close === null) return null;
      j = close + 1;
      continue;
    }
    j += 1;
  }
  return null;
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/gu, ' ').trim();
}

export function scanFunctionBlocks(fileText: string, sourceFile: ts.SourceFile, variant = ts.LanguageVariant.Standard): FunctionBlock[] {
  const tokens = scanTokens(fileText, variant);
  const blocks: FunctionBlock[] = [];

  const push = (name: string, startIndex: number, openBraceIndex: number): number | null => {
    const start = tokens[startIndex];
    const openBrace = tokens[openBraceIndex];
    const closeBraceIndex = findMatching(tokens, openBraceIndex, ts.SyntaxKind.OpenBraceToken, ts.SyntaxKind.CloseBraceToken);
    const closeBrace = closeBraceIndex === null ? undefined : tokens[closeBraceIndex];
    if (!start || !openBrace || !closeBrace) return null;

    blocks.push({
      name,
      signature: collapseWhitespace(fileText.slice(start.pos, openBrace.pos)),
      startLine: sourceFile.getLineAndCharacterOfPosition(start.pos).line + 1,
      endLine: sourceFile.getLineAndCharacterOfPosition(closeBrace.pos).line + 1,
      startPos: start.pos,
      bodyEndPos: closeBrace.pos,
    });
    return openBraceIndex;
  };

  for (let i = 0; i < tokens.length; i += 1) {
    const t = tokens[i];
    if (!t) continue;

    // function foo(...) { ... } / function* foo(...) { ... }
    if (t.kind === ts.SyntaxKind.FunctionKeyword) {
      let n = i + 1;
      if (tokens[n]?.kind === ts.SyntaxKind.AsteriskToken) n += 1;
      const nameTok = tokens[n];
      if (nameTok?.kind !== ts.SyntaxKind.Identifier) continue;
      let p = n + 1;
      if (tokens[p]?.kind === ts.SyntaxKind.LessThanToken) {
        const close = findMatching(tokens, p, ts.SyntaxKind.LessThanToken, ts.SyntaxKind.GreaterThanToken);
        if (close === null) continue;
        p = close + 1;
      }
      if (tokens[p]?.kind !== ts.SyntaxKind.OpenParenToken) continue;
      const closeParenIndex = findMatching(tokens, p, ts.SyntaxKind.OpenParenToken, ts.SyntaxKind.CloseParenToken);
      if (closeParenIndex === null) continue;
      const openBraceIndex = findBodyStart(tokens, closeParenIndex);
      if (openBraceIndex === null) continue;

      const startIndex = tokens[i - 1]?.kind === ts.SyntaxKind.AsyncKeyword ? i - 1 : i;
      const next = push(nameTok.text, startIndex, openBraceIndex);
      if (next !== null) i = next;
      continue;
    }

    // foo = async (...) => { ... } / const foo = (...) => { ... }
    if (t.kind === ts.SyntaxKind.Identifier && tokens[i + 1]?.kind === ts.SyntaxKind.EqualsToken) {
      let j = i + 2;
      if (tokens[j]?.kind === ts.SyntaxKind.AsyncKeyword) j += 1;
      if (tokens[j]?.kind !== ts.SyntaxKind.OpenParenToken) continue;

      const closeParenIndex = findMatching(tokens, j, ts.SyntaxKind.OpenParenToken, ts.SyntaxKind.CloseParenToken);
      if (closeParenIndex === null) continue;
      let arrowIndex = closeParenIndex + 1;
      if (tokens[arrowIndex]?.kind === ts.SyntaxKind.ColonToken) {
        while (arrowIndex < tokens.length && tokens[arrowIndex]?.kind !== ts.SyntaxKind.EqualsGreaterThanToken) {
          const k = tokens[arrowIndex]?.kind;
          if (k === ts.SyntaxKind.SemicolonToken || k === ts.SyntaxKind.OpenBraceToken) break;
          arrowIndex += 1;
        }
      }
      if (tokens[arrowIndex]?.kind !== ts.SyntaxKind.EqualsGreaterThanToken) continue;
      const openBraceIndex = arrowIndex + 1;
      if (tokens[openBraceIndex]?.kind !== ts.SyntaxKind.OpenBraceToken) continue;

      const declIndex =
        tokens[i - 1]?.kind === ts.SyntaxKind.ConstKeyword || tokens[i - 1]?.kind === ts.SyntaxKind.LetKeyword ? i - 1 : i;
      const next = push(t.text, declIndex, openBraceIndex);
      if (next !== null) i = next;
      continue;
    }

    // async foo(...) { ... } / public foo(...) { ... } / foo(...) { ... }
    const prev = tokens[i - 1];
    const startsModifiers = isMethodModifier(t.kind) && (!prev || !isMethodModifier(prev.kind));
    const standaloneName =
      (t.kind === ts.SyntaxKind.Identifier || t.kind === ts.SyntaxKind.ConstructorKeyword) &&
      (!prev || !isMethodModifier(prev.kind));
    if (!startsModifiers && !standaloneName) continue;
    // Calls like `.then(...) {` never follow a dot.
    if (prev?.kind === ts.SyntaxKind.DotToken) continue;

    let j = i;
    while (j < tokens.length) {
      const k = tokens[j]?.kind;
      if (k === undefined || !isMethodModifier(k)) break;
      j += 1;
    }
    const nameTok = tokens[j];
    if (!nameTok) continue;
    if (nameTok.kind !== ts.SyntaxKind.Identifier && nameTok.kind !== ts.SyntaxKind.ConstructorKeyword) continue;
    if (tokens[j + 1]?.kind !== ts.SyntaxKind.OpenParenToken) continue;

    const closeParenIndex = findMatching(tokens, j + 1, ts.SyntaxKind.OpenParenToken, ts.SyntaxKind.CloseParenToken);
    if (closeParenIndex === null) continue;
    const openBraceIndex = findBodyStart(tokens, closeParenIndex);
    if (openBraceIndex === null) continue;

    const name = nameTok.kind === ts.SyntaxKind.ConstructorKeyword ? 'constructor' : nameTok.text;
    const next = push(name, i, openBraceIndex);
    if (next !== null) i = next;
  }

  return blocks;
}

export function canOutline(filePath: string): boolean {
  return OUTLINE_EXTENSIONS.has(fileExtension(filePath));
}

/**
 * One `function` node per top-level-looking block, each with a single
 * `code_block` child holding the function's source lines.
 */
export function outlineFile(file: LocalFile, fileNodeId: string, limit = MAX_FUNCTIONS_PER_FILE): FunctionNode[] {
  if (!canOutline(file.path)) return [];

  const ext = fileExtension(file.path);
  const variant = JSX_EXTENSIONS.has(ext) ? ts.LanguageVariant.JSX : ts.LanguageVariant.Standard;
  const sourceFile = ts.createSourceFile(file.path, file.content, ts.ScriptTarget.Latest, false);
  const lines = file.content.split('\n');
  const language = detectLanguage(file.path);

  return scanFunctionBlocks(file.content, sourceFile, variant)
    .slice(0, limit)
    .map((block, index): FunctionNode => {
      const id = `${fileNodeId}-fn-${index}`;
      const code: CodeBlockNode = {
        id: `${id}-code`,
        variant: 'code_block',
        label: `${block.name} source`,
        children: [],
        visualHint: { icon: 'chevron.left.forwardslash.chevron.right', colorHex: '#4ADE80' },
        metadata: {
          code: lines.slice(block.startLine - 1, block.endLine).join('\n'),
          language,
          filePath: file.path,
          lineStart: block.startLine,
          lineEnd: block.endLine,
        },
      };
      return {
        id,
        variant: 'function',
        label: block.name,
        description: `Lines ${block.startLine}-${block.endLine}`,
        children: [code],
        visualHint: { icon: 'function', colorHex: '#FBBF24' },
        metadata: {
          signature: block.signature,
          lineStart: block.startLine,
          lineEnd: block.endLine,
        },
      };
    });
}
