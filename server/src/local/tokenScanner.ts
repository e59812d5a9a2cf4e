import ts from 'typescript';

export type Token = {
  kind: ts.SyntaxKind;
  text: string;
  pos: number;
};

// After these a `/` divides; anywhere else it starts a regular expression.
const OPERAND_END = new Set<ts.SyntaxKind>([
  ts.SyntaxKind.Identifier,
  ts.SyntaxKind.NumericLiteral,
  ts.SyntaxKind.BigIntLiteral,
  ts.SyntaxKind.StringLiteral,
  ts.SyntaxKind.NoSubstitutionTemplateLiteral,
  ts.SyntaxKind.TemplateTail,
  ts.SyntaxKind.RegularExpressionLiteral,
  ts.SyntaxKind.CloseParenToken,
  ts.SyntaxKind.CloseBracketToken,
  ts.SyntaxKind.CloseBraceToken,
  ts.SyntaxKind.ThisKeyword,
  ts.SyntaxKind.SuperKeyword,
  ts.SyntaxKind.TrueKeyword,
  ts.SyntaxKind.FalseKeyword,
  ts.SyntaxKind.NullKeyword,
  ts.SyntaxKind.PlusPlusToken,
  ts.SyntaxKind.MinusMinusToken,
]);

/**
 * Flat token list without trivia. Template literal parts and regular
 * expressions are rescanned so braces inside them never count as blocks.
 */
export function scanTokens(text: string, variant: ts.LanguageVariant = ts.LanguageVariant.Standard): Token[] {
  const scanner = ts.createScanner(ts.ScriptTarget.Latest, true, variant, text);
  const tokens: Token[] = [];
  const templateDepths: number[] = [];
  let braceDepth = 0;

  let kind = scanner.scan();
  while (kind !== ts.SyntaxKind.EndOfFileToken) {
    const prev = tokens[tokens.length - 1];

    if (kind === ts.SyntaxKind.CloseBraceToken && templateDepths[templateDepths.length - 1] === braceDepth) {
      kind = scanner.reScanTemplateToken(false);
      if (kind === ts.SyntaxKind.TemplateTail) templateDepths.pop();
    } else if (
      (kind === ts.SyntaxKind.SlashToken || kind === ts.SyntaxKind.SlashEqualsToken) &&
      (!prev || !OPERAND_END.has(prev.kind))
    ) {
      kind = scanner.reScanSlashToken();
    } else if (kind === ts.SyntaxKind.OpenBraceToken) {
      braceDepth += 1;
    } else if (kind === ts.SyntaxKind.CloseBraceToken) {
      braceDepth -= 1;
    }

    if (kind === ts.SyntaxKind.TemplateHead) templateDepths.push(braceDepth);

    tokens.push({
      kind,
      text: scanner.getTokenText(),
      pos: scanner.getTokenStart(),
    });
    kind = scanner.scan();
  }

  return tokens;
}
