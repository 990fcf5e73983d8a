import { createLexer, type LexerOptions } from './lexer.js';
import { LineKind, type Token, TokenKind } from './token-types.js';
import { tokenKindToString } from './tokens.js';

export interface LexedLine {
  /** 1-based. */
  lineNumber: number;
  kind: LineKind;
  tokens: Token[];
}

/**
 * Line grouping contract for a downstream block parser: the kind of a line
 * follows from its first token, leading indentation aside.
 */
export function classifyLine(tokens: readonly Token[]): LineKind {
  const first = tokens[0]?.kind === TokenKind.WhiteSpace ? tokens[1] : tokens[0];
  if (!first) return LineKind.Unknown;

  switch (first.kind) {
    case TokenKind.BlankLine:
      return LineKind.Blank;
    case TokenKind.TitleMark:
      return LineKind.Title;
    case TokenKind.UnorderedMark:
    case TokenKind.OrderedMark:
      return LineKind.ListItem;
    case TokenKind.QuoteMark:
      return LineKind.Quote;
    case TokenKind.Text:
    case TokenKind.ItalicMark:
    case TokenKind.BoldMark:
    case TokenKind.ItalicBoldMark:
    case TokenKind.CodeMark:
    case TokenKind.Image:
    case TokenKind.Link:
    case TokenKind.QuickLink:
    case TokenKind.RefLink:
    case TokenKind.RefLinkDef:
    case TokenKind.LineBreak:
      return LineKind.Plain;
    default:
      return LineKind.Unknown;
  }
}

/**
 * Lex every line of a document with one lexer.
 * A trailing newline does not start another line, so empty text has no lines.
 */
export function lexDocument(text: string, options?: LexerOptions): LexedLine[] {
  const lexer = createLexer(options);
  const segments = text.split('\n');
  if (segments[segments.length - 1] === '')
    segments.pop();

  return segments.map((segment, index) => {
    const tokens = lexer.lex(segment);
    return { lineNumber: index + 1, kind: classifyLine(tokens), tokens };
  });
}

/**
 * Debug rendering, one document line per text line:
 * `<value, line, Kind> <value, line, Kind> ...`
 */
export function formatLines(lines: readonly LexedLine[]): string {
  return lines
    .map(line => line.tokens
      .map(t => `<${t.value}, ${line.lineNumber}, ${tokenKindToString(t.kind)}>`)
      .join(' '))
    .join('\n');
}
