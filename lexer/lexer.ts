import { BlockPhase, classifyBlock } from './block-classifier.js';
import { resolveDelimiters } from './delimiter-resolver.js';
import { hasLineBreak, scanInline } from './inline-automaton.js';
import { createLinkValidator, type LinkValidator } from './link-validators.js';
import type { Token } from './token-types.js';
import { formatTokens } from './tokens.js';
import { createUnicodeSlicer } from './unicode-slicer.js';

export interface LexerOptions {
  /** Replace the URL and/or email check used for `<...>` autolinks. */
  validator?: Partial<LinkValidator>;
  /** Trace every line to the console. Also switched on by LEX_DEBUG. */
  debug?: boolean;
}

export interface Lexer {
  /** Tokenize one line; a trailing `\n` is optional. */
  lex(line: string): Token[];

  /** Fill a caller-owned object with the state of the last lex() call. */
  fillDebugState(state: LexerDebugState): void;
}

export interface LexerDebugState {
  /** Where the block classifier stopped: 'Inline' or 'Finished'. */
  phase: string;

  /** Code point offset of the inline pass, -1 when it did not run. */
  inlineStart: number;

  /** Code point length of the last line, trailing newline included. */
  lineLength: number;

  /** Tokens returned by the last call. */
  tokenCount: number;

  /** Whether a LineBreak token was appended. */
  lineBreak: boolean;
}

const LINE_END = '\n';

export function createLexer(options?: LexerOptions): Lexer {
  const validator = createLinkValidator(options?.validator);
  const LEX_DEBUG = !!options?.debug ||
    (typeof process !== 'undefined' && !!process.env.LEX_DEBUG);

  let phase = BlockPhase.Inline;
  let inlineStart = -1;
  let lineLength = 0;
  let tokenCount = 0;
  let lineBreak = false;

  function lex(line: string): Token[] {
    const newline = line.indexOf(LINE_END);
    if (newline >= 0 && newline !== line.length - 1)
      throw new Error('Lexer: input must be a single line, found a line feed at offset ' + newline);

    const source = newline < 0 ? line + LINE_END : line;
    const slicer = createUnicodeSlicer(source);

    const block = classifyBlock(slicer);
    phase = block.phase;
    inlineStart = block.inlineStart ?? -1;
    lineLength = slicer.length;
    if (LEX_DEBUG) console.log('[LEX] classifyBlock', { phase: BlockPhase[phase], inlineStart, tokens: formatTokens(block.tokens) });

    const tokens = block.tokens;
    lineBreak = false;

    if (block.inlineStart !== undefined) {
      const inline = slicer.from(block.inlineStart);
      const scanned = scanInline(inline, validator);
      if (LEX_DEBUG) console.log('[LEX] scanInline', { inline, tokens: formatTokens(scanned) });

      resolveDelimiters(scanned);
      lineBreak = hasLineBreak(inline);
      for (const token of scanned) {
        if (token.value) tokens.push(token);
      }
    }

    tokenCount = tokens.length;
    if (LEX_DEBUG) console.log('[LEX] result', { tokenCount, lineBreak, tokens: formatTokens(tokens) });
    return tokens;
  }

  function fillDebugState(state: LexerDebugState): void {
    state.phase = BlockPhase[phase];
    state.inlineStart = inlineStart;
    state.lineLength = lineLength;
    state.tokenCount = tokenCount;
    state.lineBreak = lineBreak;
  }

  return {
    lex,
    fillDebugState,
  };
}

/**
 * One-shot helper: tokenize a single line with a fresh lexer.
 */
export function lexLine(line: string, options?: LexerOptions): Token[] {
  return createLexer(options).lex(line);
}
