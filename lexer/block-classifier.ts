import {
  CharacterCodes,
  isDigit,
  isWhiteSpace,
  trimTrailingLineFeeds
} from './character-codes.js';
import { type Token, TokenKind } from './token-types.js';
import { createToken } from './tokens.js';
import type { UnicodeSlicer } from './unicode-slicer.js';

/**
 * Where the classifier stopped. Regular enum so the debug state can report
 * the phase by name.
 */
export enum BlockPhase {
  /** Rest of the line handed to the inline pass. */
  Inline,
  /** Line fully tokenized: blank or dividing. */
  Finished,
}

export interface BlockClassification {
  /** BlankLine, DividingMark, or an optional WhiteSpace followed by an optional mark. */
  tokens: Token[];
  /** Code point offset where the inline pass starts, undefined when the line is done. */
  inlineStart: number | undefined;
  phase: BlockPhase;
}

const MIN_DIVIDING_RUN = 3;
const CODE_FENCE = '```';

/**
 * Recognize the block mark at the start of a line.
 * The line normally ends with `\n`; the end of input is treated the same way.
 */
export function classifyBlock(line: UnicodeSlicer): BlockClassification {
  let begin = 0;
  while (begin < line.length && !isLineEnd(line.codeAt(begin)) && isWhiteSpace(line.codeAt(begin)))
    begin++;

  if (begin === line.length || isLineEnd(line.codeAt(begin))) {
    return {
      tokens: [createToken(line.slice(0, begin), TokenKind.BlankLine)],
      inlineStart: undefined,
      phase: BlockPhase.Finished,
    };
  }

  let end = begin + 1;
  while (end < line.length && !isWhiteSpace(line.codeAt(end)))
    end++;

  return classifyWord(line, begin, end);
}

function isLineEnd(ch: number): boolean {
  return ch === CharacterCodes.lineFeed;
}

function classifyWord(line: UnicodeSlicer, begin: number, end: number): BlockClassification {
  const mark = extractMark(line.slice(begin, end), line);

  if (mark?.kind === TokenKind.DividingMark)
    return { tokens: [mark], inlineStart: undefined, phase: BlockPhase.Finished };

  const tokens: Token[] = [];
  if (begin > 0) tokens.push(createToken(line.slice(0, begin), TokenKind.WhiteSpace));

  if (!mark)
    return { tokens, inlineStart: begin, phase: BlockPhase.Inline };

  tokens.push(mark);
  const inlineStart = mark.kind === TokenKind.CodeBlockMark ?
    begin + CODE_FENCE.length :
    end + 1; // past the delimiter that ended the word
  return { tokens, inlineStart, phase: BlockPhase.Inline };
}

function extractMark(word: string, line: UnicodeSlicer): Token | undefined {
  switch (word.charCodeAt(0)) {
    case CharacterCodes.hash:
      return isTitleMark(word) ? createToken(word, TokenKind.TitleMark) : undefined;

    case CharacterCodes.greaterThan:
      return word.length === 1 ? createToken(word, TokenKind.QuoteMark) : undefined;

    case CharacterCodes.plus:
      return word.length === 1 ? createToken(word, TokenKind.UnorderedMark) : undefined;

    case CharacterCodes.backtick:
      return word.startsWith(CODE_FENCE) ? createToken(CODE_FENCE, TokenKind.CodeBlockMark) : undefined;

    case CharacterCodes.asterisk:
    case CharacterCodes.minus:
      if (isDividingLine(line)) return dividingMark(line);
      return word.length === 1 ? createToken(word, TokenKind.UnorderedMark) : undefined;

    case CharacterCodes.underscore:
      return isDividingLine(line) ? dividingMark(line) : undefined;

    default:
      return isOrderedMark(word) ? createToken(word, TokenKind.OrderedMark) : undefined;
  }
}

function dividingMark(line: UnicodeSlicer): Token {
  return createToken(trimTrailingLineFeeds(line.from(0)), TokenKind.DividingMark);
}

/** `#` to `####` */
function isTitleMark(word: string): boolean {
  if (word.length > 4) return false;
  for (let i = 0; i < word.length; i++) {
    if (word.charCodeAt(i) !== CharacterCodes.hash) return false;
  }
  return true;
}

/** `1.` to `999.`, no leading zero */
function isOrderedMark(word: string): boolean {
  if (word.length < 2 || word.length > 4) return false;
  if (word.charCodeAt(word.length - 1) !== CharacterCodes.dot) return false;

  const first = word.charCodeAt(0);
  if (first < CharacterCodes._1 || first > CharacterCodes._9) return false;

  for (let i = 1; i < word.length - 1; i++) {
    if (!isDigit(word.charCodeAt(i))) return false;
  }
  return true;
}

/**
 * Every non-whitespace character is the same one of `* - _`, at least three of them.
 */
export function isDividingLine(line: UnicodeSlicer): boolean {
  let mark = -1;
  let count = 0;
  for (let ix = 0; ix < line.length; ix++) {
    const ch = line.codeAt(ix);
    if (isWhiteSpace(ch)) continue;

    if (mark < 0) {
      if (ch !== CharacterCodes.asterisk && ch !== CharacterCodes.minus && ch !== CharacterCodes.underscore)
        return false;
      mark = ch;
    } else if (ch !== mark) {
      return false;
    }
    count++;
  }
  return count >= MIN_DIVIDING_RUN;
}
