import {
  CharacterCodes,
  isDelimiterCharacter,
  isEscapable,
  isWhiteSpace,
  trimTrailingLineFeeds
} from './character-codes.js';
import { extractLinkDetails } from './link-details.js';
import type { LinkValidator } from './link-validators.js';
import { type Token, TokenKind } from './token-types.js';
import { createToken } from './tokens.js';
import { createUnicodeSlicer } from './unicode-slicer.js';

/** Automaton phase. Offsets in the payloads are code point indices. */
const enum InlinePhase {
  Normal,
  /** Next character was escaped by a backslash. */
  Skip,
  /** Inside a run of identical delimiters. */
  Continuous,
  /** Seen `!`. */
  ImageOpen,
  /** Seen `![`. */
  ImageNameOpen,
  /** Seen `[`. */
  LinkNameOpen,
  /** Seen `[...]`, optionally preceded by `!`. */
  NameClosed,
  /** Seen `[...][`. */
  RefLinkOpen,
  /** Seen `[...]:`. */
  RefLinkDefOpen,
  /** Seen `[...](` or `![...](`. */
  LocationOpen,
  /** Seen `<`. */
  AutolinkOpen,
  Terminal,
}

type InlineState =
  | { phase: InlinePhase.Normal }
  | { phase: InlinePhase.Skip }
  | { phase: InlinePhase.Continuous, start: number }
  | { phase: InlinePhase.ImageOpen, bang: number }
  | { phase: InlinePhase.ImageNameOpen, bang: number, open: number }
  | { phase: InlinePhase.LinkNameOpen, open: number }
  | { phase: InlinePhase.NameClosed, bang: number | undefined, open: number, close: number }
  | { phase: InlinePhase.RefLinkOpen, open: number, close: number, tagOpen: number }
  | { phase: InlinePhase.RefLinkDefOpen, open: number, close: number, colon: number }
  | { phase: InlinePhase.LocationOpen, bang: number | undefined, open: number, close: number, paren: number }
  | { phase: InlinePhase.AutolinkOpen, angle: number }
  | { phase: InlinePhase.Terminal };

const NORMAL: InlineState = { phase: InlinePhase.Normal };
const SKIP: InlineState = { phase: InlinePhase.Skip };
const TERMINAL: InlineState = { phase: InlinePhase.Terminal };

const LINE_BREAK_MARKER = '<br>';

/**
 * Walk the inline part of a line and produce the raw token list: Text spans,
 * raw delimiter runs (Star/UnderLine/BackTick, not yet paired), link-family
 * tokens and an optional trailing LineBreak.
 *
 * Single pass, no backtracking: a construct that fails to close simply
 * leaves its characters in the pending text span.
 */
export function scanInline(content: string, validator: LinkValidator): Token[] {
  const text = createUnicodeSlicer(content);
  const tokens: Token[] = [];

  // start of the pending text span
  let last = 0;
  let state: InlineState = NORMAL;

  function flushText(end: number): void {
    const span = text.slice(last, end);
    if (span) tokens.push(createToken(span, TokenKind.Text));
  }

  function isLinkTarget(candidate: string): boolean {
    return validator.isUrl(candidate) || validator.isEmail(candidate);
  }

  for (let ix = 0; ix < text.length; ix++) {
    const ch = text.codeAt(ix);
    const next = text.codeAt(ix + 1);

    if (ch === CharacterCodes.lineFeed) {
      const span = trimLineEnd(text.slice(last, ix));
      if (span) tokens.push(createToken(span, TokenKind.Text));
      break;
    }

    // escaped character, a second backslash included, stays in the text
    if (state.phase === InlinePhase.Skip) {
      state = NORMAL;
      continue;
    }

    if (ch === CharacterCodes.backslash) {
      if (isEscapable(next)) {
        flushText(ix);
        last = ix + 1; // the backslash itself is dropped
        state = SKIP;
      }
      continue;
    }

    switch (state.phase) {
      case InlinePhase.Normal:
        if (isDelimiterCharacter(ch)) {
          flushText(ix);
          last = ix;
          if (next === ch) {
            state = { phase: InlinePhase.Continuous, start: ix };
          } else {
            tokens.push(createToken(text.charAt(ix), delimiterKind(ch)));
            last = ix + 1;
          }
        } else if (ch === CharacterCodes.exclamation) {
          state = { phase: InlinePhase.ImageOpen, bang: ix };
        } else if (ch === CharacterCodes.openBracket) {
          state = { phase: InlinePhase.LinkNameOpen, open: ix };
        } else if (ch === CharacterCodes.lessThan) {
          state = { phase: InlinePhase.AutolinkOpen, angle: ix };
        }
        break;

      case InlinePhase.Continuous:
        if (next !== ch) {
          tokens.push(createToken(text.slice(state.start, ix + 1), delimiterKind(ch)));
          last = ix + 1;
          state = NORMAL;
        }
        break;

      case InlinePhase.ImageOpen:
        if (ch === CharacterCodes.openBracket)
          state = { phase: InlinePhase.ImageNameOpen, bang: state.bang, open: ix };
        else if (ch === CharacterCodes.exclamation)
          state = { phase: InlinePhase.ImageOpen, bang: ix };
        else
          state = NORMAL;
        break;

      case InlinePhase.ImageNameOpen:
        if (ch === CharacterCodes.closeBracket)
          state = { phase: InlinePhase.NameClosed, bang: state.bang, open: state.open, close: ix };
        break;

      case InlinePhase.LinkNameOpen:
        if (ch === CharacterCodes.closeBracket)
          state = { phase: InlinePhase.NameClosed, bang: undefined, open: state.open, close: ix };
        else if (ch === CharacterCodes.openBracket)
          state = { phase: InlinePhase.LinkNameOpen, open: ix };
        break;

      case InlinePhase.NameClosed:
        switch (ch) {
          case CharacterCodes.openParen:
            state = { phase: InlinePhase.LocationOpen, bang: state.bang, open: state.open, close: state.close, paren: ix };
            break;
          case CharacterCodes.closeBracket:
            state = { phase: InlinePhase.NameClosed, bang: state.bang, open: state.open, close: ix };
            break;
          case CharacterCodes.openBracket:
            state = { phase: InlinePhase.RefLinkOpen, open: state.open, close: state.close, tagOpen: ix };
            break;
          case CharacterCodes.colon:
            state = { phase: InlinePhase.RefLinkDefOpen, open: state.open, close: state.close, colon: ix };
            break;
          default:
            state = NORMAL;
        }
        break;

      case InlinePhase.RefLinkOpen:
        if (ch === CharacterCodes.closeBracket) {
          flushText(state.open);
          tokens.push(extractLinkDetails(
            text.slice(state.open, ix + 1),
            text.slice(state.open + 1, state.close),
            text.slice(state.tagOpen + 1, ix),
            TokenKind.RefLink));
          last = ix + 1;
          state = NORMAL;
        }
        break;

      case InlinePhase.RefLinkDefOpen:
        // a definition owns the rest of the line
        flushText(state.open);
        tokens.push(extractLinkDetails(
          trimTrailingLineFeeds(text.from(state.open)),
          text.slice(state.open + 1, state.close),
          trimTrailingLineFeeds(text.from(state.colon + 1)),
          TokenKind.RefLinkDef));
        state = TERMINAL;
        break;

      case InlinePhase.LocationOpen:
        if (ch === CharacterCodes.closeParen) {
          const begin = state.bang ?? state.open;
          flushText(begin);
          tokens.push(extractLinkDetails(
            text.slice(begin, ix + 1),
            text.slice(state.open + 1, state.close),
            text.slice(state.paren + 1, ix),
            state.bang === undefined ? TokenKind.Link : TokenKind.Image));
          last = ix + 1;
          state = NORMAL;
        }
        break;

      case InlinePhase.AutolinkOpen:
        if (isWhiteSpace(ch)) {
          const candidate = text.slice(state.angle + 1, ix).trim();
          if (candidate && !isLinkTarget(candidate))
            state = NORMAL;
        } else if (ch === CharacterCodes.greaterThan) {
          const candidate = text.slice(state.angle + 1, ix).trim();
          if (isLinkTarget(candidate)) {
            flushText(state.angle);
            tokens.push(extractLinkDetails(
              text.slice(state.angle, ix + 1),
              candidate,
              candidate,
              TokenKind.QuickLink));
            last = ix + 1;
          }
          state = NORMAL;
        }
        break;
    }

    if (state.phase === InlinePhase.Terminal) break;
  }

  if (hasLineBreak(content))
    tokens.push(createToken(LINE_BREAK_MARKER, TokenKind.LineBreak));

  return tokens;
}

function delimiterKind(ch: number): TokenKind {
  switch (ch) {
    case CharacterCodes.asterisk: return TokenKind.Star;
    case CharacterCodes.underscore: return TokenKind.UnderLine;
    default: return TokenKind.BackTick;
  }
}

/** Drop trailing whitespace, then every trailing `<br>`. */
function trimLineEnd(span: string): string {
  let result = span.trimEnd();
  while (result.endsWith(LINE_BREAK_MARKER))
    result = result.slice(0, -LINE_BREAK_MARKER.length);
  return result;
}

/** Two trailing spaces before the newline, or a trailing `<br>`. */
export function hasLineBreak(content: string): boolean {
  return content.endsWith('  \n') || content.trimEnd().endsWith(LINE_BREAK_MARKER);
}
