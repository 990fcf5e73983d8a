/**
 * Code points the lexer looks at, and the character classes built on them.
 * All checks take a code point as returned by UnicodeSlicer.codeAt.
 */

export const enum CharacterCodes {
  tab = 0x09,
  lineFeed = 0x0A,
  carriageReturn = 0x0D,
  space = 0x20,

  exclamation = 0x21,           // !
  hash = 0x23,                  // #
  dollar = 0x24,                // $
  percent = 0x25,               // %
  ampersand = 0x26,             // &
  singleQuote = 0x27,           // '
  openParen = 0x28,             // (
  closeParen = 0x29,            // )
  asterisk = 0x2A,              // *
  plus = 0x2B,                  // +
  minus = 0x2D,                 // -
  dot = 0x2E,                   // .
  slash = 0x2F,                 // /
  _0 = 0x30,
  _1 = 0x31,
  _9 = 0x39,
  colon = 0x3A,                 // :
  lessThan = 0x3C,              // <
  equals = 0x3D,                // =
  greaterThan = 0x3E,           // >
  question = 0x3F,              // ?
  A = 0x41,
  Z = 0x5A,
  openBracket = 0x5B,           // [
  backslash = 0x5C,             // \
  closeBracket = 0x5D,          // ]
  caret = 0x5E,                 // ^
  underscore = 0x5F,            // _
  backtick = 0x60,              // `
  a = 0x61,
  z = 0x7A,
  openBrace = 0x7B,             // {
  bar = 0x7C,                   // |
  closeBrace = 0x7D,            // }
  tilde = 0x7E,                 // ~
  maxAsciiCharacter = 0x7F,

  // White_Space outside ASCII
  nextLine = 0x85,
  nonBreakingSpace = 0xA0,
  ogham = 0x1680,
  enQuad = 0x2000,
  hairSpace = 0x200A,
  lineSeparator = 0x2028,
  paragraphSeparator = 0x2029,
  narrowNoBreakSpace = 0x202F,
  mathematicalSpace = 0x205F,
  ideographicSpace = 0x3000,
}

/**
 * Unicode White_Space, line terminators included.
 */
export function isWhiteSpace(ch: number): boolean {
  if (ch >= CharacterCodes.tab && ch <= CharacterCodes.carriageReturn) return true;
  if (ch >= CharacterCodes.enQuad && ch <= CharacterCodes.hairSpace) return true;

  switch (ch) {
    case CharacterCodes.space:
    case CharacterCodes.nextLine:
    case CharacterCodes.nonBreakingSpace:
    case CharacterCodes.ogham:
    case CharacterCodes.lineSeparator:
    case CharacterCodes.paragraphSeparator:
    case CharacterCodes.narrowNoBreakSpace:
    case CharacterCodes.mathematicalSpace:
    case CharacterCodes.ideographicSpace:
      return true;
    default:
      return false;
  }
}

export function isDigit(ch: number): boolean {
  return ch >= CharacterCodes._0 && ch <= CharacterCodes._9;
}

/** ASCII letter or digit. */
export function isAlphaNumeric(ch: number): boolean {
  return isDigit(ch) ||
    (ch >= CharacterCodes.A && ch <= CharacterCodes.Z) ||
    (ch >= CharacterCodes.a && ch <= CharacterCodes.z);
}

/**
 * Characters a backslash turns into literal text: : * _ ` # + - . ! [ ] ( ) < > \
 */
export function isEscapable(ch: number): boolean {
  switch (ch) {
    case CharacterCodes.colon:
    case CharacterCodes.asterisk:
    case CharacterCodes.underscore:
    case CharacterCodes.backtick:
    case CharacterCodes.hash:
    case CharacterCodes.plus:
    case CharacterCodes.minus:
    case CharacterCodes.dot:
    case CharacterCodes.exclamation:
    case CharacterCodes.openBracket:
    case CharacterCodes.closeBracket:
    case CharacterCodes.openParen:
    case CharacterCodes.closeParen:
    case CharacterCodes.lessThan:
    case CharacterCodes.greaterThan:
    case CharacterCodes.backslash:
      return true;
    default:
      return false;
  }
}

/** Opens or closes emphasis (`*`, `_`) or a code span (`` ` ``). */
export function isDelimiterCharacter(ch: number): boolean {
  return ch === CharacterCodes.asterisk ||
    ch === CharacterCodes.underscore ||
    ch === CharacterCodes.backtick;
}

/**
 * atext of an unquoted email local part; anything outside ASCII is let through.
 */
export function isEmailAtomCharacter(ch: number): boolean {
  if (isAlphaNumeric(ch) || ch > CharacterCodes.maxAsciiCharacter) return true;

  switch (ch) {
    case CharacterCodes.exclamation:
    case CharacterCodes.hash:
    case CharacterCodes.dollar:
    case CharacterCodes.percent:
    case CharacterCodes.ampersand:
    case CharacterCodes.singleQuote:
    case CharacterCodes.asterisk:
    case CharacterCodes.plus:
    case CharacterCodes.minus:
    case CharacterCodes.slash:
    case CharacterCodes.equals:
    case CharacterCodes.question:
    case CharacterCodes.caret:
    case CharacterCodes.underscore:
    case CharacterCodes.backtick:
    case CharacterCodes.openBrace:
    case CharacterCodes.bar:
    case CharacterCodes.closeBrace:
    case CharacterCodes.tilde:
      return true;
    default:
      return false;
  }
}

/** Letter, digit or hyphen of a hostname label; non-ASCII for IDNs. */
export function isDomainLabelCharacter(ch: number): boolean {
  return isAlphaNumeric(ch) ||
    ch === CharacterCodes.minus ||
    ch > CharacterCodes.maxAsciiCharacter;
}

/**
 * Remove every trailing \n
 */
export function trimTrailingLineFeeds(text: string): string {
  let end = text.length;
  while (end > 0 && text.charCodeAt(end - 1) === CharacterCodes.lineFeed) end--;
  return text.slice(0, end);
}
