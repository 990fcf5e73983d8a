export { createLexer, lexLine } from './lexer.js';
export type { Lexer, LexerDebugState, LexerOptions } from './lexer.js';

export { classifyLine, formatLines, lexDocument } from './document.js';
export type { LexedLine } from './document.js';

export { LineKind, TokenKind } from './token-types.js';
export type { LinkDetails, Token } from './token-types.js';

export { asGenericLink, formatTokens, tokenKindToString } from './tokens.js';
export type { GenericLink } from './tokens.js';

export {
  createLinkValidator,
  defaultLinkValidator,
  isAbsoluteUrl,
  isEmailAddress
} from './link-validators.js';
export type { LinkValidator } from './link-validators.js';
