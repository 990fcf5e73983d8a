import { type LinkDetails, type Token, TokenKind } from './token-types.js';

/**
 * Create a token. Empty attribute values are dropped, and a token whose
 * attributes are all empty gets no details at all.
 */
export function createToken(value: string, kind: TokenKind, details?: LinkDetails): Token {
  const compact = details && compactDetails(details);
  if (compact)
    return { value, kind, details: compact };
  return { value, kind };
}

function compactDetails(details: LinkDetails): LinkDetails | undefined {
  const result: LinkDetails = {};
  let found = false;
  if (details.name) { result.name = details.name; found = true; }
  if (details.location) { result.location = details.location; found = true; }
  if (details.title) { result.title = details.title; found = true; }
  if (details.ptr) { result.ptr = details.ptr; found = true; }
  return found ? result : undefined;
}

export function isGenericLinkKind(kind: TokenKind): boolean {
  return kind === TokenKind.Image ||
    kind === TokenKind.Link ||
    kind === TokenKind.QuickLink ||
    kind === TokenKind.RefLink ||
    kind === TokenKind.RefLinkDef;
}

export function isRawDelimiterKind(kind: TokenKind): boolean {
  return kind === TokenKind.Star ||
    kind === TokenKind.UnderLine ||
    kind === TokenKind.BackTick;
}

/**
 * Read-only view over the attributes of a link-family token.
 */
export interface GenericLink {
  readonly kind: TokenKind;
  readonly name: string | undefined;
  readonly location: string | undefined;
  readonly title: string | undefined;
  readonly ptr: string | undefined;
}

/**
 * Access link attributes. Calling this on a token outside the link family
 * is a programming error and throws.
 */
export function asGenericLink(token: Token): GenericLink {
  if (!isGenericLinkKind(token.kind))
    throw new Error(`Lexer: token is not a generic link (${tokenKindToString(token.kind)} ${JSON.stringify(token.value)})`);

  const details = token.details;
  return {
    kind: token.kind,
    name: details?.name,
    location: details?.location,
    title: details?.title,
    ptr: details?.ptr,
  };
}

export function tokenKindToString(kind: TokenKind): string {
  return TokenKind[kind] ?? 'TokenKind:0x' + kind.toString(16).toUpperCase();
}

/**
 * Debug rendering: `<value, Kind> <value, Kind> ...`
 */
export function formatTokens(tokens: readonly Token[]): string {
  return tokens.map(t => `<${t.value}, ${tokenKindToString(t.kind)}>`).join(' ');
}
