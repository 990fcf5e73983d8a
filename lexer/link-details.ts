import { type LinkDetails, type Token, TokenKind } from './token-types.js';
import { createToken } from './tokens.js';

const DOUBLE_QUOTED = /^"(?:[^"\\]|\\.)*"$/;
const SINGLE_QUOTED = /^'(?:[^'\\]|\\.)*'$/;
const BLANK_RUN = /[ \t]+/;

export type GenericLinkKind =
  | TokenKind.Image
  | TokenKind.Link
  | TokenKind.QuickLink
  | TokenKind.RefLink
  | TokenKind.RefLinkDef;

/**
 * Build a link-family token from its matched parts.
 *
 * @param value literal matched span, stored as the token value
 * @param name text between the first pair of brackets (the tag for RefLinkDef)
 * @param clause what follows the brackets: `location "title"`, a reference
 * tag, or the validated autolink target
 *
 * A clause with a second field that is not a quoted string makes the whole
 * span plain Text.
 */
export function extractLinkDetails(value: string, name: string, clause: string, kind: GenericLinkKind): Token {
  const trimmed = clause.trim();

  switch (kind) {
    case TokenKind.RefLink:
      return createToken(value, kind, { name, ptr: trimmed });

    case TokenKind.QuickLink:
      return createToken(value, kind, { name, location: trimmed });

    default: {
      const target = splitTarget(trimmed);
      if (!target) return createToken(value, TokenKind.Text);

      const details: LinkDetails = kind === TokenKind.RefLinkDef ?
        { ptr: name, location: target.location, title: target.title } :
        { name, location: target.location, title: target.title };
      return createToken(value, kind, details);
    }
  }
}

function splitTarget(clause: string): { location: string, title: string } | undefined {
  const blank = BLANK_RUN.exec(clause);
  if (!blank) return { location: clause, title: '' };

  const location = clause.slice(0, blank.index);
  const quoted = clause.slice(blank.index + blank[0].length);
  if (!isQuotedString(quoted)) return undefined;

  return { location, title: quoted.slice(1, -1) };
}

export function isQuotedString(text: string): boolean {
  return DOUBLE_QUOTED.test(text) || SINGLE_QUOTED.test(text);
}
