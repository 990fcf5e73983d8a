import { type Token, TokenKind } from './token-types.js';
import { createToken, isRawDelimiterKind } from './tokens.js';

/** Runs this long or longer never open an emphasis or code span. */
const MAX_OPENING_RUN = 4;

/**
 * Tidy pass: rewrite raw Star/UnderLine/BackTick tokens into Italic/Bold/
 * ItalicBold/Code marks, or into Text when they find no partner.
 * Mutates the array in place.
 */
export function resolveDelimiters(tokens: Token[]): void {
  normalizeRuns(tokens, TokenKind.Star);
  normalizeRuns(tokens, TokenKind.UnderLine);
  matchDelimiters(tokens);
}

/**
 * Split a run that is longer than the run before it, so that `**` followed
 * by `****` is read as `**` + `**` + `**`.
 */
export function normalizeRuns(tokens: Token[], kind: TokenKind): void {
  // [token index, split length] in ascending index order
  const splits: [number, number][] = [];

  let previous = 0;
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token.kind !== kind) continue;

    const length = token.value.length;
    if (previous === 0 || length < previous) {
      previous = length;
      continue;
    }

    const rest = length - previous;
    if (rest > 0) {
      splits.push([i, previous]);
      previous = rest;
    } else {
      previous = 0;
    }
  }

  // Descending, so that inserting after index i leaves smaller indices valid
  for (let s = splits.length - 1; s >= 0; s--) {
    const [index, at] = splits[s];
    const value = tokens[index].value;
    tokens.splice(index, 1,
      createToken(value.slice(0, at), kind),
      createToken(value.slice(at), kind));
  }
}

/**
 * Pair delimiters through a stack of token indices. A token pairs with the
 * nearest pending token of the same kind and identical run; pending tokens
 * stacked above that partner are demoted to Text.
 */
export function matchDelimiters(tokens: Token[]): void {
  const pending: number[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!isRawDelimiterKind(token.kind)) continue;

    const partner = findPartner(tokens, pending, token);
    if (partner >= 0) {
      const opener = tokens[pending[partner]];
      const kind = resolvedKind(token);
      opener.kind = kind;
      token.kind = kind;

      const unmatched = pending.splice(partner).slice(1);
      for (const index of unmatched)
        tokens[index].kind = TokenKind.Text;
    } else if (token.value.length < MAX_OPENING_RUN) {
      pending.push(i);
    } else {
      token.kind = TokenKind.Text;
    }
  }

  for (const index of pending)
    tokens[index].kind = TokenKind.Text;
}

function findPartner(tokens: readonly Token[], pending: readonly number[], token: Token): number {
  for (let s = pending.length - 1; s >= 0; s--) {
    const candidate = tokens[pending[s]];
    if (candidate.kind === token.kind && candidate.value === token.value)
      return s;
  }
  return -1;
}

function resolvedKind(token: Token): TokenKind {
  if (token.kind === TokenKind.BackTick) return TokenKind.CodeMark;

  switch (token.value.length) {
    case 1: return TokenKind.ItalicMark;
    case 2: return TokenKind.BoldMark;
    default: return TokenKind.ItalicBoldMark;
  }
}
