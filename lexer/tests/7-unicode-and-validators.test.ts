import { describe, expect, test } from 'vitest';

import {
  CharacterCodes,
  isDomainLabelCharacter,
  isEmailAtomCharacter,
  isEscapable,
  isWhiteSpace,
  trimTrailingLineFeeds
} from '../character-codes.js';
import { createLinkValidator, isAbsoluteUrl, isEmailAddress } from '../link-validators.js';
import { TokenKind } from '../token-types.js';
import { tokenKindToString } from '../tokens.js';
import { createUnicodeSlicer } from '../unicode-slicer.js';

describe('Unicode slicer', () => {
  const slicer = createUnicodeSlicer('a😀b');

  test('counts code points', () => {
    expect(slicer.length).toBe(3);
  });

  test('reads characters by code point index', () => {
    expect(slicer.charAt(1)).toBe('😀');
    expect(slicer.codeAt(1)).toBe(0x1F600);
    expect(slicer.charAt(2)).toBe('b');
  });

  test('slices by code point index', () => {
    expect(slicer.slice(1, 3)).toBe('😀b');
    expect(slicer.from(2)).toBe('b');
    expect(slicer.slice(0, 10)).toBe('a😀b');
  });

  test('out of range', () => {
    expect(slicer.charAt(5)).toBe('');
    expect(slicer.codeAt(-1)).toBe(-1);
    expect(slicer.slice(2, 1)).toBe('');
    expect(slicer.from(7)).toBe('');
  });

  test('empty string', () => {
    const empty = createUnicodeSlicer('');
    expect(empty.length).toBe(0);
    expect(empty.from(0)).toBe('');
  });
});

describe('Character classes', () => {
  test('escapable set', () => {
    expect(isEscapable(CharacterCodes.asterisk)).toBe(true);
    expect(isEscapable(CharacterCodes.backslash)).toBe(true);
    expect(isEscapable(CharacterCodes.colon)).toBe(true);
    expect(isEscapable(CharacterCodes.tilde)).toBe(false);
    expect(isEscapable(CharacterCodes.a)).toBe(false);
  });

  test('unicode whitespace', () => {
    expect(isWhiteSpace(CharacterCodes.ideographicSpace)).toBe(true);
    expect(isWhiteSpace(CharacterCodes.nonBreakingSpace)).toBe(true);
    expect(isWhiteSpace(CharacterCodes.lineFeed)).toBe(true);
    expect(isWhiteSpace(CharacterCodes.underscore)).toBe(false);
  });

  test('whitespace ranges', () => {
    expect(isWhiteSpace(CharacterCodes.tab)).toBe(true);
    expect(isWhiteSpace(CharacterCodes.carriageReturn)).toBe(true);
    expect(isWhiteSpace(0x2009)).toBe(true); // thin space
    expect(isWhiteSpace(0x200B)).toBe(false); // zero width space
    expect(isWhiteSpace(0x08)).toBe(false);
  });

  test('email atom and domain label characters', () => {
    expect(isEmailAtomCharacter(CharacterCodes.plus)).toBe(true);
    expect(isEmailAtomCharacter(CharacterCodes.dot)).toBe(false);
    expect(isEmailAtomCharacter(0xE9)).toBe(true);
    expect(isDomainLabelCharacter(CharacterCodes.minus)).toBe(true);
    expect(isDomainLabelCharacter(CharacterCodes.underscore)).toBe(false);
  });

  test('trimTrailingLineFeeds', () => {
    expect(trimTrailingLineFeeds('a\n\n')).toBe('a');
    expect(trimTrailingLineFeeds('a \n')).toBe('a ');
  });

  test('kind names', () => {
    expect(tokenKindToString(TokenKind.RefLinkDef)).toBe('RefLinkDef');
    expect(tokenKindToString(TokenKind.Text)).toBe('Text');
  });
});

describe('Link validators', () => {
  test('email addresses', () => {
    expect(isEmailAddress('user@example.com')).toBe(true);
    expect(isEmailAddress('first.last+tag@sub.example.org')).toBe(true);
    expect(isEmailAddress('user@localhost')).toBe(true);
  });

  test('malformed email addresses', () => {
    expect(isEmailAddress('.user@example.com')).toBe(false);
    expect(isEmailAddress('user..x@example.com')).toBe(false);
    expect(isEmailAddress('user.@example.com')).toBe(false);
    expect(isEmailAddress('user@')).toBe(false);
    expect(isEmailAddress('@example.com')).toBe(false);
    expect(isEmailAddress('user@-bad.com')).toBe(false);
    expect(isEmailAddress('user@example..com')).toBe(false);
    expect(isEmailAddress('two words@example.com')).toBe(false);
    expect(isEmailAddress('a'.repeat(65) + '@example.com')).toBe(false);
  });

  test('absolute URLs', () => {
    expect(isAbsoluteUrl('https://example.com')).toBe(true);
    expect(isAbsoluteUrl('mailto:user@example.com')).toBe(true);
    expect(isAbsoluteUrl('example.com')).toBe(false);
    expect(isAbsoluteUrl('/relative/path')).toBe(false);
  });

  test('overrides merge with the defaults', () => {
    const validator = createLinkValidator({ isEmail: () => false });
    expect(validator.isEmail('user@example.com')).toBe(false);
    expect(validator.isUrl('https://example.com')).toBe(true);
  });
});
