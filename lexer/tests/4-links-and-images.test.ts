import { describe, expect, test } from 'vitest';

import { lexLine } from '../lexer.js';
import { extractLinkDetails, isQuotedString } from '../link-details.js';
import { TokenKind } from '../token-types.js';
import { asGenericLink, createToken } from '../tokens.js';
import { lexTokensStrings } from './lex-utils.js';

describe('Links and images', () => {
  describe('images', () => {
    test('empty image has no details', () => {
      expect(lexLine('![]()')).toEqual([{ value: '![]()', kind: TokenKind.Image }]);
    });

    test('name, location and title', () => {
      expect(lexLine('![alt](img.png "Title")')).toEqual([{
        value: '![alt](img.png "Title")',
        kind: TokenKind.Image,
        details: { name: 'alt', location: 'img.png', title: 'Title' },
      }]);
    });

    test('nested brackets belong to the name', () => {
      const [image] = lexLine('![[[[[[]()');
      expect(image.kind).toBe(TokenKind.Image);
      expect(image.details).toEqual({ name: '[[[[[' });
    });

    test('image inside an image name', () => {
      const [image] = lexLine('![![]]()');
      expect(image.kind).toBe(TokenKind.Image);
      expect(image.details).toEqual({ name: '![]' });
    });
  });

  describe('links', () => {
    test('location only', () => {
      expect(lexLine('[text](https://example.com)')).toEqual([{
        value: '[text](https://example.com)',
        kind: TokenKind.Link,
        details: { name: 'text', location: 'https://example.com' },
      }]);
    });

    test('surrounding text', () => {
      expect(lexTokensStrings('see [docs](a.md) now')).toEqual([
        'Text "see "',
        'Link "[docs](a.md)"',
        'Text " now"',
      ]);
    });

    test('closing brackets move the end of the name', () => {
      expect(lexLine('[]]]]()')[0].details).toEqual({ name: ']]]' });
      expect(lexLine('[!]]()')[0].details).toEqual({ name: '!]' });
    });

    test('a second opening bracket restarts the name', () => {
      const tokens = lexLine('[a[b](c)');
      expect(tokens).toEqual([
        { value: '[a', kind: TokenKind.Text },
        { value: '[b](c)', kind: TokenKind.Link, details: { name: 'b', location: 'c' } },
      ]);
    });

    test('single-quoted title', () => {
      expect(lexLine("[x](a.md 'single')")[0].details).toEqual({ name: 'x', location: 'a.md', title: 'single' });
    });

    test('unquoted title turns the link into text', () => {
      expect(lexTokensStrings('a [x](y z)')).toEqual(['Text "a "', 'Text "[x](y z)"']);
    });

    test('half-quoted title turns the link into text', () => {
      expect(lexTokensStrings('[x](a.md "half)')).toEqual(['Text "[x](a.md \\"half)"']);
    });

    test('space between name and location', () => {
      expect(lexTokensStrings('[a] (b)')).toEqual(['Text "[a] (b)"']);
    });

    test('unclosed location', () => {
      expect(lexTokensStrings('[a](b')).toEqual(['Text "[a](b"']);
    });
  });

  describe('asGenericLink', () => {
    test('reads link attributes', () => {
      const link = asGenericLink(lexLine('[n](l "t")')[0]);
      expect(link).toEqual({ kind: TokenKind.Link, name: 'n', location: 'l', title: 't', ptr: undefined });
    });

    test('rejects tokens outside the link family', () => {
      expect(() => asGenericLink(createToken('x', TokenKind.Text)))
        .toThrow('Lexer: token is not a generic link (Text "x")');
    });
  });

  describe('extractLinkDetails', () => {
    test('definition clause is trimmed and split', () => {
      expect(extractLinkDetails('[t]: u "T"', 't', '  u  "T" ', TokenKind.RefLinkDef)).toEqual({
        value: '[t]: u "T"',
        kind: TokenKind.RefLinkDef,
        details: { ptr: 't', location: 'u', title: 'T' },
      });
    });

    test('empty attributes are not stored', () => {
      expect(extractLinkDetails('[]()', '', '', TokenKind.Link)).toEqual({ value: '[]()', kind: TokenKind.Link });
    });

    test('quoted strings', () => {
      expect(isQuotedString('"a\\"b"')).toBe(true);
      expect(isQuotedString("'it'")).toBe(true);
      expect(isQuotedString('"a"b"')).toBe(false);
      expect(isQuotedString('"open')).toBe(false);
    });
  });
});
