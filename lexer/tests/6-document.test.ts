import { describe, expect, test } from 'vitest';

import { classifyLine, formatLines, lexDocument } from '../document.js';
import { lexLine } from '../lexer.js';
import { LineKind } from '../token-types.js';
import { formatTokens } from '../tokens.js';

describe('Document lines', () => {
  describe('classifyLine', () => {
    test('block marks', () => {
      expect(classifyLine(lexLine(''))).toBe(LineKind.Blank);
      expect(classifyLine(lexLine('# t'))).toBe(LineKind.Title);
      expect(classifyLine(lexLine('- a'))).toBe(LineKind.ListItem);
      expect(classifyLine(lexLine('2. b'))).toBe(LineKind.ListItem);
      expect(classifyLine(lexLine('> q'))).toBe(LineKind.Quote);
    });

    test('indentation is skipped', () => {
      expect(classifyLine(lexLine('   1. x'))).toBe(LineKind.ListItem);
      expect(classifyLine(lexLine('  plain'))).toBe(LineKind.Plain);
    });

    test('inline content', () => {
      expect(classifyLine(lexLine('plain'))).toBe(LineKind.Plain);
      expect(classifyLine(lexLine('**bold**'))).toBe(LineKind.Plain);
      expect(classifyLine(lexLine('[a]: b'))).toBe(LineKind.Plain);
      expect(classifyLine(lexLine('<br>'))).toBe(LineKind.Plain);
    });

    test('marks without a line kind', () => {
      expect(classifyLine(lexLine('---'))).toBe(LineKind.Unknown);
      expect(classifyLine(lexLine('```js'))).toBe(LineKind.Unknown);
      expect(classifyLine([])).toBe(LineKind.Unknown);
    });
  });

  describe('lexDocument', () => {
    test('one entry per line', () => {
      const lines = lexDocument('# T\n\n- a\n> q\nplain\n---\n');
      expect(lines.map(line => line.lineNumber)).toEqual([1, 2, 3, 4, 5, 6]);
      expect(lines.map(line => line.kind)).toEqual([
        LineKind.Title,
        LineKind.Blank,
        LineKind.ListItem,
        LineKind.Quote,
        LineKind.Plain,
        LineKind.Unknown,
      ]);
    });

    test('no trailing newline', () => {
      expect(lexDocument('a\nb').length).toBe(2);
    });

    test('empty text has no lines', () => {
      expect(lexDocument('')).toEqual([]);
    });

    test('a lone newline is one blank line', () => {
      expect(lexDocument('\n').map(line => line.kind)).toEqual([LineKind.Blank]);
    });

    test('options reach the lexer', () => {
      const [line] = lexDocument('<intranet>', { validator: { isUrl: text => text === 'intranet' } });
      expect(formatTokens(line.tokens)).toBe('<<intranet>, QuickLink>');
    });
  });

  describe('formatting', () => {
    test('formatTokens', () => {
      expect(formatTokens(lexLine('*a*'))).toBe('<*, ItalicMark> <a, Text> <*, ItalicMark>');
    });

    test('formatLines', () => {
      expect(formatLines(lexDocument('# T\nx'))).toBe('<#, 1, TitleMark> <T, 1, Text>\n<x, 2, Text>');
    });
  });
});
