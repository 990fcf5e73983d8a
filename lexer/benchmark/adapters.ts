/**
 * Parser adapters for benchmarking the lexer against other Markdown parsers.
 * Each adapter reduces its parser's output to one comparable number.
 */

import * as commonmark from 'commonmark';
import MarkdownIt from 'markdown-it';
import { marked } from 'marked';
import { micromark } from 'micromark';
import remarkParse from 'remark-parse';
import { unified } from 'unified';

import { lexDocument } from '../document.js';

export interface ParseSummary {
  /** What `size` counts. */
  kind: 'tokens' | 'nodes' | 'html';
  size: number;
}

export interface ParserAdapter {
  name: string;
  parse(content: string): ParseSummary;
}

export const marklexAdapter: ParserAdapter = {
  name: 'marklex',
  parse(content) {
    let size = 0;
    for (const line of lexDocument(content))
      size += line.tokens.length;
    return { kind: 'tokens', size };
  }
};

export const markedAdapter: ParserAdapter = {
  name: 'marked',
  parse(content) {
    return { kind: 'tokens', size: marked.lexer(content).length };
  }
};

const mdIt = new MarkdownIt();

export const markdownItAdapter: ParserAdapter = {
  name: 'markdown-it',
  parse(content) {
    return { kind: 'tokens', size: mdIt.parse(content, {}).length };
  }
};

export const micromarkAdapter: ParserAdapter = {
  name: 'micromark',
  parse(content) {
    return { kind: 'html', size: micromark(content).length };
  }
};

const commonmarkReader = new commonmark.Parser();

export const commonmarkAdapter: ParserAdapter = {
  name: 'commonmark',
  parse(content) {
    const walker = commonmarkReader.parse(content).walker();
    let size = 0;
    for (let event = walker.next(); event; event = walker.next()) {
      if (event.entering) size++;
    }
    return { kind: 'nodes', size };
  }
};

interface TreeNode {
  type: string;
  children?: readonly TreeNode[];
}

function countNodes(node: TreeNode): number {
  let count = 1;
  for (const child of node.children ?? [])
    count += countNodes(child);
  return count;
}

const remarkProcessor = unified().use(remarkParse);

export const remarkAdapter: ParserAdapter = {
  name: 'remark',
  parse(content) {
    return { kind: 'nodes', size: countNodes(remarkProcessor.parse(content)) };
  }
};

export const adapters: readonly ParserAdapter[] = [
  marklexAdapter,
  markedAdapter,
  markdownItAdapter,
  micromarkAdapter,
  commonmarkAdapter,
  remarkAdapter,
];
