/**
 * Token types for the line lexer.
 *
 * Regular (not const) enum: debug output and the test harness read names
 * back with TokenKind[kind].
 */

export enum TokenKind {
  // Block marks (first token of a line)
  TitleMark,                // #, ##, ###, ####
  UnorderedMark,            // *, -, +
  OrderedMark,              // 1., 12., 123.
  DividingMark,             // ---, ***, ___ (value is the whole line)
  QuoteMark,                // >
  CodeBlockMark,            // ```

  // Resolved inline marks
  ItalicMark,               // * *  or  _ _
  BoldMark,                 // ** **  or  __ __
  ItalicBoldMark,           // *** ***  or  ___ ___
  CodeMark,                 // ` `, `` ``, ``` ```

  // Link family (carry details)
  Image,                    // ![name](location "title")
  Link,                     // [name](location "title")
  QuickLink,                // <url or email>
  RefLink,                  // [name][tag]
  RefLinkDef,               // [tag]: location "title"

  // Structural
  Text,
  BlankLine,                // whitespace-only line
  LineBreak,                // trailing <br> or two trailing spaces
  WhiteSpace,               // leading indentation

  // Raw delimiter runs, only present before the tidy pass
  Star,                     // *
  UnderLine,                // _
  BackTick,                 // `
}

/**
 * Attributes of a link-family token. Empty values are never stored.
 */
export interface LinkDetails {
  name?: string;
  location?: string;
  title?: string;
  /** Reference tag of a RefLink or RefLinkDef. */
  ptr?: string;
}

export interface Token {
  /** Matched text, owned by the token. */
  value: string;
  kind: TokenKind;
  /** Present only on link-family tokens with at least one attribute. */
  details?: LinkDetails;
}

/**
 * Line classification derived from the first token of a lexed line
 */
export enum LineKind {
  Unknown,
  Blank,
  Title,
  ListItem,
  Quote,
  Plain,
}
