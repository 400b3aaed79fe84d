/**
 * Lexical splitter
 *
 * Finds VISUALISE / VISUALIZE keywords outside strings and comments and cuts
 * the query into the relational prefix and one fragment per clause. The
 * pieces concatenate back to the original input.
 *
 * The same lexer backs `sqlTokens`, which the compiler uses to inspect
 * relational statements without tripping over comments or quoted text.
 */

import { createToken, Lexer, type IToken } from 'chevrotain';
import type { ClauseLocation } from './ast.js';

// ---
// TOKENS
// ---

// Unterminated strings and comments run to the end of input
const BlockComment = createToken({ name: 'BlockComment', pattern: /\/\*(?:[^*]|\*(?!\/))*(?:\*\/)?/, line_breaks: true });
const LineComment = createToken({ name: 'LineComment', pattern: /--[^\n]*/ });
const SingleQuoted = createToken({ name: 'SingleQuoted', pattern: /'(?:[^']|'')*'?/, line_breaks: true });
const DoubleQuoted = createToken({ name: 'DoubleQuoted', pattern: /"(?:[^"]|"")*"?/, line_breaks: true });
const Backticked = createToken({ name: 'Backticked', pattern: /`[^`]*`?/, line_breaks: true });
const VisualiseKeyword = createToken({ name: 'VisualiseKeyword', pattern: /VISUALI[SZ]E(?![a-zA-Z0-9_$])/i });
const Word = createToken({ name: 'Word', pattern: /[a-zA-Z_][a-zA-Z0-9_$]*/ });
const Semicolon = createToken({ name: 'Semicolon', pattern: /;/ });
const LParen = createToken({ name: 'LParen', pattern: /\(/ });
const RParen = createToken({ name: 'RParen', pattern: /\)/ });
const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /\s+/, line_breaks: true });
const Other = createToken({ name: 'Other', pattern: /[^\s'"`a-zA-Z_;()/-]+/ });
const Fallback = createToken({ name: 'Fallback', pattern: /[\s\S]/, line_breaks: true });

const splitterTokens = [
  BlockComment,
  LineComment,
  SingleQuoted,
  DoubleQuoted,
  Backticked,
  VisualiseKeyword,
  Word,
  Semicolon,
  LParen,
  RParen,
  WhiteSpace,
  Other,
  Fallback,
];

const SplitterLexer = new Lexer(splitterTokens, { positionTracking: 'full', ensureOptimizations: false });

// ---
// SPLITTING
// ---

export interface ClauseFragment {
  text: string;
  start: number;
  end: number;
  location: ClauseLocation;
}

export interface SplitResult {
  relational: string;
  clauses: ClauseFragment[];
}

function tokenize(text: string): IToken[] {
  // Fallback matches any character, so lexing never fails
  return SplitterLexer.tokenize(text).tokens;
}

export type SqlTokenKind = 'word' | 'quoted' | 'open' | 'close' | 'semicolon' | 'other';

export interface SqlToken {
  kind: SqlTokenKind;
  image: string;
  offset: number;
}

function tokenKind(token: IToken): SqlTokenKind | null {
  switch (token.tokenType) {
    case WhiteSpace:
    case LineComment:
    case BlockComment:
      return null;
    case Word:
    case VisualiseKeyword:
      return 'word';
    case SingleQuoted:
    case DoubleQuoted:
    case Backticked:
      return 'quoted';
    case LParen:
      return 'open';
    case RParen:
      return 'close';
    case Semicolon:
      return 'semicolon';
    default:
      return 'other';
  }
}

/** Tokens of SQL text, leaving out whitespace and comments. */
export function sqlTokens(text: string): SqlToken[] {
  const tokens: SqlToken[] = [];
  for (const token of tokenize(text)) {
    const kind = tokenKind(token);
    if (kind) tokens.push({ kind, image: token.image, offset: token.startOffset });
  }
  return tokens;
}

export function splitQuery(text: string): SplitResult {
  const starts = tokenize(text).filter(t => t.tokenType === VisualiseKeyword);

  if (starts.length === 0) {
    return { relational: text, clauses: [] };
  }

  const clauses = starts.map((token, i): ClauseFragment => {
    const start = token.startOffset;
    const end = i + 1 < starts.length ? starts[i + 1].startOffset : text.length;
    return {
      text: text.slice(start, end),
      start,
      end,
      location: { offset: start, line: token.startLine ?? 1, column: token.startColumn ?? 1 },
    };
  });

  return { relational: text.slice(0, starts[0].startOffset), clauses };
}

/**
 * Split relational text into statements on semicolons outside strings and
 * comments. Statements holding nothing but comments and whitespace are
 * dropped.
 */
export function splitStatements(relational: string): string[] {
  const statements: string[] = [];
  let start = 0;
  let meaningful = false;

  const flush = (end: number) => {
    if (meaningful) statements.push(relational.slice(start, end).trim());
    meaningful = false;
  };

  for (const token of sqlTokens(relational)) {
    if (token.kind === 'semicolon') {
      flush(token.offset);
      start = token.offset + 1;
    } else {
      meaningful = true;
    }
  }
  flush(relational.length);

  return statements;
}
