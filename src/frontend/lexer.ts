import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { singleProblem } from '../diagnostics/problems.js';
import type { SourceSpan } from './ast.js';
import type { SourceFile } from './source.js';
import { span, splitLines } from './source.js';

export const KEYWORDS = [
  'int',
  'bool',
  'fun',
  'if',
  'else',
  'while',
  'return',
  'print',
  'printsp',
  'println',
  'true',
  'false',
] as const;

export type Keyword = (typeof KEYWORDS)[number];

export type TokenKind = 'number' | 'identifier' | 'keyword' | 'symbol' | 'eof';

export interface Token {
  kind: TokenKind;
  /** Exact source text (empty for `eof`). */
  text: string;
  span: SourceSpan;
  /** Parsed value of a `number` token. */
  value?: number;
}

const TWO_CHAR_SYMBOLS = new Set(['==', '!=', '<=', '>=', '&&', '||']);
const ONE_CHAR_SYMBOLS = new Set(['(', ')', '{', '}', ',', ';', '=', '!', '<', '>', '+', '-', '*', '/', '%']);

const INT_MAX = 2 ** 31 - 1;

const KEYWORD_SET: ReadonlySet<string> = new Set(KEYWORDS);

function isKeyword(text: string): text is Keyword {
  return KEYWORD_SET.has(text);
}

const isDigit = (c: string): boolean => c >= '0' && c <= '9';
const isIdentStart = (c: string): boolean => /[A-Za-z_]/.test(c);
const isIdentPart = (c: string): boolean => /[A-Za-z0-9_]/.test(c);

/**
 * Split `file` into tokens, ending with one `eof` token.
 *
 * Lexing stops at the first error: one diagnostic is pushed and `undefined` is returned.
 */
export function lex(file: SourceFile, diagnostics: Diagnostic[]): Token[] | undefined {
  const { text } = file;
  const tokens: Token[] = [];
  let lines: string[] | undefined;

  const fail = (start: number, end: number, message: string): undefined => {
    lines ??= splitLines(text);
    diagnostics.push(singleProblem(DiagnosticIds.LexError, 'lex', lines, span(file, start, end), message));
    return undefined;
  };

  let i = 0;
  while (i < text.length) {
    const c = text[i] ?? '';
    const next = text[i + 1] ?? '';

    if (c === ' ' || c === '\t' || c === '\r' || c === '\n') {
      i++;
      continue;
    }

    if (c === '/' && next === '/') {
      while (i < text.length && text[i] !== '\n') i++;
      continue;
    }

    if (c === '/' && next === '*') {
      const close = text.indexOf('*/', i + 2);
      if (close < 0) return fail(i, i + 2, 'Unterminated multi-line comment.');
      i = close + 2;
      continue;
    }

    if (isDigit(c)) {
      const start = i;
      while (i < text.length && isDigit(text[i] ?? '')) i++;
      const lexeme = text.slice(start, i);
      const value = Number(lexeme);
      if (value > INT_MAX) {
        return fail(start, i, `Integer literal ${lexeme} does not fit in 32 bits.`);
      }
      tokens.push({ kind: 'number', text: lexeme, span: span(file, start, i), value });
      continue;
    }

    if (isIdentStart(c)) {
      const start = i;
      while (i < text.length && isIdentPart(text[i] ?? '')) i++;
      const lexeme = text.slice(start, i);
      tokens.push({
        kind: isKeyword(lexeme) ? 'keyword' : 'identifier',
        text: lexeme,
        span: span(file, start, i),
      });
      continue;
    }

    const pair = c + next;
    if (TWO_CHAR_SYMBOLS.has(pair)) {
      tokens.push({ kind: 'symbol', text: pair, span: span(file, i, i + 2) });
      i += 2;
      continue;
    }

    if (c === '&' || c === '|') {
      return fail(i, i + 1, `Undefined token '${c}'; did you mean '${c}${c}'?`);
    }

    if (ONE_CHAR_SYMBOLS.has(c)) {
      tokens.push({ kind: 'symbol', text: c, span: span(file, i, i + 1) });
      i++;
      continue;
    }

    const code = c.codePointAt(0) ?? 0;
    return fail(i, i + 1, `Unexpected character '${c}' (code ${code}).`);
  }

  tokens.push({ kind: 'eof', text: '', span: span(file, text.length, text.length) });
  return tokens;
}
