import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { singleProblem } from '../diagnostics/problems.js';
import type {
  BinaryOp,
  BlockNode,
  ExprNode,
  FuncDeclNode,
  ParamNode,
  PrintMode,
  ProgramNode,
  SlateType,
  SourceSpan,
  StmtNode,
  UnaryOp,
  VarDeclNode,
} from './ast.js';
import type { Token } from './lexer.js';
import { lex } from './lexer.js';
import { fileSpan, joinSpans, makeSourceFile, span, splitLines } from './source.js';

/** Unwinds the descent after the first syntax error has been reported. */
class ParseAbort extends Error {}

const PRINT_MODES: Record<string, PrintMode> = {
  print: 'plain',
  printsp: 'space',
  println: 'newline',
};

const UNARY_OPS: readonly UnaryOp[] = ['!', '-', '+'];

function describe(t: Token): string {
  return t.kind === 'eof' ? 'end of file' : `'${t.text}'`;
}

/**
 * Parse a source file into a {@link ProgramNode}.
 *
 * Lexical and syntax errors are fatal: the first one is pushed to `diagnostics` and `undefined` is
 * returned.
 *
 * Grammar (lowest to highest precedence): `||`, `&&`, `== !=`, `< <= > >=`, `+ -`, `* / %`,
 * unary `! - +`, primary.
 */
export function parseProgram(
  path: string,
  text: string,
  diagnostics: Diagnostic[],
): ProgramNode | undefined {
  const file = makeSourceFile(path, text);
  const tokens = lex(file, diagnostics);
  if (!tokens) return undefined;
  const lines = splitLines(text);

  const eof: Token = tokens[tokens.length - 1] ?? {
    kind: 'eof',
    text: '',
    span: span(file, text.length, text.length),
  };
  let pos = 0;

  const peek = (ahead = 0): Token => tokens[pos + ahead] ?? eof;
  const advance = (): Token => {
    const t = peek();
    if (t.kind !== 'eof') pos++;
    return t;
  };
  const check = (text: string, ahead = 0): boolean => {
    const t = peek(ahead);
    return (t.kind === 'symbol' || t.kind === 'keyword') && t.text === text;
  };
  const match = (text: string): boolean => {
    if (!check(text)) return false;
    advance();
    return true;
  };

  const fail = (at: Token | SourceSpan, message: string): never => {
    const where = 'kind' in at ? at.span : at;
    diagnostics.push(singleProblem(DiagnosticIds.ParseError, 'parse', lines, where, message));
    throw new ParseAbort();
  };

  const expect = (text: string): Token => {
    if (check(text)) return advance();
    return fail(peek(), `Expected '${text}' but found ${describe(peek())}.`);
  };

  const expectIdentifier = (what: string): Token => {
    const t = peek();
    if (t.kind === 'identifier') return advance();
    return fail(t, `Expected ${what} but found ${describe(t)}.`);
  };

  const parseType = (): { type: SlateType; token: Token } => {
    const t = peek();
    if (check('int') || check('bool')) {
      advance();
      return { type: t.text === 'int' ? 'int' : 'bool', token: t };
    }
    return fail(t, `Expected a type ('int' or 'bool') but found ${describe(t)}.`);
  };

  // Expressions ----------------------------------------------------------------------------------

  const parsePrimary = (): ExprNode => {
    const t = peek();
    if (t.kind === 'number') {
      advance();
      return { kind: 'Literal', span: t.span, value: t.value ?? 0 };
    }
    if (check('true') || check('false')) {
      advance();
      return { kind: 'Literal', span: t.span, value: t.text === 'true' };
    }
    if (t.kind === 'identifier') {
      advance();
      if (!match('(')) return { kind: 'Variable', span: t.span, name: t.text };
      const args: ExprNode[] = [];
      if (!check(')')) {
        do {
          args.push(parseExpr());
        } while (match(','));
      }
      const close = expect(')');
      return {
        kind: 'Call',
        span: joinSpans(t.span, close.span),
        name: t.text,
        nameSpan: t.span,
        args,
      };
    }
    if (match('(')) {
      const inner = parseExpr();
      expect(')');
      return inner;
    }
    return fail(
      t,
      `Unexpected token ${describe(t)}. Expected a number, boolean, identifier or '('.`,
    );
  };

  const parseUnary = (): ExprNode => {
    const op = UNARY_OPS.find((o) => check(o));
    if (!op) return parsePrimary();
    const opToken = advance();
    const operand = parseUnary();
    return { kind: 'Unary', span: joinSpans(opToken.span, operand.span), op, operand };
  };

  const binaryLevel =
    (ops: readonly BinaryOp[], next: () => ExprNode) =>
    (): ExprNode => {
      let left = next();
      for (;;) {
        const op = ops.find((o) => check(o));
        if (!op) return left;
        advance();
        const right = next();
        left = { kind: 'Binary', span: joinSpans(left.span, right.span), op, left, right };
      }
    };

  const parseFactor = binaryLevel(['*', '/', '%'], parseUnary);
  const parseTerm = binaryLevel(['+', '-'], parseFactor);
  const parseComparison = binaryLevel(['<', '<=', '>', '>='], parseTerm);
  const parseEquality = binaryLevel(['==', '!='], parseComparison);
  const parseAnd = binaryLevel(['&&'], parseEquality);
  const parseOr = binaryLevel(['||'], parseAnd);

  function parseExpr(): ExprNode {
    return parseOr();
  }

  // Statements -----------------------------------------------------------------------------------

  const parseVarDecl = (): VarDeclNode => {
    const { type, token } = parseType();
    const name = expectIdentifier('a variable name');
    const initializer = match('=') ? parseExpr() : undefined;
    const semi = expect(';');
    return {
      kind: 'VarDecl',
      span: joinSpans(token.span, semi.span),
      name: name.text,
      varType: type,
      ...(initializer ? { initializer } : {}),
      declaratorSpan: joinSpans(token.span, name.span),
    };
  };

  const parseBlock = (): BlockNode => {
    const open = expect('{');
    const statements: StmtNode[] = [];
    while (!check('}')) {
      if (peek().kind === 'eof') fail(peek(), `Expected '}' but found end of file.`);
      statements.push(parseStatement(false));
    }
    const close = advance();
    return { kind: 'Block', span: joinSpans(open.span, close.span), statements };
  };

  const parseFunction = (): FuncDeclNode => {
    const funToken = expect('fun');
    const { type } = parseType();
    const name = expectIdentifier('a function name');
    expect('(');
    const params: ParamNode[] = [];
    if (!check(')')) {
      do {
        const p = parseType();
        const pName = expectIdentifier('a parameter name');
        params.push({
          kind: 'Param',
          span: joinSpans(p.token.span, pName.span),
          name: pName.text,
          paramType: p.type,
        });
      } while (match(','));
    }
    const close = expect(')');
    const body = parseBlock();
    return {
      kind: 'FuncDecl',
      span: joinSpans(funToken.span, body.span),
      name: name.text,
      returnType: type,
      params,
      body,
      headerSpan: joinSpans(name.span, close.span),
    };
  };

  function parseStatement(topLevel: boolean): StmtNode {
    const t = peek();

    if (check('fun')) {
      if (!topLevel) fail(t, 'Nested functions are not supported.');
      return parseFunction();
    }
    if (check('int') || check('bool')) return parseVarDecl();
    if (check('{')) return parseBlock();

    if (match('if')) {
      expect('(');
      const condition = parseExpr();
      expect(')');
      const thenBranch = parseStatement(false);
      const elseBranch = match('else') ? parseStatement(false) : undefined;
      return {
        kind: 'If',
        span: joinSpans(t.span, (elseBranch ?? thenBranch).span),
        condition,
        thenBranch,
        ...(elseBranch ? { elseBranch } : {}),
      };
    }

    if (match('while')) {
      expect('(');
      const condition = parseExpr();
      expect(')');
      const body = parseStatement(false);
      return { kind: 'While', span: joinSpans(t.span, body.span), condition, body };
    }

    if (match('return')) {
      const value = parseExpr();
      const semi = expect(';');
      return { kind: 'Return', span: joinSpans(t.span, semi.span), value };
    }

    const mode = t.kind === 'keyword' ? PRINT_MODES[t.text] : undefined;
    if (mode) {
      advance();
      const expr = mode !== 'plain' && check(';') ? undefined : parseExpr();
      const semi = expect(';');
      return { kind: 'Print', span: joinSpans(t.span, semi.span), mode, ...(expr ? { expr } : {}) };
    }

    if (t.kind === 'identifier' && check('=', 1)) {
      advance();
      advance();
      const value = parseExpr();
      const semi = expect(';');
      return {
        kind: 'Assign',
        span: joinSpans(t.span, semi.span),
        name: t.text,
        nameSpan: t.span,
        value,
      };
    }

    const expr = parseExpr();
    const semi = expect(';');
    return { kind: 'ExprStmt', span: joinSpans(expr.span, semi.span), expr };
  }

  const statements: StmtNode[] = [];
  try {
    while (peek().kind !== 'eof') statements.push(parseStatement(true));
  } catch (err) {
    if (err instanceof ParseAbort) return undefined;
    throw err;
  }

  return { kind: 'Program', span: fileSpan(file), file: path, statements, lines };
}
