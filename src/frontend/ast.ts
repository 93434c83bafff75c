/**
 * 1-based line/column position plus a 0-based offset into the source text.
 */
export interface SourcePosition {
  line: number;
  column: number;
  offset: number;
}

/**
 * Half-open source range; `end` points just past the last character.
 */
export interface SourceSpan {
  file: string;
  start: SourcePosition;
  end: SourcePosition;
}

/**
 * Common fields for all AST nodes.
 */
export interface BaseNode {
  kind: string;
  span: SourceSpan;
}

/**
 * The two scalar types of the language.
 */
export type SlateType = 'int' | 'bool';

export type UnaryOp = '!' | '-' | '+';

export type ArithmeticOp = '+' | '-' | '*' | '/' | '%';
export type LogicalOp = '&&' | '||';
export type EqualityOp = '==' | '!=';
export type RelationalOp = '<' | '<=' | '>' | '>=';
export type BinaryOp = ArithmeticOp | LogicalOp | EqualityOp | RelationalOp;

export interface LiteralExprNode extends BaseNode {
  kind: 'Literal';
  value: number | boolean;
}

export interface VariableExprNode extends BaseNode {
  kind: 'Variable';
  name: string;
}

export interface UnaryExprNode extends BaseNode {
  kind: 'Unary';
  op: UnaryOp;
  operand: ExprNode;
}

export interface BinaryExprNode extends BaseNode {
  kind: 'Binary';
  op: BinaryOp;
  left: ExprNode;
  right: ExprNode;
}

export interface CallExprNode extends BaseNode {
  kind: 'Call';
  name: string;
  /** Span of the callee name only. */
  nameSpan: SourceSpan;
  args: ExprNode[];
}

export type ExprNode =
  | LiteralExprNode
  | VariableExprNode
  | UnaryExprNode
  | BinaryExprNode
  | CallExprNode;

export interface BlockNode extends BaseNode {
  kind: 'Block';
  statements: StmtNode[];
}

export interface ExprStmtNode extends BaseNode {
  kind: 'ExprStmt';
  expr: ExprNode;
}

/**
 * `int x = 1;` / `bool b;`
 */
export interface VarDeclNode extends BaseNode {
  kind: 'VarDecl';
  name: string;
  varType: SlateType;
  initializer?: ExprNode;
  /** Type keyword through the name. */
  declaratorSpan: SourceSpan;
}

export interface ParamNode extends BaseNode {
  kind: 'Param';
  name: string;
  paramType: SlateType;
}

/**
 * `fun int add(int a, int b) { ... }`
 */
export interface FuncDeclNode extends BaseNode {
  kind: 'FuncDecl';
  name: string;
  returnType: SlateType;
  params: ParamNode[];
  body: BlockNode;
  /** Name through the closing parenthesis of the parameter list. */
  headerSpan: SourceSpan;
}

export interface AssignNode extends BaseNode {
  kind: 'Assign';
  name: string;
  nameSpan: SourceSpan;
  value: ExprNode;
}

export interface IfNode extends BaseNode {
  kind: 'If';
  condition: ExprNode;
  thenBranch: StmtNode;
  elseBranch?: StmtNode;
}

export interface WhileNode extends BaseNode {
  kind: 'While';
  condition: ExprNode;
  body: StmtNode;
}

export interface ReturnNode extends BaseNode {
  kind: 'Return';
  value: ExprNode;
}

/**
 * Trailing character written after the value: none (`print`), a space (`printsp`) or a newline
 * (`println`).
 */
export type PrintMode = 'plain' | 'space' | 'newline';

/**
 * `printsp` and `println` may omit the value and write only their trailing character.
 */
export interface PrintNode extends BaseNode {
  kind: 'Print';
  mode: PrintMode;
  expr?: ExprNode;
}

export type StmtNode =
  | BlockNode
  | ExprStmtNode
  | VarDeclNode
  | FuncDeclNode
  | AssignNode
  | IfNode
  | WhileNode
  | ReturnNode
  | PrintNode;

/**
 * A parsed source file.
 */
export interface ProgramNode extends BaseNode {
  kind: 'Program';
  file: string;
  statements: StmtNode[];
  /** Source text split into lines, kept for diagnostic rendering. */
  lines: string[];
}
