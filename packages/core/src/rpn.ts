import { BinaryKind, FunctionKind, Token, TokenKind } from "./token.js";
import { absurd, unreachable, unwrap } from "./util.js";

export type MathErrorData =
  | { kind: "DivisionByZero" }
  | { kind: "ModuloByZero" }
  | { kind: "NotFinite"; op: TokenKind }
  | { kind: "Domain"; op: FunctionKind; arg: number };

export class MathError extends Error {
  data: MathErrorData;

  constructor(data: MathErrorData) {
    super(`math error: ${data.kind}`);
    this.data = data;
  }
}

export type Result =
  | { ok: true; value: number }
  | { ok: false; error: MathErrorData };

const binary = (kind: BinaryKind, a: number, b: number): number => {
  switch (kind) {
    case TokenKind.Plus:
      return a + b;
    case TokenKind.Minus:
      return a - b;
    case TokenKind.Mul:
      return a * b;
    case TokenKind.Div:
      if (b === 0) throw new MathError({ kind: "DivisionByZero" });
      return a / b;
    case TokenKind.Mod:
      if (b === 0) throw new MathError({ kind: "ModuloByZero" });
      return a % b;
    case TokenKind.Power:
      return Math.pow(a, b);
    default:
      return absurd(kind);
  }
};

const domain = (op: FunctionKind, arg: number): MathError =>
  new MathError({ kind: "Domain", op, arg });

const unary = (kind: FunctionKind, a: number): number => {
  switch (kind) {
    case TokenKind.Sin:
      return Math.sin(a);
    case TokenKind.Cos:
      return Math.cos(a);
    case TokenKind.Tan:
      return Math.tan(a);
    case TokenKind.Asin:
      if (a < -1 || a > 1) throw domain(kind, a);
      return Math.asin(a);
    case TokenKind.Acos:
      if (a < -1 || a > 1) throw domain(kind, a);
      return Math.acos(a);
    case TokenKind.Atan:
      return Math.atan(a);
    case TokenKind.Sqrt:
      if (a < 0) throw domain(kind, a);
      return Math.sqrt(a);
    case TokenKind.Ln:
      if (a <= 0) throw domain(kind, a);
      return Math.log(a);
    case TokenKind.Log:
      if (a <= 0) throw domain(kind, a);
      return Math.log10(a);
    default:
      return absurd(kind);
  }
};

const apply = (tok: Token, stack: number[]): number => {
  if (tok.kind === TokenKind.Number) return tok.value;
  const pop = () => unwrap(stack.pop(), () => "operand stack underflow");
  const { kind } = tok;
  switch (kind) {
    case TokenKind.Negate:
      return -pop();
    case TokenKind.Sin:
    case TokenKind.Cos:
    case TokenKind.Tan:
    case TokenKind.Asin:
    case TokenKind.Acos:
    case TokenKind.Atan:
    case TokenKind.Sqrt:
    case TokenKind.Ln:
    case TokenKind.Log:
      return unary(kind, pop());
    case TokenKind.Plus:
    case TokenKind.Minus:
    case TokenKind.Mul:
    case TokenKind.Div:
    case TokenKind.Mod:
    case TokenKind.Power: {
      const b = pop();
      const a = pop();
      return binary(kind, a, b);
    }
    case TokenKind.Variable:
    case TokenKind.LeftParen:
    case TokenKind.RightParen:
      return unreachable(`no ${TokenKind[kind]} in postfix order`);
  }
};

const run = (tokens: Token[]): number => {
  const stack: number[] = [];
  for (const tok of tokens) {
    const value = apply(tok, stack);
    if (!Number.isFinite(value))
      throw new MathError({ kind: "NotFinite", op: tok.kind });
    stack.push(value);
  }
  const value = unwrap(stack.pop(), () => "empty expression");
  if (stack.length !== 0) unreachable(`${stack.length} operands left over`);
  return value;
};

/** Evaluates postfix tokens, stopping at the first math error. */
export const evaluatePostfix = (tokens: Token[]): Result => {
  try {
    return { ok: true, value: run(tokens) };
  } catch (e) {
    if (e instanceof MathError) return { ok: false, error: e.data };
    throw e;
  }
};
