export enum TokenKind {
  Number,
  Variable,
  LeftParen,
  RightParen,
  Plus,
  Minus,
  Mul,
  Div,
  Mod,
  Power,
  /** Prefix minus. */
  Negate,
  Sin,
  Cos,
  Tan,
  Asin,
  Acos,
  Atan,
  Sqrt,
  Ln,
  Log,
}

export enum Precedence {
  /** Operands, and brackets as a sentinel that stops popping. */
  None,
  Additive,
  Multiplicative,
  Negation,
  Power,
  Function,
}

export type BinaryKind =
  | TokenKind.Plus
  | TokenKind.Minus
  | TokenKind.Mul
  | TokenKind.Div
  | TokenKind.Mod
  | TokenKind.Power;

export type FunctionKind =
  | TokenKind.Sin
  | TokenKind.Cos
  | TokenKind.Tan
  | TokenKind.Asin
  | TokenKind.Acos
  | TokenKind.Atan
  | TokenKind.Sqrt
  | TokenKind.Ln
  | TokenKind.Log;

export type Token =
  | { kind: TokenKind.Number; value: number; precedence: Precedence }
  | { kind: Exclude<TokenKind, TokenKind.Number>; precedence: Precedence };

export const precedence = (kind: TokenKind): Precedence => {
  switch (kind) {
    case TokenKind.Number:
    case TokenKind.Variable:
    case TokenKind.LeftParen:
    case TokenKind.RightParen:
      return Precedence.None;
    case TokenKind.Plus:
    case TokenKind.Minus:
      return Precedence.Additive;
    case TokenKind.Mul:
    case TokenKind.Div:
    case TokenKind.Mod:
      return Precedence.Multiplicative;
    case TokenKind.Negate:
      return Precedence.Negation;
    case TokenKind.Power:
      return Precedence.Power;
    case TokenKind.Sin:
    case TokenKind.Cos:
    case TokenKind.Tan:
    case TokenKind.Asin:
    case TokenKind.Acos:
    case TokenKind.Atan:
    case TokenKind.Sqrt:
    case TokenKind.Ln:
    case TokenKind.Log:
      return Precedence.Function;
  }
};

export const num = (value: number): Token => ({
  kind: TokenKind.Number,
  value,
  precedence: Precedence.None,
});

export const token = (kind: Exclude<TokenKind, TokenKind.Number>): Token => ({
  kind,
  precedence: precedence(kind),
});

/** Functions and `Negate`: operators that take their operand on the right. */
export const isPrefix = (kind: TokenKind): boolean =>
  kind === TokenKind.Negate || precedence(kind) === Precedence.Function;
