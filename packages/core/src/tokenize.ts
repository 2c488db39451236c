import { Token as Lexeme } from "moo";
import { endsOperand, lexemes, startsOperand } from "./lex.js";
import { Token, TokenKind, num, token } from "./token.js";
import { unreachable } from "./util.js";

type Kind = Exclude<TokenKind, TokenKind.Number | TokenKind.Variable>;

const kinds: { [type: string]: Kind | undefined } = {
  lparen: TokenKind.LeftParen,
  rparen: TokenKind.RightParen,
  plus: TokenKind.Plus,
  minus: TokenKind.Minus,
  times: TokenKind.Mul,
  divide: TokenKind.Div,
  mod: TokenKind.Mod,
  caret: TokenKind.Power,
  sin: TokenKind.Sin,
  cos: TokenKind.Cos,
  tan: TokenKind.Tan,
  asin: TokenKind.Asin,
  acos: TokenKind.Acos,
  atan: TokenKind.Atan,
  sqrt: TokenKind.Sqrt,
  ln: TokenKind.Ln,
  log: TokenKind.Log,
};

const convert = (
  lexeme: Lexeme,
  prev: Lexeme | undefined,
  x: number,
): Token => {
  switch (lexeme.type) {
    case "num":
      return num(Number(lexeme.text));
    case "x":
      return num(x);
    case "minus":
      // binary only when something that ends an operand stands to its left
      return token(
        prev !== undefined && endsOperand(prev)
          ? TokenKind.Minus
          : TokenKind.Negate,
      );
  }
  const kind = kinds[lexeme.type ?? ""];
  if (kind === undefined)
    return unreachable(`can't tokenize: ${lexeme.text}`);
  return token(kind);
};

/**
 * Converts text that already passed `validate` into tokens, with `x` bound to
 * its value and implicit products made explicit.
 */
export const tokenize = (text: string, x: number): Token[] => {
  const tokens: Token[] = [];
  let prev: Lexeme | undefined = undefined;
  for (const lexeme of lexemes(text)) {
    if (prev !== undefined && endsOperand(prev) && startsOperand(lexeme))
      tokens.push(token(TokenKind.Mul));
    tokens.push(convert(lexeme, prev, x));
    prev = lexeme;
  }
  return tokens;
};
