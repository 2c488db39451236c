import { Token, TokenKind } from "./token.js";

const spelling = (kind: Exclude<TokenKind, TokenKind.Number>): string => {
  switch (kind) {
    case TokenKind.Variable:
      return "x";
    case TokenKind.LeftParen:
      return "(";
    case TokenKind.RightParen:
      return ")";
    case TokenKind.Plus:
      return "+";
    case TokenKind.Minus:
      return "-";
    case TokenKind.Mul:
      return "*";
    case TokenKind.Div:
      return "/";
    case TokenKind.Mod:
      return "mod";
    case TokenKind.Power:
      return "^";
    case TokenKind.Negate:
      return "neg";
    case TokenKind.Sin:
      return "sin";
    case TokenKind.Cos:
      return "cos";
    case TokenKind.Tan:
      return "tan";
    case TokenKind.Asin:
      return "asin";
    case TokenKind.Acos:
      return "acos";
    case TokenKind.Atan:
      return "atan";
    case TokenKind.Sqrt:
      return "sqrt";
    case TokenKind.Ln:
      return "ln";
    case TokenKind.Log:
      return "log";
  }
};

export class Printer {
  strings: string[];

  constructor() {
    this.strings = [];
  }

  flush(): string {
    const s = this.strings.join(" ");
    this.strings = [];
    return s;
  }

  push(s: string) {
    this.strings.push(s);
  }

  token(tok: Token) {
    if (tok.kind === TokenKind.Number) this.push(String(tok.value));
    else this.push(spelling(tok.kind));
  }

  tokens(tokens: Token[]) {
    for (const tok of tokens) this.token(tok);
  }
}

/** Space-separated source spellings of `tokens`, `neg` for prefix minus. */
export const show = (tokens: Token[]): string => {
  const printer = new Printer();
  printer.tokens(tokens);
  return printer.flush();
};
