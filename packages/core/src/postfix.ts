import { Token, TokenKind, isPrefix } from "./token.js";
import { unreachable, unwrap } from "./util.js";

/** Whether `top`, waiting on the stack, binds before `incoming` arrives. */
const yields = (top: Token, incoming: Token): boolean => {
  if (top.kind === TokenKind.Power && incoming.kind === TokenKind.Power)
    return false;
  return top.precedence >= incoming.precedence;
};

/** Reorders infix tokens into postfix order with the shunting-yard method. */
export const toPostfix = (tokens: Token[]): Token[] => {
  const output: Token[] = [];
  const stack: Token[] = [];

  const top = (): Token | undefined => stack[stack.length - 1];

  for (const tok of tokens) {
    if (tok.kind === TokenKind.Number) output.push(tok);
    else if (tok.kind === TokenKind.LeftParen || isPrefix(tok.kind))
      stack.push(tok);
    else if (tok.kind === TokenKind.RightParen) {
      let op = unwrap(stack.pop(), () => "unmatched `)`");
      while (op.kind !== TokenKind.LeftParen) {
        output.push(op);
        op = unwrap(stack.pop(), () => "unmatched `)`");
      }
    } else {
      let waiting = top();
      while (waiting !== undefined && yields(waiting, tok)) {
        output.push(waiting);
        stack.pop();
        waiting = top();
      }
      stack.push(tok);
    }
  }

  for (let op = stack.pop(); op !== undefined; op = stack.pop()) {
    if (op.kind === TokenKind.LeftParen) unreachable("unmatched `(`");
    output.push(op);
  }
  return output;
};
