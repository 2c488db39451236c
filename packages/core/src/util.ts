/** Marks a case that validated input can never reach. */
export const unreachable = (what = "unreachable"): never => {
  throw Error(what);
};

/** `x` itself, or an error with the message from `what` if it is missing. */
export const unwrap = <T>(x: T | undefined, what: () => string): T => {
  if (x === undefined) throw Error(what());
  return x;
};

/** Exhaustiveness check for a `switch` over a closed union. */
export const absurd = (x: never): never => {
  throw Error(`unexpected value: ${String(x)}`);
};
