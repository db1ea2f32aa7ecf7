import type { Defined, UndefinedReason, UndefinedResult } from "./types.js";

export const defined = <A>(value: A): Defined<A> => ({ _tag: "Defined", value });

export const undefinedResult = (reason: UndefinedReason): UndefinedResult => ({
  _tag: "UndefinedResult",
  reason,
});
