import {
  Formula,
  NodeKind,
  Const,
  constant,
  not,
  and,
  or,
  implies,
  iff,
  xor,
  getAtoms,
} from './ast';
import { debugLogger, LogComponent } from './debug-logger';
import { renderFormula } from './parse';

/**
 * Truth values for some atoms. Atoms missing from the map are unbound.
 */
export type Interpretation = ReadonlyMap<string, boolean>;

/**
 * Builds an interpretation from a record or from `[name, value]` pairs.
 */
export function interpretation(
  values: Readonly<Record<string, boolean>> | Iterable<readonly [string, boolean]>
): Interpretation {
  if (isIterable(values)) return new Map(values);
  return new Map(Object.entries(values));
}

function isIterable(
  values: Readonly<Record<string, boolean>> | Iterable<readonly [string, boolean]>
): values is Iterable<readonly [string, boolean]> {
  return Symbol.iterator in values;
}

/**
 * Represents a request for a truth value from an interpretation that leaves
 * some of the formula's atoms unbound.
 */
export class UnboundAtomError extends Error {
  constructor(public readonly atoms: readonly string[]) {
    super(`no truth value assigned to ${atoms.map((a) => `'${a}'`).join(', ')}`);
  }
}

function isConst(f: Formula): f is Const {
  return f.kind === NodeKind.Const;
}

/**
 * Evaluates a formula under an interpretation. Bound atoms are replaced by
 * their values and constants are folded away; the result is a `Const` when
 * every atom is bound, and otherwise a residual formula over the unbound
 * atoms. The right operand of a binary node is skipped when the left operand
 * already decides the result.
 */
export function evaluate(f: Formula, interp: Interpretation): Formula {
  switch (f.kind) {
    case NodeKind.Const:
      return f;
    case NodeKind.Atom: {
      const value = interp.get(f.name);
      return value === undefined ? f : constant(value);
    }
    case NodeKind.Not: {
      const arg = evaluate(f.arg, interp);
      return isConst(arg) ? constant(!arg.value) : not(arg);
    }
    case NodeKind.And: {
      const left = evaluate(f.left, interp);
      if (isConst(left)) return left.value ? evaluate(f.right, interp) : left;
      const right = evaluate(f.right, interp);
      if (isConst(right)) return right.value ? left : right;
      return and(left, right);
    }
    case NodeKind.Or: {
      const left = evaluate(f.left, interp);
      if (isConst(left)) return left.value ? left : evaluate(f.right, interp);
      const right = evaluate(f.right, interp);
      if (isConst(right)) return right.value ? right : left;
      return or(left, right);
    }
    case NodeKind.Implies: {
      const left = evaluate(f.left, interp);
      if (isConst(left))
        return left.value ? evaluate(f.right, interp) : constant(true);
      const right = evaluate(f.right, interp);
      if (isConst(right)) return right.value ? right : not(left);
      return implies(left, right);
    }
    case NodeKind.Iff: {
      const left = evaluate(f.left, interp);
      const right = evaluate(f.right, interp);
      if (isConst(left) && isConst(right))
        return constant(left.value === right.value);
      if (isConst(left)) return left.value ? right : not(right);
      if (isConst(right)) return right.value ? left : not(left);
      return iff(left, right);
    }
    case NodeKind.Xor: {
      const left = evaluate(f.left, interp);
      const right = evaluate(f.right, interp);
      if (isConst(left) && isConst(right))
        return constant(left.value !== right.value);
      if (isConst(left)) return left.value ? not(right) : right;
      if (isConst(right)) return right.value ? not(left) : left;
      return xor(left, right);
    }
    default: {
      const _exhaustive: never = f;
      throw new Error(_exhaustive);
    }
  }
}

/**
 * Evaluates a formula to a truth value, throwing `UnboundAtomError` if the
 * interpretation leaves any atom the result depends on unbound.
 */
export function evaluateToBoolean(f: Formula, interp: Interpretation): boolean {
  const result = evaluate(f, interp);
  if (isConst(result)) return result.value;
  debugLogger.debug(
    LogComponent.EVALUATE,
    () => `undecided residual ${renderFormula(result)}`
  );
  throw new UnboundAtomError(getAtoms(result));
}
