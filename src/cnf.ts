import {
  Formula,
  NodeKind,
  TransformFns,
  transform,
  and,
  or,
  not,
  constant,
  isLiteral,
  size,
} from './ast';
import { debugLogger, LogComponent } from './debug-logger';
import { renderFormula } from './parse';

/**
 * Expands A↔B to (A∧B)∨(¬A∧¬B) and A⊕B to ¬((A∧B)∨(¬A∧¬B)).
 */
export function eliminateIffAndXor(f: Formula): Formula {
  const expand = (left: Formula, right: Formula) => {
    const l = transform(left, cbs);
    const r = transform(right, cbs);
    return or(and(l, r), and(not(l), not(r)));
  };
  const cbs: TransformFns = {
    Iff: (f) => expand(f.left, f.right),
    Xor: (f) => not(expand(f.left, f.right)),
  };

  return transform(f, cbs);
}

/**
 * Converts all instances of A→B to ¬A∨B.
 */
export function transformImpliesToOr(f: Formula): Formula {
  const cbs: TransformFns = {
    Implies: (f) => or(not(transform(f.left, cbs)), transform(f.right, cbs)),
  };

  return transform(f, cbs);
}

/**
 * Pushes all negations down to atoms using De Morgan's laws. Negated
 * constants are replaced by the opposite constant. Expects a formula without
 * implications, biconditionals or exclusive disjunctions.
 */
export function pushNegationsDown(f: Formula): Formula {
  let touched = false;
  const singlePass = (f: Formula): Formula => {
    const cbs: TransformFns = {
      Not: (f) => {
        switch (f.arg.kind) {
          case NodeKind.And:
            // ¬(A ∧ B) → (¬A ∨ ¬B)
            touched = true;
            return or(
              not(transform(f.arg.left, cbs)),
              not(transform(f.arg.right, cbs))
            );
          case NodeKind.Or:
            // ¬(A ∨ B) → (¬A ∧ ¬B)
            touched = true;
            return and(
              not(transform(f.arg.left, cbs)),
              not(transform(f.arg.right, cbs))
            );
          case NodeKind.Const:
            // ¬⊤ → ⊥, ¬⊥ → ⊤
            touched = true;
            return constant(!f.arg.value);
          default:
            return not(transform(f.arg, cbs));
        }
      },
    };

    return transform(f, cbs);
  };

  do {
    touched = false;
    f = singlePass(f);
  } while (touched);
  return f;
}

/**
 * Removes all double negations.
 */
export function removeDoubleNegations(f: Formula): Formula {
  const cbs: TransformFns = {
    Not: (f) => {
      if (f.arg.kind === NodeKind.Not) {
        // ¬¬A → A
        return transform(f.arg.arg, cbs);
      }
      return not(transform(f.arg, cbs));
    },
  };

  return transform(f, cbs);
}

/**
 * Distributes OR over AND.
 */
export function distributeOrOverAnd(f: Formula): Formula {
  let touched = false;
  const singlePass = (f: Formula): Formula => {
    const cbs: TransformFns = {
      Or: (f) => {
        // A ∨ (B ∧ C) → (A ∨ B) ∧ (A ∨ C)
        if (f.right.kind === NodeKind.And) {
          touched = true;
          const a = transform(f.left, cbs);
          return and(
            or(a, transform(f.right.left, cbs)),
            or(a, transform(f.right.right, cbs))
          );
        }
        // (B ∧ C) ∨ A → (B ∨ A) ∧ (C ∨ A)
        if (f.left.kind === NodeKind.And) {
          touched = true;
          const a = transform(f.right, cbs);
          return and(
            or(transform(f.left.left, cbs), a),
            or(transform(f.left.right, cbs), a)
          );
        }
        // No distribution needed, just transform children
        return or(transform(f.left, cbs), transform(f.right, cbs));
      },
    };

    return transform(f, cbs);
  };

  do {
    touched = false;
    f = singlePass(f);
  } while (touched);
  return f;
}

/**
 * Distributes AND over OR.
 */
export function distributeAndOverOr(f: Formula): Formula {
  let touched = false;
  const singlePass = (f: Formula): Formula => {
    const cbs: TransformFns = {
      And: (f) => {
        // A ∧ (B ∨ C) → (A ∧ B) ∨ (A ∧ C)
        if (f.right.kind === NodeKind.Or) {
          touched = true;
          const a = transform(f.left, cbs);
          return or(
            and(a, transform(f.right.left, cbs)),
            and(a, transform(f.right.right, cbs))
          );
        }
        // (B ∨ C) ∧ A → (B ∧ A) ∨ (C ∧ A)
        if (f.left.kind === NodeKind.Or) {
          touched = true;
          const a = transform(f.right, cbs);
          return or(
            and(transform(f.left.left, cbs), a),
            and(transform(f.left.right, cbs), a)
          );
        }
        return and(transform(f.left, cbs), transform(f.right, cbs));
      },
    };

    return transform(f, cbs);
  };

  do {
    touched = false;
    f = singlePass(f);
  } while (touched);
  return f;
}

/**
 * Converts a formula to negation normal form: only ∧, ∨ and ¬ remain, and ¬
 * appears only directly above atoms.
 */
export function toNNF(f: Formula): Formula {
  f = eliminateIffAndXor(f);
  f = transformImpliesToOr(f);
  f = pushNegationsDown(f);
  f = removeDoubleNegations(f);
  return f;
}

/**
 * Converts a formula to an equivalent conjunction of disjunctions of
 * literals. The result is not simplified, and may be exponentially larger
 * than the input.
 */
export function toCNF(f: Formula): Formula {
  const cnf = distributeOrOverAnd(toNNF(f));
  debugLogger.debug(
    LogComponent.NORMAL_FORM,
    () => `CNF of ${renderFormula(f)}: ${size(f)} → ${size(cnf)} nodes`
  );
  return cnf;
}

/**
 * Converts a formula to an equivalent disjunction of conjunctions of
 * literals. The result is not simplified, and may be exponentially larger
 * than the input.
 */
export function toDNF(f: Formula): Formula {
  const dnf = distributeAndOverOr(toNNF(f));
  debugLogger.debug(
    LogComponent.NORMAL_FORM,
    () => `DNF of ${renderFormula(f)}: ${size(f)} → ${size(dnf)} nodes`
  );
  return dnf;
}

const isLeaf = (f: Formula) => f.kind === NodeKind.Const || isLiteral(f);

/**
 * Returns true if the formula is in negation normal form.
 */
export function isNNF(f: Formula): boolean {
  switch (f.kind) {
    case NodeKind.Const:
    case NodeKind.Atom:
      return true;
    case NodeKind.Not:
      return f.arg.kind === NodeKind.Atom;
    case NodeKind.And:
    case NodeKind.Or:
      return isNNF(f.left) && isNNF(f.right);
    default:
      return false;
  }
}

/** True if `f` is a tree of `kind` nodes over leaves accepted by `leaf`. */
function isFlat(
  f: Formula,
  kind: NodeKind.And | NodeKind.Or,
  leaf: (f: Formula) => boolean
): boolean {
  if ((f.kind === NodeKind.And || f.kind === NodeKind.Or) && f.kind === kind) {
    return isFlat(f.left, kind, leaf) && isFlat(f.right, kind, leaf);
  }
  return leaf(f);
}

/**
 * Returns true if the formula is a conjunction of disjunctions of literals.
 * Constants count as literals.
 */
export function isCNF(f: Formula): boolean {
  return isFlat(f, NodeKind.And, (clause) => isFlat(clause, NodeKind.Or, isLeaf));
}

/**
 * Returns true if the formula is a disjunction of conjunctions of literals.
 * Constants count as literals.
 */
export function isDNF(f: Formula): boolean {
  return isFlat(f, NodeKind.Or, (term) => isFlat(term, NodeKind.And, isLeaf));
}
