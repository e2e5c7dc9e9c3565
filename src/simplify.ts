import {
  Formula,
  NodeKind,
  Binary,
  TRUE,
  FALSE,
  not,
  binary,
  equal,
  size,
} from './ast';
import { debugLogger, LogComponent } from './debug-logger';
import { renderFormula } from './parse';

const isTrue = (f: Formula) => f.kind === NodeKind.Const && f.value;
const isFalse = (f: Formula) => f.kind === NodeKind.Const && !f.value;

/** True if one of the formulas is the negation of the other. */
function complementary(f: Formula, g: Formula): boolean {
  return (
    (f.kind === NodeKind.Not && equal(f.arg, g)) ||
    (g.kind === NodeKind.Not && equal(g.arg, f))
  );
}

/** True if `f` is `g ∘ h` or `h ∘ g` for the connective `kind`. */
function hasOperand(f: Formula, kind: NodeKind.And | NodeKind.Or, g: Formula): boolean {
  if (f.kind !== NodeKind.And && f.kind !== NodeKind.Or) return false;
  return f.kind === kind && (equal(f.left, g) || equal(f.right, g));
}

/**
 * Applies the first rule that fires at the root of a binary node whose
 * children are already simplified, or returns undefined. Every rule returns a
 * formula with fewer nodes than its input.
 */
function rewriteBinary(f: Binary): Formula | undefined {
  const { left: l, right: r } = f;
  switch (f.kind) {
    case NodeKind.And:
      // A ∧ ⊥ → ⊥, A ∧ ⊤ → A
      if (isFalse(l) || isFalse(r)) return FALSE;
      if (isTrue(l)) return r;
      if (isTrue(r)) return l;
      // A ∧ A → A
      if (equal(l, r)) return l;
      // A ∧ ¬A → ⊥
      if (complementary(l, r)) return FALSE;
      // A ∧ (A ∨ B) → A
      if (hasOperand(r, NodeKind.Or, l)) return l;
      if (hasOperand(l, NodeKind.Or, r)) return r;
      return undefined;
    case NodeKind.Or:
      // A ∨ ⊤ → ⊤, A ∨ ⊥ → A
      if (isTrue(l) || isTrue(r)) return TRUE;
      if (isFalse(l)) return r;
      if (isFalse(r)) return l;
      // A ∨ A → A
      if (equal(l, r)) return l;
      // A ∨ ¬A → ⊤
      if (complementary(l, r)) return TRUE;
      // A ∨ (A ∧ B) → A
      if (hasOperand(r, NodeKind.And, l)) return l;
      if (hasOperand(l, NodeKind.And, r)) return r;
      return undefined;
    case NodeKind.Implies:
      // ⊤ → A ≡ A, ⊥ → A ≡ ⊤, A → ⊤ ≡ ⊤, A → ⊥ ≡ ¬A
      if (isTrue(l)) return r;
      if (isFalse(l) || isTrue(r)) return TRUE;
      if (isFalse(r)) return not(l);
      // A → A ≡ ⊤
      if (equal(l, r)) return TRUE;
      // A → ¬A ≡ ¬A, ¬A → A ≡ A
      if (complementary(l, r)) return r;
      return undefined;
    case NodeKind.Iff:
      if (isTrue(l)) return r;
      if (isTrue(r)) return l;
      if (isFalse(l)) return not(r);
      if (isFalse(r)) return not(l);
      // A ↔ A ≡ ⊤, A ↔ ¬A ≡ ⊥
      if (equal(l, r)) return TRUE;
      if (complementary(l, r)) return FALSE;
      return undefined;
    case NodeKind.Xor:
      if (isFalse(l)) return r;
      if (isFalse(r)) return l;
      if (isTrue(l)) return not(r);
      if (isTrue(r)) return not(l);
      // A ⊕ A ≡ ⊥, A ⊕ ¬A ≡ ⊤
      if (equal(l, r)) return FALSE;
      if (complementary(l, r)) return TRUE;
      return undefined;
    default: {
      const _exhaustive: never = f;
      throw new Error(_exhaustive);
    }
  }
}

/**
 * Simplifies a formula by applying constant absorption, double negation,
 * idempotence, complement and absorption laws bottom-up until a pass changes
 * nothing. De Morgan's laws are left to `toNNF`.
 */
export function simplify(f: Formula): Formula {
  let touched = false;
  const singlePass = (f: Formula): Formula => {
    switch (f.kind) {
      case NodeKind.Const:
      case NodeKind.Atom:
        return f;
      case NodeKind.Not: {
        const arg = singlePass(f.arg);
        if (arg.kind === NodeKind.Const) {
          // ¬⊤ → ⊥, ¬⊥ → ⊤
          touched = true;
          return arg.value ? FALSE : TRUE;
        }
        if (arg.kind === NodeKind.Not) {
          // ¬¬A → A
          touched = true;
          return arg.arg;
        }
        return arg === f.arg ? f : not(arg);
      }
      default: {
        const left = singlePass(f.left);
        const right = singlePass(f.right);
        const node =
          left === f.left && right === f.right ? f : binary(f.kind, left, right);
        const rewritten = rewriteBinary(node);
        if (rewritten === undefined) return node;
        touched = true;
        return rewritten;
      }
    }
  };

  let passes = 0;
  do {
    touched = false;
    f = singlePass(f);
    passes++;
    debugLogger.trace(
      LogComponent.SIMPLIFY,
      () => `pass ${passes}: ${renderFormula(f)} (${size(f)} nodes)`
    );
  } while (touched);
  return f;
}
