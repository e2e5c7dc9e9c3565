/**
 * Types of nodes in the propositional syntax tree:
 */
export const enum NodeKind {
  Const, // boolean constant ⊤ or ⊥
  Atom, // propositional variable p
  Not, // negation of a formula
  And, // conjunction of two formulas
  Or, // disjunction of two formulas
  Implies, // implication of two formulas
  Iff, // biconditional of two formulas
  Xor, // exclusive disjunction of two formulas
}

/** Boolean constant. */
export type Const = { readonly kind: NodeKind.Const; readonly value: boolean };

/** Propositional variable, identified by name. */
export type Atom = { readonly kind: NodeKind.Atom; readonly name: string };

/** Negation of a formula. */
export type Not = { readonly kind: NodeKind.Not; readonly arg: Formula };

/** Conjunction of two formulas. */
export type And = {
  readonly kind: NodeKind.And;
  readonly left: Formula;
  readonly right: Formula;
};

/** Disjunction of two formulas. */
export type Or = {
  readonly kind: NodeKind.Or;
  readonly left: Formula;
  readonly right: Formula;
};

/** Implication between two formulas. */
export type Implies = {
  readonly kind: NodeKind.Implies;
  readonly left: Formula;
  readonly right: Formula;
};

/** Biconditional between two formulas. */
export type Iff = {
  readonly kind: NodeKind.Iff;
  readonly left: Formula;
  readonly right: Formula;
};

/** Exclusive disjunction of two formulas. */
export type Xor = {
  readonly kind: NodeKind.Xor;
  readonly left: Formula;
  readonly right: Formula;
};

/**
 * The binary connectives, i.e. every node kind with a `left` and `right`.
 */
export type BinaryKind =
  | NodeKind.And
  | NodeKind.Or
  | NodeKind.Implies
  | NodeKind.Iff
  | NodeKind.Xor;

export type Binary = And | Or | Implies | Iff | Xor;

/**
 * Represents a propositional formula, which is either a constant, an atom or
 * a logical combination of formulas. Formulas are immutable values: every
 * operation in this package returns a new tree.
 */
export type Formula = Const | Atom | Not | Binary;

/**
 * Words the default grammar reads as constants or connectives. An atom with
 * one of these names could not be printed and read back.
 */
export const RESERVED_WORDS: ReadonlySet<string> = new Set([
  'true',
  'false',
  'not',
  'and',
  'or',
  'implies',
  'iff',
  'xor',
]);

/**
 * Represents a construction-time rejection of a malformed atom name.
 */
export class InvalidAtomNameError extends Error {
  constructor(public readonly atomName: string) {
    super(
      RESERVED_WORDS.has(atomName)
        ? `'${atomName}' is a reserved word and cannot name an atom`
        : `'${atomName}' is not a valid atom name (expected a letter or underscore followed by letters, digits or underscores)`
    );
  }
}

const ATOM_NAME = /^[\p{L}_][\p{L}\p{N}_]*$/u;

/**
 * Returns true if the given string can be used as an atom name: a Unicode
 * letter or underscore followed by letters, digits or underscores, and not a
 * reserved word.
 */
export function isValidAtomName(name: string): boolean {
  return ATOM_NAME.test(name) && !RESERVED_WORDS.has(name);
}

export const TRUE: Const = { kind: NodeKind.Const, value: true };
export const FALSE: Const = { kind: NodeKind.Const, value: false };

export function constant(value: boolean): Const {
  return value ? TRUE : FALSE;
}

/**
 * Creates an atom, throwing `InvalidAtomNameError` if the name is malformed.
 */
export function atom(name: string): Atom {
  if (!isValidAtomName(name)) {
    throw new InvalidAtomNameError(name);
  }
  return { kind: NodeKind.Atom, name };
}

export function not(arg: Formula): Not {
  return { kind: NodeKind.Not, arg };
}

export function and(left: Formula, right: Formula): And {
  return { kind: NodeKind.And, left, right };
}

export function or(left: Formula, right: Formula): Or {
  return { kind: NodeKind.Or, left, right };
}

export function implies(left: Formula, right: Formula): Implies {
  return { kind: NodeKind.Implies, left, right };
}

export function iff(left: Formula, right: Formula): Iff {
  return { kind: NodeKind.Iff, left, right };
}

export function xor(left: Formula, right: Formula): Xor {
  return { kind: NodeKind.Xor, left, right };
}

/**
 * Builds a binary node of the given kind.
 */
export function binary(kind: BinaryKind, left: Formula, right: Formula): Binary {
  switch (kind) {
    case NodeKind.And:
      return and(left, right);
    case NodeKind.Or:
      return or(left, right);
    case NodeKind.Implies:
      return implies(left, right);
    case NodeKind.Iff:
      return iff(left, right);
    case NodeKind.Xor:
      return xor(left, right);
    default: {
      const _exhaustive: never = kind;
      throw new Error(_exhaustive);
    }
  }
}

/**
 * Left-nested conjunction of the given formulas, or ⊤ if there are none.
 */
export function conjunction(fs: readonly Formula[]): Formula {
  if (fs.length === 0) return TRUE;
  return fs.slice(1).reduce<Formula>((acc, f) => and(acc, f), fs[0]);
}

/**
 * Left-nested disjunction of the given formulas, or ⊥ if there are none.
 */
export function disjunction(fs: readonly Formula[]): Formula {
  if (fs.length === 0) return FALSE;
  return fs.slice(1).reduce<Formula>((acc, f) => or(acc, f), fs[0]);
}

export function isBinary(f: Formula): f is Binary {
  switch (f.kind) {
    case NodeKind.And:
    case NodeKind.Or:
    case NodeKind.Implies:
    case NodeKind.Iff:
    case NodeKind.Xor:
      return true;
    default:
      return false;
  }
}

export function isAtomic(f: Formula): f is Atom | Const {
  return f.kind === NodeKind.Atom || f.kind === NodeKind.Const;
}

/**
 * Returns true for an atom or the negation of an atom.
 */
export function isLiteral(f: Formula): boolean {
  return (
    f.kind === NodeKind.Atom ||
    (f.kind === NodeKind.Not && f.arg.kind === NodeKind.Atom)
  );
}

/**
 * Callbacks for `transform`.
 */
export type TransformFns = {
  Const?: (f: Const) => Formula;
  Atom?: (f: Atom) => Formula;
  Not?: (f: Not) => Formula;
  And?: (f: And) => Formula;
  Or?: (f: Or) => Formula;
  Implies?: (f: Implies) => Formula;
  Iff?: (f: Iff) => Formula;
  Xor?: (f: Xor) => Formula;
};

/**
 * Helper for transforming formulas. A node with a callback is replaced by
 * the callback's result, which is not transformed any further; any other
 * node is rebuilt from its transformed children.
 */
export function transform(f: Formula, cbs: TransformFns): Formula {
  switch (f.kind) {
    case NodeKind.Const:
      return cbs.Const ? cbs.Const(f) : f;
    case NodeKind.Atom:
      return cbs.Atom ? cbs.Atom(f) : f;
    case NodeKind.Not: {
      if (cbs.Not) return cbs.Not(f);
      return not(transform(f.arg, cbs));
    }
    case NodeKind.And: {
      if (cbs.And) return cbs.And(f);
      return and(transform(f.left, cbs), transform(f.right, cbs));
    }
    case NodeKind.Or: {
      if (cbs.Or) return cbs.Or(f);
      return or(transform(f.left, cbs), transform(f.right, cbs));
    }
    case NodeKind.Implies: {
      if (cbs.Implies) return cbs.Implies(f);
      return implies(transform(f.left, cbs), transform(f.right, cbs));
    }
    case NodeKind.Iff: {
      if (cbs.Iff) return cbs.Iff(f);
      return iff(transform(f.left, cbs), transform(f.right, cbs));
    }
    case NodeKind.Xor: {
      if (cbs.Xor) return cbs.Xor(f);
      return xor(transform(f.left, cbs), transform(f.right, cbs));
    }
    default: {
      const _exhaustive: never = f;
      throw new Error(_exhaustive);
    }
  }
}

/**
 * Returns true if the given formulas are equal syntactically.
 */
export function equal(f: Formula, g: Formula): boolean {
  switch (f.kind) {
    case NodeKind.Const:
      if (g.kind != NodeKind.Const) return false;
      return f.value == g.value;
    case NodeKind.Atom:
      if (g.kind != NodeKind.Atom) return false;
      return f.name == g.name;
    case NodeKind.Not:
      if (g.kind != NodeKind.Not) return false;
      return equal(f.arg, g.arg);
    case NodeKind.And:
    case NodeKind.Or:
    case NodeKind.Implies:
    case NodeKind.Iff:
    case NodeKind.Xor:
      if (g.kind != f.kind || !isBinary(g)) return false;
      return equal(f.left, g.left) && equal(f.right, g.right);
    default:
      const _exhaustive: never = f;
      throw new Error(_exhaustive);
  }
}

/**
 * Visits every node of the formula in pre-order.
 */
function preorder(f: Formula, visitNode: (f: Formula) => void): void {
  visitNode(f);
  switch (f.kind) {
    case NodeKind.Const:
    case NodeKind.Atom:
      break;
    case NodeKind.Not:
      preorder(f.arg, visitNode);
      break;
    case NodeKind.And:
    case NodeKind.Or:
    case NodeKind.Implies:
    case NodeKind.Iff:
    case NodeKind.Xor:
      preorder(f.left, visitNode);
      preorder(f.right, visitNode);
      break;
    default: {
      const _exhaustive: never = f;
      throw new Error(_exhaustive);
    }
  }
}

/**
 * Returns the distinct atom names of a formula in order of first occurrence.
 */
export function getAtoms(f: Formula): string[] {
  const seen: Set<string> = new Set();
  preorder(f, (node) => {
    if (node.kind === NodeKind.Atom) seen.add(node.name);
  });
  return [...seen];
}

/**
 * Returns every node of the formula in pre-order, one entry per position in
 * the tree. A subtree that occurs twice is listed twice.
 */
export function getSubformulas(f: Formula): Formula[] {
  const out: Formula[] = [];
  preorder(f, (node) => out.push(node));
  return out;
}

/** Number of nodes in the tree. */
export function size(f: Formula): number {
  let n = 0;
  preorder(f, () => n++);
  return n;
}

/** Length of the longest root-to-leaf path, counting nodes. */
export function depth(f: Formula): number {
  switch (f.kind) {
    case NodeKind.Const:
    case NodeKind.Atom:
      return 1;
    case NodeKind.Not:
      return 1 + depth(f.arg);
    default:
      return 1 + Math.max(depth(f.left), depth(f.right));
  }
}

/**
 * Returns true if `g` occurs as a subformula at some position of `f`.
 */
export function contains(f: Formula, g: Formula): boolean {
  if (equal(f, g)) return true;
  switch (f.kind) {
    case NodeKind.Const:
    case NodeKind.Atom:
      return false;
    case NodeKind.Not:
      return contains(f.arg, g);
    default:
      return contains(f.left, g) || contains(f.right, g);
  }
}

export type Substitution =
  | ReadonlyMap<string, Formula>
  | Readonly<Record<string, Formula>>;

function isMap(mapping: Substitution): mapping is ReadonlyMap<string, Formula> {
  return mapping instanceof Map;
}

function lookup(mapping: Substitution, name: string): Formula | undefined {
  if (isMap(mapping)) {
    return mapping.get(name);
  }
  return Object.prototype.hasOwnProperty.call(mapping, name)
    ? mapping[name]
    : undefined;
}

/**
 * Replaces every occurrence of each mapped atom with its replacement. All
 * replacements happen at once, so atoms inside a replacement are never
 * substituted again.
 */
export function substitute(f: Formula, mapping: Substitution): Formula {
  return transform(f, {
    Atom: (a) => lookup(mapping, a.name) ?? a,
  });
}
